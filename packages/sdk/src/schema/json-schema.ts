import { zodToJsonSchema } from "zod-to-json-schema";
import { tapConfigSchema } from "../config/tap";

export const TAP_SCHEMA_ID = "linetap.v1.schema.json";

export function buildTapJsonSchema(): Record<string, unknown> {
  const jsonSchema = zodToJsonSchema(tapConfigSchema, {
    name: "linetap.v1",
    $refStrategy: "none",
    target: "jsonSchema7",
  });

  return {
    $schema: "http://json-schema.org/draft-07/schema#",
    $id: TAP_SCHEMA_ID,
    ...jsonSchema,
  };
}
