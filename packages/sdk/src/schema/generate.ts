import { writeFileSync, mkdirSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { buildTapJsonSchema, TAP_SCHEMA_ID } from "./json-schema";

const here = dirname(fileURLToPath(import.meta.url));
const outPath = resolve(here, "../../schemas", TAP_SCHEMA_ID);
mkdirSync(dirname(outPath), { recursive: true });
writeFileSync(outPath, JSON.stringify(buildTapJsonSchema(), null, 2) + "\n");

console.log(`Generated ${outPath}`);
