import { z } from "zod";
import { logsConfigSchema } from "./logs";
import { categorySchema, streamsConfigSchema } from "./stream";

export const tapConfigSchema = z.object({
  version: z.literal("1"),
  name: z.string().min(1),
  logs: logsConfigSchema.default({}),
  streams: streamsConfigSchema.default({}),
  statusCategory: categorySchema.default("linetap"),
});

export type TapConfig = z.infer<typeof tapConfigSchema>;
