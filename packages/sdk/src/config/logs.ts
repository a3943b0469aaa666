import { z } from "zod";

export const logsConfigSchema = z.object({
  dir: z.string().min(1).default(".linetap/logs"),
  timestamps: z.boolean().default(true),
  clearOnStart: z.boolean().default(true),
});

export type LogsConfig = z.infer<typeof logsConfigSchema>;
