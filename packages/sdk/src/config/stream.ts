import { z } from "zod";

/** Log categories become file names, so they stay within a safe alphabet. */
export const categorySchema = z
  .string()
  .regex(/^[A-Za-z0-9._-]+$/, "Category may only contain letters, digits, '.', '_' and '-'");

export const streamConfigSchema = z.object({
  enabled: z.boolean().default(true),
  /** Log category the stream ships to. Defaults to the stream name. */
  category: categorySchema.optional(),
});

export type StreamConfig = z.infer<typeof streamConfigSchema>;

export const streamsConfigSchema = z.object({
  stdout: streamConfigSchema.default({}),
  stderr: streamConfigSchema.default({}),
});

export type StreamsConfig = z.infer<typeof streamsConfigSchema>;
