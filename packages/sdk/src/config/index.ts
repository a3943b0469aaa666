export { tapConfigSchema, type TapConfig } from "./tap";
export {
  categorySchema,
  streamConfigSchema,
  streamsConfigSchema,
  type StreamConfig,
  type StreamsConfig,
} from "./stream";
export { logsConfigSchema, type LogsConfig } from "./logs";
