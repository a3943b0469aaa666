export * from "./config/index";
export type {
  ConsoleStream,
  LogSink,
  OwnerScheduler,
  PassthroughSink,
  ScheduleOptions,
  StreamName,
  UnderlyingStream,
  WriteCallback,
} from "./streams";
export { buildTapJsonSchema, TAP_SCHEMA_ID } from "./schema/json-schema";
