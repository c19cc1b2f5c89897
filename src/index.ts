export * from "./graph/index.js";
export * from "./search/index.js";
export * from "./errors.js";
export { StructuredLogger, LOG_LEVELS, type LogEntry, type LogLevel, type LoggerOptions, type LogStream } from "./logger.js";
export {
  CLI_ALGORITHMS,
  OUTPUT_FORMATS,
  createLoggerFromConfig,
  loadPathfinderConfig,
  type CliAlgorithm,
  type OutputFormat,
  type PathfinderConfig,
} from "./config/pathfinder.js";
