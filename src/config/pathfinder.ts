import { LOG_LEVELS, StructuredLogger, type LogLevel, type LogStream } from "../logger.js";
import { SEARCH_ALGORITHMS, type SearchAlgorithm } from "../search/types.js";
import { readBool, readEnum, readOptionalString, type EnvSource } from "./env.js";

/** Algorithms the CLI can run: a single strategy or all of them. */
export const CLI_ALGORITHMS = [...SEARCH_ALGORITHMS, "all"] as const;
export type CliAlgorithm = (typeof CLI_ALGORITHMS)[number];

export const OUTPUT_FORMATS = ["text", "json"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface PathfinderConfig {
  readonly logLevel: LogLevel;
  readonly logFile: string | null;
  readonly algorithm: CliAlgorithm;
  readonly format: OutputFormat;
  /** Appends the expansion order to text reports. */
  readonly showVisited: boolean;
}

/**
 * Resolves the runtime configuration from `PATHFINDER_*` variables. Unset or
 * invalid values fall back to the defaults.
 */
export function loadPathfinderConfig(source: EnvSource = process.env): PathfinderConfig {
  return {
    logLevel: readEnum("PATHFINDER_LOG_LEVEL", LOG_LEVELS, "warn", source),
    logFile: readOptionalString("PATHFINDER_LOG_FILE", source) ?? null,
    algorithm: readEnum("PATHFINDER_ALGORITHM", CLI_ALGORITHMS, "all", source),
    format: readEnum("PATHFINDER_FORMAT", OUTPUT_FORMATS, "text", source),
    showVisited: readBool("PATHFINDER_SHOW_VISITED", false, source),
  };
}

export function createLoggerFromConfig(config: PathfinderConfig, stream: LogStream | null = "stderr"): StructuredLogger {
  return new StructuredLogger({ level: config.logLevel, stream, logFile: config.logFile });
}
