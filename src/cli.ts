#!/usr/bin/env node
import { realpathSync } from "node:fs";
import process from "node:process";
import { fileURLToPath } from "node:url";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.
import {
  CLI_ALGORITHMS,
  OUTPUT_FORMATS,
  createLoggerFromConfig,
  loadPathfinderConfig,
  type CliAlgorithm,
  type OutputFormat,
  type PathfinderConfig,
} from "./config/pathfinder.js";
import type { EnvSource } from "./config/env.js";
import { InvalidArgumentError, normaliseError } from "./errors.js";
import { buildGraphFromDocument, readGraphDocument } from "./graph/document.js";
import { createSampleGraph } from "./graph/sample.js";
import type { WeightedGraph } from "./graph/weightedGraph.js";
import type { StructuredLogger } from "./logger.js";
import { createPathSearch } from "./search/index.js";
import { SEARCH_ALGORITHMS, type SearchAlgorithm, type SearchOutcome } from "./search/types.js";

const SAMPLE_START = "A";
const SAMPLE_END = "E";

const ALGORITHM_LABELS: Record<SearchAlgorithm, string> = {
  bfs: "BFS",
  dijkstra: "Dijkstra",
};

interface CliOptions {
  readonly graphFile?: string;
  readonly from?: string;
  readonly to?: string;
  readonly algorithm: CliAlgorithm;
  readonly format: OutputFormat;
  readonly help: boolean;
}

/** Line-oriented output sinks, swapped for buffers in tests. */
export interface CliIo {
  stdout(line: string): void;
  stderr(line: string): void;
}

export interface RunCliOptions {
  readonly env?: EnvSource;
  readonly io?: CliIo;
  /** Overrides the logger built from the configuration. */
  readonly logger?: StructuredLogger;
}

const processIo: CliIo = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
};

/**
 * Runs the demonstration: loads the sample graph (or a JSON graph document),
 * queries the requested strategies and prints one report per strategy.
 * Resolves with the process exit code.
 */
export async function runCli(argv: string[], options: RunCliOptions = {}): Promise<number> {
  const io = options.io ?? processIo;
  const config = loadPathfinderConfig(options.env ?? process.env);
  const logger = options.logger ?? createLoggerFromConfig(config);

  try {
    const cli = parseArgs(argv, config);
    if (cli.help) {
      printUsage(io);
      return 0;
    }

    const { graph, from, to, label } = await loadGraph(cli, logger);
    const algorithms: readonly SearchAlgorithm[] = cli.algorithm === "all" ? SEARCH_ALGORITHMS : [cli.algorithm];
    const outcomes = algorithms.map((algorithm) => createPathSearch(graph, algorithm, { logger }).search(from, to));
    logger.info("cli_run_completed", { graph: label, from, to, algorithms });

    if (cli.format === "json") {
      io.stdout(JSON.stringify(buildJsonReport(label, from, to, outcomes), null, 2));
    } else {
      for (const outcome of outcomes) {
        for (const line of formatTextReport(outcome, config.showVisited)) {
          io.stdout(line);
        }
      }
    }
    return 0;
  } catch (error) {
    const normalised = normaliseError(error);
    logger.error("cli_failed", normalised);
    io.stderr(`error ${normalised.code}: ${normalised.message}`);
    return 1;
  } finally {
    await logger.flush();
  }
}

async function loadGraph(
  cli: CliOptions,
  logger: StructuredLogger,
): Promise<{ graph: WeightedGraph<string>; from: string; to: string; label: string }> {
  if (cli.graphFile === undefined) {
    return {
      graph: createSampleGraph({ logger }),
      from: cli.from ?? SAMPLE_START,
      to: cli.to ?? SAMPLE_END,
      label: "sample",
    };
  }
  if (cli.from === undefined || cli.to === undefined) {
    throw new InvalidArgumentError("--from and --to are required with --graph");
  }
  const document = await readGraphDocument(cli.graphFile);
  return {
    graph: buildGraphFromDocument(document, { logger }),
    from: cli.from,
    to: cli.to,
    label: document.name ?? cli.graphFile,
  };
}

function buildJsonReport(label: string, from: string, to: string, outcomes: SearchOutcome<string>[]) {
  return {
    graph: label,
    from,
    to,
    results: outcomes.map((outcome) => ({
      algorithm: outcome.algorithm,
      path: outcome.path,
      distance: outcome.distance,
      hops: outcome.hops,
    })),
  };
}

function formatTextReport(outcome: SearchOutcome<string>, showVisited: boolean): string[] {
  const label = ALGORITHM_LABELS[outcome.algorithm];
  const lines =
    outcome.path === null
      ? [`${label}: no path`]
      : [`${label}: ${outcome.path.join(" -> ")} (hops=${outcome.hops}, distance=${outcome.distance})`];
  if (showVisited) {
    lines.push(`  visited: ${outcome.visitedOrder.join(", ")}`);
  }
  return lines;
}

function parseArgs(argv: string[], config: PathfinderConfig): CliOptions {
  let graphFile: string | undefined;
  let from: string | undefined;
  let to: string | undefined;
  let algorithm: CliAlgorithm = config.algorithm;
  let format: OutputFormat = config.format;
  let help = false;

  const requireValue = (flag: string, value: string | undefined): string => {
    if (value === undefined || value.startsWith("--")) {
      throw new InvalidArgumentError(`${flag} expects a value`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    switch (token) {
      case "--graph":
        graphFile = requireValue(token, argv[++i]);
        break;
      case "--from":
        from = requireValue(token, argv[++i]);
        break;
      case "--to":
        to = requireValue(token, argv[++i]);
        break;
      case "--algorithm": {
        const value = requireValue(token, argv[++i]);
        const match = CLI_ALGORITHMS.find((candidate) => candidate === value);
        if (!match) {
          throw new InvalidArgumentError(`--algorithm must be one of ${CLI_ALGORITHMS.join(", ")}`);
        }
        algorithm = match;
        break;
      }
      case "--format": {
        const value = requireValue(token, argv[++i]);
        const match = OUTPUT_FORMATS.find((candidate) => candidate === value);
        if (!match) {
          throw new InvalidArgumentError("--format must be 'json' or 'text'");
        }
        format = match;
        break;
      }
      case "--help":
      case "-h":
        help = true;
        break;
      default:
        throw new InvalidArgumentError(`Unknown argument '${token}'`);
    }
  }

  return {
    algorithm,
    format,
    help,
    ...(graphFile === undefined ? {} : { graphFile }),
    ...(from === undefined ? {} : { from }),
    ...(to === undefined ? {} : { to }),
  };
}

function printUsage(io: CliIo): void {
  io.stdout(
    "Usage: graph-pathfinder [--graph file.json --from id --to id] [--algorithm bfs|dijkstra|all] [--format text|json]",
  );
  io.stdout("Examples:");
  io.stdout("  graph-pathfinder");
  io.stdout("  graph-pathfinder --from A --to D --algorithm dijkstra");
  io.stdout("  graph-pathfinder --graph network.json --from hub --to depot --format json");
}

/**
 * Whether the script Node was launched with is this module. npm installs the
 * `bin` entry as a symlink, so both sides are compared after resolving links.
 */
function isEntryPoint(executedFromCli: string | undefined, moduleUrl: string): boolean {
  if (!executedFromCli) {
    return false;
  }
  try {
    return realpathSync(executedFromCli) === realpathSync(fileURLToPath(moduleUrl));
  } catch {
    return false;
  }
}

const isCliEntryPoint = isEntryPoint(process.argv[1], import.meta.url);

if (isCliEntryPoint) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error instanceof Error ? error.message : error);
      process.exitCode = 1;
    },
  );
}

/**
 * Exposes internal helpers to the test suite without making them part of the
 * public API surface.
 */
export const __testing = {
  isEntryPoint,
  parseArgs,
  formatTextReport,
};
