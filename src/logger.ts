import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Log levels ordered from the most to the least verbose. */
export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component?: string;
  payload?: unknown;
}

export type LogStream = "stdout" | "stderr";

export interface LoggerOptions {
  /** Entries below this level are dropped. Defaults to `debug`. */
  readonly level?: LogLevel;
  /** Stream receiving the JSON lines. Defaults to `stdout`; `null` disables console output. */
  readonly stream?: LogStream | null;
  /** Optional file mirroring every emitted line. */
  readonly logFile?: string | null;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
}

/**
 * Sinks shared between a logger and the children derived from it, so that a
 * single write queue keeps file output ordered across components.
 */
export interface LoggerSinks {
  readonly level: LogLevel;
  readonly stream: LogStream | null;
  readonly logFile?: string;
  readonly onEntry?: (entry: LogEntry) => void;
  writeQueue: Promise<void>;
  logDirectoryReady: boolean;
}

/**
 * Structured logger that emits JSON lines on stdout (or stderr) and optionally
 * mirrors them to a file. File writes are queued sequentially to guarantee
 * ordering.
 */
export class StructuredLogger {
  private readonly sinks: LoggerSinks;
  private readonly component?: string;

  /**
   * @param inherited set by {@link child}; shares the parent's sinks instead of
   * creating new ones from {@link options}.
   */
  constructor(options: LoggerOptions = {}, inherited?: { sinks: LoggerSinks; component: string }) {
    if (inherited) {
      this.sinks = inherited.sinks;
      this.component = inherited.component;
      return;
    }
    this.sinks = {
      level: options.level ?? "debug",
      stream: options.stream === undefined ? "stdout" : options.stream,
      writeQueue: Promise.resolve(),
      logDirectoryReady: false,
      ...(options.logFile ? { logFile: options.logFile } : {}),
      ...(options.onEntry ? { onEntry: options.onEntry } : {}),
    };
  }

  /**
   * Returns a logger stamping {@link component} on its entries. The child
   * writes through the same sinks as its parent.
   */
  child(component: string): StructuredLogger {
    return new StructuredLogger({}, { sinks: this.sinks, component });
  }

  /** Whether entries of the given level pass the configured threshold. */
  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.sinks.level];
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  /**
   * Waits for all pending log writes to be flushed. Tests rely on this helper
   * to deterministically assert the content of mirrored log files.
   */
  async flush(): Promise<void> {
    await this.sinks.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(this.component !== undefined ? { component: this.component } : {}),
      ...(payload !== undefined ? { payload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    if (this.sinks.stream === "stderr") {
      process.stderr.write(line);
    } else if (this.sinks.stream === "stdout") {
      process.stdout.write(line);
    }
    if (this.sinks.onEntry) {
      this.sinks.onEntry(structuredClone(entry));
    }
    const logFile = this.sinks.logFile;
    if (!logFile) {
      return;
    }
    this.sinks.writeQueue = this.sinks.writeQueue.then(async () => {
      try {
        await this.ensureLogDestination(logFile);
        await appendFile(logFile, line, "utf8");
      } catch (err) {
        const errorEntry: LogEntry = {
          timestamp: new Date().toISOString(),
          level: "error",
          message: "log_file_write_failed",
          payload: err instanceof Error ? { message: err.message } : { error: String(err) },
        };
        process.stderr.write(`${JSON.stringify(errorEntry)}\n`);
        // Allow future attempts to retry directory creation after a failure.
        this.sinks.logDirectoryReady = false;
      }
    });
  }

  private async ensureLogDestination(logFile: string): Promise<void> {
    if (this.sinks.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.sinks.logDirectoryReady = true;
  }
}
