/**
 * Scoped run logger.
 *
 * Lines go to stderr so that stdout stays reserved for `--json` command payloads.
 *
 *   LOG_LEVEL=debug|info|warn|error   (default: info)
 *   LOG_FORMAT=pretty|json            (default: pretty)
 */

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogFormat = "pretty" | "json";
export type LogScope = "pipeline" | "llm" | "facts" | "moderation" | "checkpoint" | "cli" | string;

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export type LogEntry = {
  timestamp: string;
  level: LogLevel;
  scope?: string;
  message: string;
  data?: unknown;
};

export type LogSink = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  withScope(scope: LogScope): Logger;
}

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };
const ABBR: Record<LogLevel, string> = { debug: "DBG", info: "INF", warn: "WRN", error: "ERR" };

export function formatLogEntry(entry: LogEntry, format: LogFormat): string {
  if (format === "json") return JSON.stringify(entry);
  const time = entry.timestamp.slice(11, 19);
  const scope = entry.scope ? ` │ ${entry.scope}` : "";
  const data = entry.data === undefined ? "" : ` │ ${JSON.stringify(entry.data)}`;
  return `${time} [${ABBR[entry.level]}]${scope} ${entry.message}${data}`;
}

export function stderrSink(format: LogFormat): LogSink {
  return (entry) => {
    process.stderr.write(`${formatLogEntry(entry, format)}\n`);
  };
}

class ScopedLogger implements Logger {
  constructor(
    private readonly threshold: number,
    private readonly sink: LogSink,
    private readonly scope?: string
  ) {}

  private emit(level: LogLevel, message: string, data: unknown): void {
    if (RANK[level] < this.threshold) return;
    const entry: LogEntry = { timestamp: new Date().toISOString(), level, message };
    if (this.scope) entry.scope = this.scope;
    if (data !== undefined) entry.data = data;
    this.sink(entry);
  }

  debug(message: string, data?: unknown): void {
    this.emit("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.emit("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.emit("warn", message, data);
  }

  error(message: string, data?: unknown): void {
    this.emit("error", message, data);
  }

  withScope(scope: LogScope): Logger {
    return new ScopedLogger(this.threshold, this.sink, scope);
  }
}

export function createLogger(opts: { level?: LogLevel; format?: LogFormat; sink?: LogSink } = {}): Logger {
  const format = opts.format ?? "pretty";
  return new ScopedLogger(RANK[opts.level ?? "info"], opts.sink ?? stderrSink(format));
}

/** Collects entries in memory; used where a caller needs to inspect what was logged. */
export function createMemoryLogger(level: LogLevel = "debug"): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return { logger: createLogger({ level, sink: (e) => entries.push(e) }), entries };
}

export function createSilentLogger(): Logger {
  return createLogger({ level: "error", sink: () => undefined });
}
