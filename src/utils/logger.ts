export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogSink = (level: LogLevel, message: string, ...args: unknown[]) => void;

// stdout is reserved for the MCP stdio transport, so every line goes to stderr.
const stderrSink: LogSink = (level, message, ...args) => {
  const timestamp = new Date().toISOString();
  console.error(`[${timestamp}] [${level.toUpperCase()}]`, message, ...args);
};

export class Logger {
  constructor(
    private readonly level: LogLevel = "info",
    private readonly sink: LogSink = stderrSink,
    private readonly scope?: string,
  ) {}

  child(scope: string): Logger {
    return new Logger(this.level, this.sink, this.scope ? `${this.scope}:${scope}` : scope);
  }

  debug(message: string, ...args: unknown[]): void {
    this.log("debug", message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log("info", message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log("warn", message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    this.log("error", message, ...args);
  }

  private log(level: LogLevel, message: string, ...args: unknown[]): void {
    if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[this.level]) {
      return;
    }
    this.sink(level, this.scope ? `[${this.scope}] ${message}` : message, ...args);
  }
}

export const silentLogger = new Logger("error", () => {});
