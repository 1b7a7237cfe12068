import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Where log lines are written. The stdio MCP transport owns stdout,
 * so the server logs to stderr; CLI commands print to stdout.
 */
export type LogStream = "stdout" | "stderr";

export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  stream?: LogStream;
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Levelled, colourised logger used by the server, the store and the CLI.
 */
export class Logger {
  private level: LogLevel;
  private readonly prefix: string;
  private readonly stream: LogStream;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.prefix = options.prefix ?? "";
    this.stream = options.stream ?? "stderr";
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  debug(message: string): void {
    if (!this.shouldLog("debug")) return;
    this.write(chalk.gray(`[DEBUG] ${this.format(message)}`));
  }

  info(message: string): void {
    if (!this.shouldLog("info")) return;
    this.write(chalk.blue(`[INFO] ${this.format(message)}`));
  }

  warn(message: string): void {
    if (!this.shouldLog("warn")) return;
    this.write(chalk.yellow(`[WARN] ${this.format(message)}`));
  }

  error(message: string, cause?: unknown): void {
    if (!this.shouldLog("error")) return;
    this.write(chalk.red(`[ERROR] ${this.format(message)}`));
    if (cause instanceof Error && cause.stack) {
      this.write(chalk.red(cause.stack));
    }
  }

  /**
   * Create a child logger sharing level and stream, with a nested prefix.
   */
  child(prefix: string): Logger {
    return new Logger({
      level: this.level,
      stream: this.stream,
      prefix: this.prefix ? `${this.prefix}:${prefix}` : prefix,
    });
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private format(message: string): string {
    const timestamp = new Date().toISOString();
    return this.prefix ? `${timestamp} [${this.prefix}] ${message}` : `${timestamp} ${message}`;
  }

  private write(line: string): void {
    if (this.stream === "stdout") {
      console.log(line);
    } else {
      console.error(line);
    }
  }
}

const envLevel = process.env.LOG_LEVEL;

export const logger = new Logger({
  level: isLogLevel(envLevel) ? envLevel : "info",
  prefix: "design-patterns",
});
