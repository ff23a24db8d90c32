import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "critical";

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  critical: 50,
};

const LABELS: Record<LogLevel, string> = {
  debug: "DEBUG",
  info: "INFO",
  warn: "WARNING",
  error: "ERROR",
  critical: "CRITICAL",
};

export interface LogStream {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  level: LogLevel;
  stream?: LogStream;
  colors?: boolean;
}

/**
 * Line logger. Writes to stderr by default: a script filter owns stdout.
 */
export class Logger {
  readonly level: LogLevel;
  private readonly stream: LogStream;
  private readonly paint: chalk.Chalk;

  constructor(options: LoggerOptions) {
    this.level = options.level;
    this.stream = options.stream ?? process.stderr;
    this.paint = new chalk.Instance({ level: options.colors === false ? 0 : chalk.level });
  }

  isEnabled(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.level];
  }

  debug(message: string): void {
    this.log("debug", message);
  }

  info(message: string): void {
    this.log("info", message);
  }

  warn(message: string): void {
    this.log("warn", message);
  }

  error(message: string): void {
    this.log("error", message);
  }

  critical(message: string): void {
    this.log("critical", message);
  }

  log(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) return;
    const label = this.colorize(level, LABELS[level].padEnd(8));
    this.stream.write(`${this.paint.dim(timestamp(new Date()))} ${label} ${message}\n`);
  }

  private colorize(level: LogLevel, text: string): string {
    switch (level) {
      case "debug":
        return this.paint.gray(text);
      case "info":
        return this.paint.blue(text);
      case "warn":
        return this.paint.yellow(text);
      case "error":
        return this.paint.red(text);
      case "critical":
        return this.paint.bold.red(text);
    }
  }
}

let current = new Logger({ level: "info" });

/**
 * Replace the process-wide logger. Entry points call this once, before
 * doing any work.
 */
export function configureLogging(options: LoggerOptions): Logger {
  current = new Logger(options);
  return current;
}

export function getLogger(): Logger {
  return current;
}

function timestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
