/**
 * Minimal tagged logger. Lines are written to the console as "[Tag] message".
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string, context?: Readonly<Record<string, unknown>>): void;
  info(message: string, context?: Readonly<Record<string, unknown>>): void;
  warn(message: string, context?: Readonly<Record<string, unknown>>): void;
  error(message: string, context?: Readonly<Record<string, unknown>>): void;
  /** Returns a logger whose tag is "<parent>:<tag>". */
  child(tag: string): Logger;
}

export interface ConsoleLoggerOptions {
  /** Default: "info" */
  readonly level?: LogLevel;
  /** Default: "VoiceStudio" */
  readonly tag?: string;
  /** Defaults to the global console */
  readonly sink?: Pick<Console, "debug" | "info" | "warn" | "error">;
}

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

type EmitLevel = Exclude<LogLevel, "silent">;

class ConsoleLogger implements Logger {
  constructor(
    private readonly level: LogLevel,
    private readonly tag: string,
    private readonly sink: Pick<Console, "debug" | "info" | "warn" | "error">
  ) {}

  debug(message: string, context?: Readonly<Record<string, unknown>>): void {
    this.emit("debug", message, context);
  }

  info(message: string, context?: Readonly<Record<string, unknown>>): void {
    this.emit("info", message, context);
  }

  warn(message: string, context?: Readonly<Record<string, unknown>>): void {
    this.emit("warn", message, context);
  }

  error(message: string, context?: Readonly<Record<string, unknown>>): void {
    this.emit("error", message, context);
  }

  child(tag: string): Logger {
    return new ConsoleLogger(this.level, `${this.tag}:${tag}`, this.sink);
  }

  private emit(
    level: EmitLevel,
    message: string,
    context: Readonly<Record<string, unknown>> | undefined
  ): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) {
      return;
    }
    const line = `[${this.tag}] ${message}`;
    if (context && Object.keys(context).length > 0) {
      this.sink[level](line, context);
    } else {
      this.sink[level](line);
    }
  }
}

export function createConsoleLogger(options?: Readonly<ConsoleLoggerOptions>): Logger {
  return new ConsoleLogger(
    options?.level ?? "info",
    options?.tag ?? "VoiceStudio",
    options?.sink ?? console
  );
}

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  child: () => silentLogger,
};
