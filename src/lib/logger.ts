export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(log: string, ...args: unknown[]): void;
  info(log: string, ...args: unknown[]): void;
  warn(log: string, ...args: unknown[]): void;
  error(log: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

// AIDEV-NOTE: Everything goes to stderr so stdout stays reserved for command output
export class ConsoleLogger implements Logger {
  constructor(private readonly minLevel: LogLevel = "debug") {}

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }

  debug(log: string, ...args: unknown[]) {
    if (this.enabled("debug")) console.error(`[debug] ${log}`, ...args);
  }
  info(log: string, ...args: unknown[]) {
    if (this.enabled("info")) console.error(`[info] ${log}`, ...args);
  }
  warn(log: string, ...args: unknown[]) {
    if (this.enabled("warn")) console.error(`[warn] ${log}`, ...args);
  }
  error(log: string, ...args: unknown[]) {
    if (this.enabled("error")) console.error(`[error] ${log}`, ...args);
  }
}

export class NullLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

function createLogger(env: NodeJS.ProcessEnv): Logger {
  if (env.DEBUG !== "true") {
    return new NullLogger();
  }
  const level = env.PHAB_STACK_LOG_LEVEL?.toLowerCase() ?? "debug";
  return new ConsoleLogger(isLogLevel(level) ? level : "debug");
}

export const logger = createLogger(process.env);
