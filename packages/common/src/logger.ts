import chalk from "chalk";

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

type MessageLevel = Exclude<LogLevel, "silent">;

const LEVEL_RANK: Readonly<Record<MessageLevel, number>> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export interface Logger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

const noop = (): void => {};

export function createSilentLogger(): Logger {
  return { error: noop, warn: noop, info: noop, debug: noop };
}

function format(level: MessageLevel, message: string): string {
  const line = `[codeviz] ${level.toUpperCase()} ${message}`;
  switch (level) {
    case "error":
      return chalk.red(line);
    case "warn":
      return chalk.yellow(line);
    case "debug":
      return chalk.gray(line);
    default:
      return line;
  }
}

/**
 * Console logger filtered by level. Errors and warnings go to stderr, the
 * rest to stdout.
 */
export function createLogger(level: LogLevel): Logger {
  if (level === "silent") {
    return createSilentLogger();
  }

  const enabled = (messageLevel: MessageLevel): boolean =>
    LEVEL_RANK[messageLevel] <= LEVEL_RANK[level];

  return {
    error: (message) => {
      if (enabled("error")) console.error(format("error", message));
    },
    warn: (message) => {
      if (enabled("warn")) console.warn(format("warn", message));
    },
    info: (message) => {
      if (enabled("info")) console.log(format("info", message));
    },
    debug: (message) => {
      if (enabled("debug")) console.log(format("debug", message));
    },
  };
}

const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug"];

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "warn"): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

/**
 * Log level from the environment: CODEVIZ_DEBUG forces debug output,
 * otherwise CODEVIZ_LOG_LEVEL, otherwise "warn".
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (env.CODEVIZ_DEBUG && env.CODEVIZ_DEBUG !== "0") {
    return "debug";
  }
  return parseLogLevel(env.CODEVIZ_LOG_LEVEL);
}
