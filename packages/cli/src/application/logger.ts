import type { OutputSink } from "@blameweight/reporter";

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug"];

type MessageLevel = Exclude<LogLevel, "silent">;

const logLevelRank: Readonly<Record<MessageLevel, number>> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export type Logger = {
  error: (message: string) => void;
  warn: (message: string) => void;
  info: (message: string) => void;
  debug: (message: string) => void;
};

const noop = (): void => {};

export const createSilentLogger = (): Logger => ({
  error: noop,
  warn: noop,
  info: noop,
  debug: noop,
});

const shouldLog = (configuredLevel: LogLevel, messageLevel: MessageLevel): boolean => {
  if (configuredLevel === "silent") {
    return false;
  }

  return logLevelRank[messageLevel] <= logLevelRank[configuredLevel];
};

export const createLogger = (level: LogLevel, sink: OutputSink): Logger => {
  if (level === "silent") {
    return createSilentLogger();
  }

  const forLevel =
    (messageLevel: MessageLevel) =>
    (message: string): void => {
      if (shouldLog(level, messageLevel)) {
        sink.write(`[blameweight] ${messageLevel.toUpperCase()} ${message}\n`);
      }
    };

  return {
    error: forLevel("error"),
    warn: forLevel("warn"),
    info: forLevel("info"),
    debug: forLevel("debug"),
  };
};

export const createStderrLogger = (level: LogLevel): Logger => createLogger(level, process.stderr);

export const parseLogLevel = (value: string | undefined): LogLevel => {
  switch (value) {
    case "silent":
    case "error":
    case "warn":
    case "info":
    case "debug":
      return value;
    default:
      return "info";
  }
};
