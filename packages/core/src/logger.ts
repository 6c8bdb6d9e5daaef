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

export type LogSink = (line: string) => void;

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

const writeToStderr: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

export const formatLogLine = (messageLevel: MessageLevel, message: string): string =>
  `[commitlens] ${messageLevel.toUpperCase()} ${message}`;

export const createStderrLogger = (level: LogLevel, sink: LogSink = writeToStderr): Logger => {
  if (level === "silent") {
    return createSilentLogger();
  }

  const log =
    (messageLevel: MessageLevel) =>
    (message: string): void => {
      if (shouldLog(level, messageLevel)) {
        sink(formatLogLine(messageLevel, message));
      }
    };

  return {
    error: log("error"),
    warn: log("warn"),
    info: log("info"),
    debug: log("debug"),
  };
};

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

export const resolveLogLevelFromEnv = (): LogLevel => parseLogLevel(process.env["COMMITLENS_LOG_LEVEL"]);
