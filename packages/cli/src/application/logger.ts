export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

type MessageLevel = Exclude<LogLevel, "silent">;

export const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug"];

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

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

export const createSilentLogger = (): Logger => ({
  error: noop,
  warn: noop,
  info: noop,
  debug: noop,
});

/** Writes `[commitscope] LEVEL message` lines at or above the configured level. */
export const createStderrLogger = (level: LogLevel, sink: LogSink = stderrSink): Logger => {
  if (level === "silent") {
    return createSilentLogger();
  }

  const threshold = logLevelRank[level];
  const emitter =
    (messageLevel: MessageLevel) =>
    (message: string): void => {
      if (logLevelRank[messageLevel] <= threshold) {
        sink(`[commitscope] ${messageLevel.toUpperCase()} ${message}`);
      }
    };

  return {
    error: emitter("error"),
    warn: emitter("warn"),
    info: emitter("info"),
    debug: emitter("debug"),
  };
};

export const parseLogLevel = (value: string | undefined): LogLevel =>
  LOG_LEVELS.find((level) => level === value) ?? "info";
