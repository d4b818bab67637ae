export const overlayLogLevels = ["silent", "error", "warn", "info"] as const;

export type overlayLogLevel = (typeof overlayLogLevels)[number];

export type overlayLogger = {
  info: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
  error: (message: string, ...details: unknown[]) => void;
};

type logSink = Pick<Console, "log" | "warn" | "error">;

const levelPriority: Record<overlayLogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3
};

const LOG_PREFIX = "[overlay]";

export const createOverlayLogger = (
  level: overlayLogLevel,
  sink: logSink = console
): overlayLogger => {
  const allows = (messageLevel: Exclude<overlayLogLevel, "silent">): boolean => {
    return levelPriority[messageLevel] <= levelPriority[level];
  };

  return {
    info: (message, ...details): void => {
      if (allows("info")) {
        sink.log(`${LOG_PREFIX} ${message}`, ...details);
      }
    },
    warn: (message, ...details): void => {
      if (allows("warn")) {
        sink.warn(`${LOG_PREFIX} ${message}`, ...details);
      }
    },
    error: (message, ...details): void => {
      if (allows("error")) {
        sink.error(`${LOG_PREFIX} ${message}`, ...details);
      }
    }
  };
};
