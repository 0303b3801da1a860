import pino from "pino";

export type LoggerOptions = {
  level?: string;
  pretty?: boolean;
  /** Write to this destination instead of stderr. */
  destination?: pino.DestinationStream;
};

/** Secret-bearing fields never written to logs. */
export const REDACT_PATHS = [
  "token",
  "*.token",
  "repoToken",
  "*.repoToken",
  "env.*_PASSWORD",
  "*.env.*_PASSWORD",
  "env.COVERALLS_REPO_TOKEN",
];

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === "test" ? "silent" : "info";
}

/**
 * Create a named logger. Logs go to stderr so stdout stays reserved for
 * command output (human or jsonl).
 */
export function createLogger(name: string, options: LoggerOptions = {}): pino.Logger {
  const base: pino.LoggerOptions = {
    name,
    level: options.level ?? defaultLevel(),
    redact: { paths: REDACT_PATHS, censor: "***" },
    formatters: {
      level(label) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  const pretty = options.pretty ?? process.env.LOG_PRETTY === "true";
  if (pretty && !options.destination) {
    return pino({
      ...base,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, destination: 2, translateTime: "SYS:standard", ignore: "pid,hostname" },
      },
    });
  }

  return pino(base, options.destination ?? pino.destination(2));
}

export type Logger = pino.Logger;
