import pino from "pino";

export type LoggerOptions = {
  readonly level?: string;
  /** Also append JSON lines to this file. */
  readonly file?: string;
};

/**
 * Creates a configured pino logger instance for structured JSON output.
 *
 * - Returns log level as string label (not numeric) for readability
 * - ISO 8601 timestamps for structured log aggregation
 * - Level configurable via `LOG_LEVEL` env var, defaults to `info`
 * - stdout always; `LOG_FILE` (or `options.file`) adds a file destination
 */
export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const level = options.level ?? process.env["LOG_LEVEL"] ?? "info";
  const file = options.file ?? process.env["LOG_FILE"];

  const loggerOptions: pino.LoggerOptions = {
    name: "review-watch",
    level,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (!file) {
    return pino(loggerOptions);
  }

  return pino(
    loggerOptions,
    pino.multistream([
      { level: "trace", stream: pino.destination(1) },
      { level: "trace", stream: pino.destination({ dest: file, sync: true }) },
    ]),
  );
}
