import pino, { type Logger } from "pino";

export type { Logger };

export interface LoggerOptions {
  level: pino.Level;
  /** Also append log lines to this file */
  file?: string;
}

/**
 * Create the process logger. Writes JSON lines to stdout and, when a file is
 * configured, to that file as well.
 */
export function createLogger(options: LoggerOptions): Logger {
  const streams: pino.StreamEntry[] = [{ level: options.level, stream: process.stdout }];

  if (options.file) {
    streams.push({
      level: options.level,
      stream: pino.destination({ dest: options.file, mkdir: true, sync: false }),
    });
  }

  return pino(
    {
      level: options.level,
      base: { app: "port-hunter" },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.multistream(streams)
  );
}
