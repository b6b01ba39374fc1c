/***
 * Logger — timestamped, leveled line logger.
 *
 * Lines look like `[2024-01-01T00:00:00.000Z] INFO message` and go to
 * stderr unless another writer is given, keeping stdout for the report.
 *
 ***/

export enum LOG_LEVEL {
  SILENT = 0,
  ERROR = 1,
  INFO = 2,
  DEBUG = 3,
}

export interface Logger {
  readonly level: LOG_LEVEL;
  error(message: string, error?: unknown): void;
  info(message: string): void;
  debug(message: string): void;
}

export type LineWriter = (line: string) => void;

const stderr_writer: LineWriter = (line) => {
  process.stderr.write(`${line}\n`);
};

export function describe_error(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error ?? "");
}

export function create_logger(
  level: LOG_LEVEL = LOG_LEVEL.INFO,
  write: LineWriter = stderr_writer,
  now: () => Date = () => new Date(),
): Logger {
  const emit = (at: LOG_LEVEL, message: string): void => {
    if (at > level) return;
    write(`[${now().toISOString()}] ${LOG_LEVEL[at]} ${message}`);
  };

  return {
    level,
    error(message, error) {
      const detail = error === undefined ? "" : describe_error(error);
      emit(LOG_LEVEL.ERROR, detail ? `${message}: ${detail}` : message);
    },
    info(message) {
      emit(LOG_LEVEL.INFO, message);
    },
    debug(message) {
      emit(LOG_LEVEL.DEBUG, message);
    },
  };
}
