export interface Logger {
  info(message: string): void;
  error(message: string): void;
}

interface Writable {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  out?: Writable;
  err?: Writable;
  clock?: () => Date;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const out = options.out ?? process.stdout;
  const err = options.err ?? process.stderr;
  const clock = options.clock ?? (() => new Date());

  const line = (level: string, message: string) =>
    `${clock().toISOString()} [${level}] ${message}\n`;

  return {
    info: (message) => {
      out.write(line('INFO', message));
    },
    error: (message) => {
      err.write(line('ERROR', message));
    },
  };
}

/** Swallows everything. Handy for tests that only care about results. */
export const silentLogger: Logger = {
  info: () => undefined,
  error: () => undefined,
};
