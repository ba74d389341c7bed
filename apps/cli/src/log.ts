export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export const processIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line)
};

export interface Logger {
  logError(msg: string, err?: unknown): void;
  /** Only written when verbose logging is on. */
  debug(msg: string): void;
}

export interface LoggerOptions {
  verbose: boolean;
  now?: () => Date;
}

export function createLogger(io: CliIo, opts: LoggerOptions): Logger {
  const now = opts.now ?? (() => new Date());
  const prefix = () => `[${now().toISOString()}] [wildhand]`;

  return {
    logError(msg, err) {
      const errStr = err instanceof Error ? err.message : String(err ?? "");
      io.err(`${prefix()} ERROR: ${msg}${errStr ? ` - ${errStr}` : ""}`);
    },
    debug(msg) {
      if (opts.verbose) io.err(`${prefix()} DEBUG: ${msg}`);
    }
  };
}
