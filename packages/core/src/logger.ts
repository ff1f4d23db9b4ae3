/**
 * Console logging with a `[valuekit]` prefix.
 *
 * `debug` output only appears in verbose mode; warnings and errors go to stderr.
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  readonly verbose: boolean;
}

export interface LoggerOptions {
  verbose?: boolean;
  /** Prefix tag, e.g. "valuekit cli" (default: "valuekit") */
  tag?: string;
  /** stdout sink (default: console.log) */
  out?: (line: string) => void;
  /** stderr sink (default: console.error) */
  err?: (line: string) => void;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;
  const prefix = `[${options.tag ?? "valuekit"}]`;
  const out = options.out ?? ((line: string) => console.log(line));
  const err = options.err ?? ((line: string) => console.error(line));

  return {
    verbose,
    debug(message) {
      if (verbose) out(`${prefix} ${message}`);
    },
    info(message) {
      out(`${prefix} ${message}`);
    },
    warn(message) {
      err(`${prefix} warning: ${message}`);
    },
    error(message) {
      err(`${prefix} error: ${message}`);
    },
  };
}

/** A logger that drops everything */
export const silentLogger: Logger = {
  verbose: false,
  debug() {},
  info() {},
  warn() {},
  error() {},
};
