import type { Logger } from "@wirekit/generator";

export interface ConsoleLoggerOptions {
  /** Print `info` and `log` lines. Warnings and errors always print. */
  verbose?: boolean;
  out?: (line: string) => void;
  err?: (line: string) => void;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const out = options.out ?? ((line: string) => console.log(line));
  const err = options.err ?? ((line: string) => console.error(line));
  const verbose = options.verbose ?? false;
  return {
    log: (message) => {
      if (verbose) out(message);
    },
    info: (message) => {
      if (verbose) out(message);
    },
    warn: (message) => err(message),
    error: (message) => err(message),
  };
}
