import pc from "picocolors";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  debug?: boolean;
  prefix?: string;
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const prefix = opts.prefix ?? "[crs]";
  return {
    debug(message) {
      if (opts.debug) console.error(pc.dim(`${prefix} ${message}`));
    },
    info(message) {
      console.log(`${prefix} ${message}`);
    },
    warn(message) {
      console.warn(pc.yellow(`${prefix} ${message}`));
    },
    error(message) {
      console.error(pc.red(`${prefix} ${message}`));
    },
  };
}
