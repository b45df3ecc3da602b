/** Host-facing log sink. Pipeline internals use debug channels instead. */
export interface Logger {
  log(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const nullLogger: Logger = {
  log: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/** Logger that prefixes every line, e.g. `[typecheck] ...`. */
export function prefixedLogger(prefix: string, target: Logger = console): Logger {
  return {
    log: (m) => target.log(`[${prefix}] ${m}`),
    info: (m) => target.info(`[${prefix}] ${m}`),
    warn: (m) => target.warn(`[${prefix}] ${m}`),
    error: (m) => target.error(`[${prefix}] ${m}`),
  };
}
