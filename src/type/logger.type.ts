/**
 * Logger Interface
 *
 * Sink for problems the router notices but does not throw: failures absorbed
 * by a failure handler, and cursors handed to dispatch part-way consumed.
 * console satisfies it, as does any structured logger with error/warn.
 *
 * Silent until setLogger() is called.
 */
export interface Logger {
  error(msg: string, error?: Error): void;
  warn(msg: string): void;
}

const silent: Logger = {
  error: () => {},
  warn: () => {},
};

/** Module-level logger. Always callable. */
export const logger: Logger = { ...silent };

/** Route router diagnostics to `impl`; pass null to silence them again. */
export function setLogger(impl: Logger | null): void {
  const target = impl ?? silent;
  logger.error = target.error.bind(target);
  logger.warn = target.warn.bind(target);
}
