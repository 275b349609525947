import type { Logger } from './types';

/** Discards everything; for tests and callers that opt out of logging. */
export const noopLogger: Logger = {
  log: () => {},
  trace: () => {},
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => noopLogger,
};
