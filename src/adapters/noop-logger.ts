import type { Logger } from "../interfaces/logger.js";

/** Logger that discards everything; the default wherever no logger is injected. */
export const noopLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
