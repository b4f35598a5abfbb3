import type { Logger } from "../interfaces/logger.js";

/** Discards everything. Default wherever no logger is injected. */
export const noopLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
