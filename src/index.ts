export * from "./client/index.js";
export * from "./config/index.js";
export * from "./http/index.js";
export * from "./status/index.js";
export * from "./trust/index.js";
export { createLogger, noopLogger } from "./logging/logger.js";
export type { LogLevel, Logger } from "./logging/logger.js";
export { resolveBranchRef, resolveRevision } from "./git/revision.js";
