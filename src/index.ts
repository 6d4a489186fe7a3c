// Errors
export {
  SandboxError,
  InvalidPathError,
  PathEscapesRootError,
  SandboxIoError,
  NotADirectoryError,
  InvalidArgumentError,
} from "./errors.js";
export type { SandboxErrorKind } from "./errors.js";

// Result
export { ok, err, unwrap } from "./result.js";
export type { Result } from "./result.js";

// Config
export { parseSandboxOptions, sandboxOptionsSchema } from "./config.js";
export type { SandboxOptions, ResolvedSandboxOptions, SymlinkMode } from "./config.js";

// Path validation
export {
  validatePath,
  climbsAboveRoot,
  isWithinRoot,
  joinUnderRoot,
  normalizeLexical,
  canonicalizeWeakly,
} from "./path/validate.js";

// Storage
export type { FileStats, SandboxedStorage, Timestamp } from "./storage/index.js";
export { FileSystemSandbox } from "./storage/index.js";

// Logging
export { createLogger, defaultLogger, parseLogLevel } from "./logging/logger.js";
export type { LoggerOptions } from "./logging/logger.js";
