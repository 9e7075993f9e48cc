/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

// #region Main Library Exports

// Rewrite engine
export * from "./patternRuleSet.js";
export * from "./blockScanner.js";
export * from "./blockReplacer.js";
export * from "./rewriteEngine.js";
export * from "./templates.js";
export * from "./layerContract.js";
export * from "./rewriteDriver.js";
export type * from "./types/rewrite.js";

// Configuration and CLI
export * from "./config.js";
export { runCli, createCliLogger, readPackageVersion } from "./cli.js";

// Core Utilities
export { AtomicFileWriter } from "./atomicOps/AtomicFileWriter.js";
export {
  AtomicOperationError,
  type AtomicFileOptions,
  type AtomicOperationResult,
  type FileWriteOptions,
} from "./types/atomicOps.js";
export {
  Logger,
  LogLevel,
  createLogger,
  logger,
  parseLogLevel,
  type LoggerOptions,
  type ErrorContext,
} from "./logger.js";
export * from "./errors.js";

// #endregion
