/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { v4 as uuidv4 } from "uuid";
import { logger, type ErrorContext } from "./logger.js";

/**
 * Base error class for all layer-migrate errors
 * Carries a stable code, structured context and the underlying cause
 */
export abstract class MigrationError extends Error {
  public readonly timestamp: Date;
  public readonly errorId: string;
  public readonly code: string;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor(
    message: string,
    code: string,
    context?: ErrorContext,
    cause?: Error,
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
    this.cause = cause;
    this.timestamp = new Date();
    this.errorId = `${code}-${uuidv4().slice(0, 8)}`;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }

    // The CLI reports fatal errors itself; the trail goes to debug
    logger.debug(`${this.name}: ${message}`, {
      ...this.context,
      errorId: this.errorId,
      errorCode: this.code,
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      errorId: this.errorId,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
            stack: this.cause.stack,
          }
        : undefined,
    };
  }
}

/**
 * Configuration loading or validation errors
 */
export class ConfigError extends MigrationError {
  public readonly filepath?: string;

  constructor(
    message: string,
    filepath?: string,
    cause?: Error,
    context?: ErrorContext,
  ) {
    super(
      message,
      "CONFIG_ERROR",
      {
        ...context,
        component: "Config",
        filePath: filepath,
      },
      cause,
    );
    this.filepath = filepath;
  }
}

/**
 * A target file is missing or unreadable
 */
export class FileReadError extends MigrationError {
  public readonly filePath?: string;

  constructor(
    message: string,
    filePath?: string,
    cause?: Error,
    context?: ErrorContext,
  ) {
    super(
      message,
      "FILE_READ_ERROR",
      {
        ...context,
        component: "FileSystem",
        filePath,
      },
      cause,
    );
    this.filePath = filePath;
  }
}

/**
 * Transformed content could not be persisted
 */
export class FileWriteError extends MigrationError {
  public readonly filePath?: string;
  public readonly reason?: string;

  constructor(
    message: string,
    filePath?: string,
    reason?: string,
    cause?: Error,
    context?: ErrorContext,
  ) {
    super(
      message,
      "FILE_WRITE_ERROR",
      {
        ...context,
        component: "FileSystem",
        filePath,
        reason,
      },
      cause,
    );
    this.filePath = filePath;
    this.reason = reason;
  }
}

/**
 * A rewrite rule or block template is malformed
 */
export class RuleDefinitionError extends MigrationError {
  public readonly ruleId?: string;

  constructor(
    message: string,
    ruleId?: string,
    cause?: Error,
    context?: ErrorContext,
  ) {
    super(
      message,
      "RULE_DEFINITION_ERROR",
      {
        ...context,
        component: "Rules",
        ruleId,
      },
      cause,
    );
    this.ruleId = ruleId;
  }
}

/**
 * CLI command execution errors
 */
export class CliError extends MigrationError {
  public readonly command?: string;
  public readonly suggestions?: string[];

  constructor(
    message: string,
    command?: string,
    suggestions?: string[],
    cause?: Error,
    context?: ErrorContext,
  ) {
    super(
      message,
      "CLI_ERROR",
      {
        ...context,
        component: "CLI",
        operation: command,
        suggestions: suggestions?.join("; "),
      },
      cause,
    );
    this.command = command;
    this.suggestions = suggestions;
  }
}

/**
 * Validation errors for user input
 */
export class ValidationError extends MigrationError {
  public readonly field?: string;
  public readonly value?: unknown;

  constructor(
    message: string,
    field?: string,
    value?: unknown,
    cause?: Error,
    context?: ErrorContext,
  ) {
    super(
      message,
      "VALIDATION_ERROR",
      {
        ...context,
        component: "Validation",
        field,
        value:
          typeof value === "object" ? JSON.stringify(value) : String(value),
      },
      cause,
    );
    this.field = field;
    this.value = value;
  }
}

class UnknownError extends MigrationError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, "UNKNOWN_ERROR", context, cause);
  }
}

/**
 * Utility functions for error handling
 */
export const ErrorUtils = {
  getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
      return error.message;
    }
    return String(error);
  },

  getErrorCode(error: unknown): string | undefined {
    if (error instanceof MigrationError) {
      return error.code;
    }
    return undefined;
  },

  /**
   * Node system error code (ENOENT, EACCES, ...) when present
   */
  getSystemErrorCode(error: unknown): string | undefined {
    if (
      error instanceof Error &&
      "code" in error &&
      typeof error.code === "string"
    ) {
      return error.code;
    }
    return undefined;
  },

  toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
  },

  /**
   * Wrap unknown errors in MigrationError
   */
  wrapUnknownError(
    error: unknown,
    operation: string,
    context?: ErrorContext,
  ): MigrationError {
    if (error instanceof MigrationError) {
      return error;
    }

    if (error instanceof Error) {
      return new UnknownError(
        `Unknown error in ${operation}: ${error.message}`,
        { ...context, operation },
        error,
      );
    }

    return new UnknownError(`Unknown error in ${operation}: ${String(error)}`, {
      ...context,
      operation,
    });
  },
};

/**
 * Error exit codes for CLI
 */
export const ErrorExitCodes = {
  SUCCESS: 0,
  GENERIC_ERROR: 1,
  CONFIG_ERROR: 2,
  FILE_ERROR: 3,
  VALIDATION_ERROR: 4,
  RULE_ERROR: 5,
  CLI_ERROR: 7,
} as const;

/**
 * Map error codes to exit codes
 */
export function getExitCode(errorCode: string): number {
  switch (errorCode) {
    case "CONFIG_ERROR":
      return ErrorExitCodes.CONFIG_ERROR;
    case "FILE_READ_ERROR":
    case "FILE_WRITE_ERROR":
      return ErrorExitCodes.FILE_ERROR;
    case "VALIDATION_ERROR":
      return ErrorExitCodes.VALIDATION_ERROR;
    case "RULE_DEFINITION_ERROR":
      return ErrorExitCodes.RULE_ERROR;
    case "CLI_ERROR":
      return ErrorExitCodes.CLI_ERROR;
    default:
      return ErrorExitCodes.GENERIC_ERROR;
  }
}
