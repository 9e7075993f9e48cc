/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import chalk from "chalk";
import { createWriteStream, existsSync, mkdirSync, type WriteStream } from "fs";
import { dirname } from "path";

/**
 * Log levels following Log4j standard
 */
export const LogLevel = {
  TRACE: 0,
  DEBUG: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  FATAL: 5,
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export type LogLevelName = keyof typeof LogLevel;

export const LogLevelNames: Record<LogLevel, LogLevelName> = {
  [LogLevel.TRACE]: "TRACE",
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.INFO]: "INFO",
  [LogLevel.WARN]: "WARN",
  [LogLevel.ERROR]: "ERROR",
  [LogLevel.FATAL]: "FATAL",
};

const LogLevelColors: Record<LogLevelName, (text: string) => string> = {
  TRACE: chalk.gray,
  DEBUG: chalk.cyan,
  INFO: chalk.blue,
  WARN: chalk.yellow,
  ERROR: chalk.red,
  FATAL: chalk.magenta,
};

export type FileLogFormat = "human" | "json" | "csv";

/**
 * File output options for logging. The file is opened in append mode.
 */
export interface FileOutputOptions {
  filePath: string;
  format?: FileLogFormat;
}

export interface ProgressOptions {
  total: number;
  current?: number;
  label?: string;
  showPercentage?: boolean;
}

export interface LoggerOptions {
  level?: LogLevel;
  verbose?: boolean;
  veryVerbose?: boolean;
  quiet?: boolean;
  silent?: boolean;
  outputFormat?: "human" | "json";
  colorize?: boolean;
  timestamp?: boolean;
  component?: string;
  fileOutput?: FileOutputOptions;
  enableProgressTracking?: boolean;
}

/**
 * Structured log entry for JSON output
 */
export interface LogEntry {
  level: LogLevelName;
  message: string;
  timestamp: string;
  component?: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string;
  };
}

/**
 * Context attached to a log line
 */
export interface ErrorContext {
  component?: string;
  operation?: string;
  filePath?: string;
  entity?: string;
  processingTime?: number;
  [key: string]: unknown;
}

function errorCodeOf(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Centralized logger for layer-migrate
 */
export class Logger {
  private level: LogLevel;
  private verbose: boolean;
  private veryVerbose: boolean;
  private quiet: boolean;
  private silent: boolean;
  private outputFormat: "human" | "json";
  private colorize: boolean;
  private timestamp: boolean;
  private component?: string;
  private fileOutput?: FileOutputOptions;
  private fileStream?: WriteStream;
  // Children write through the parent's stream; only the opener ends it
  private ownsFileStream = false;
  private enableProgressTracking: boolean;
  private progressStates: Map<string, ProgressOptions & { startTime: number }> =
    new Map();

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.verbose = options.verbose ?? false;
    this.veryVerbose = options.veryVerbose ?? false;
    this.quiet = options.quiet ?? false;
    this.silent = options.silent ?? false;
    this.outputFormat = options.outputFormat ?? "human";
    this.colorize = options.colorize ?? true;
    this.timestamp = options.timestamp ?? true;
    this.component = options.component;
    this.fileOutput = options.fileOutput;
    this.enableProgressTracking = options.enableProgressTracking ?? false;

    if (this.veryVerbose) {
      this.verbose = true;
      if (this.level > LogLevel.TRACE) {
        this.level = LogLevel.TRACE;
      }
    } else if (this.verbose && this.level > LogLevel.DEBUG) {
      this.level = LogLevel.DEBUG;
    }

    // Quiet mode overrides verbose
    if (this.quiet) {
      this.verbose = false;
      this.veryVerbose = false;
      if (this.level < LogLevel.WARN) {
        this.level = LogLevel.WARN;
      }
    }

    if (this.fileOutput) {
      this.initializeFileOutput();
    }
  }

  private initializeFileOutput(): void {
    if (!this.fileOutput) return;

    try {
      const dir = dirname(this.fileOutput.filePath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }

      this.fileStream = createWriteStream(this.fileOutput.filePath, {
        flags: "a",
      });
      this.ownsFileStream = true;

      this.fileStream.on("error", (error) => {
        console.error(`Logger file stream error: ${error.message}`);
        this.fileStream = undefined;
      });
    } catch (error) {
      console.error(
        `Failed to initialize file output: ${error instanceof Error ? error.message : String(error)}`,
      );
      this.fileStream = undefined;
    }
  }

  /**
   * Start progress tracking for an operation
   */
  startProgress(id: string, options: ProgressOptions): void {
    if (!this.enableProgressTracking) return;

    this.progressStates.set(id, {
      ...options,
      startTime: Date.now(),
    });

    if (this.verbose) {
      this.info(`Starting ${options.label ?? id} (0/${options.total})`);
    }
  }

  updateProgress(id: string, current: number, additionalInfo?: string): void {
    if (!this.enableProgressTracking) return;

    const progress = this.progressStates.get(id);
    if (!progress) return;

    progress.current = current;

    let message = `${progress.label ?? id}: ${current}/${progress.total}`;
    if (progress.showPercentage !== false && progress.total > 0) {
      message += ` (${Math.round((current / progress.total) * 100)}%)`;
    }
    if (additionalInfo) {
      message += ` - ${additionalInfo}`;
    }

    if (this.verbose) {
      this.debug(message);
    }
  }

  completeProgress(id: string, summary?: string): void {
    if (!this.enableProgressTracking) return;

    const progress = this.progressStates.get(id);
    if (!progress) return;

    const elapsed = Date.now() - progress.startTime;
    let message = `Completed ${progress.label ?? id} (${progress.total} items in ${elapsed}ms)`;
    if (summary) {
      message += ` - ${summary}`;
    }

    if (this.verbose) {
      this.info(message);
    }

    this.progressStates.delete(id);
  }

  /**
   * Log detailed file operation (very verbose only)
   */
  fileOperation(
    operation: string,
    filePath: string,
    details?: { size?: number; processingTime?: number; result?: string },
  ): void {
    if (!this.veryVerbose) return;

    let message = `${operation}: ${filePath}`;
    const context: ErrorContext = { operation, filePath };

    if (details?.size !== undefined) {
      message += ` (${details.size} bytes)`;
      context.fileSize = details.size;
    }

    if (details?.processingTime !== undefined) {
      message += ` - ${details.processingTime}ms`;
      context.processingTime = details.processingTime;
    }

    if (details?.result) {
      message += ` → ${details.result}`;
    }

    this.trace(message, context);
  }

  /**
   * Create a child logger with a different component tag
   */
  child(component: string, options: Partial<LoggerOptions> = {}): Logger {
    const { fileOutput, ...overrides } = options;
    const child = new Logger({
      level: this.level,
      verbose: this.verbose,
      veryVerbose: this.veryVerbose,
      quiet: this.quiet,
      silent: this.silent,
      outputFormat: this.outputFormat,
      colorize: this.colorize,
      timestamp: this.timestamp,
      component,
      fileOutput,
      enableProgressTracking: this.enableProgressTracking,
      ...overrides,
    });

    if (!fileOutput) {
      child.fileOutput = this.fileOutput;
      child.fileStream = this.fileStream;
    }

    return child;
  }

  private shouldLog(level: LogLevel): boolean {
    if (this.silent) return false;
    return level >= this.level;
  }

  private createLogEntry(
    level: LogLevel,
    message: string,
    context?: ErrorContext,
    error?: Error,
  ): LogEntry {
    const entry: LogEntry = {
      level: LogLevelNames[level],
      message,
      timestamp: new Date().toISOString(),
    };

    if (this.component) {
      entry.component = this.component;
    }

    if (context && Object.keys(context).length > 0) {
      entry.context = { ...context };
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
        code: errorCodeOf(error),
      };
    }

    return entry;
  }

  private formatHuman(entry: LogEntry, colorize: boolean): string {
    const levelName = entry.level.padEnd(5);
    const gray = (text: string): string => (colorize ? chalk.gray(text) : text);

    let output = "";

    if (this.timestamp) {
      output += gray(`[${entry.timestamp}] `);
    }

    output += colorize
      ? LogLevelColors[entry.level](`${levelName} `)
      : `${levelName} `;

    if (entry.component) {
      output += gray(`[${entry.component}] `);
    }

    output += entry.message;

    if (entry.context && Object.keys(entry.context).length > 0) {
      output += gray(` ${JSON.stringify(entry.context)}`);
    }

    if (entry.error) {
      output +=
        "\n" +
        (entry.error.stack ?? `${entry.error.name}: ${entry.error.message}`);
    }

    return output;
  }

  private formatCSV(entry: LogEntry): string {
    const quote = (value: string): string => `"${value.replace(/"/g, '""')}"`;
    const context = entry.context ? JSON.stringify(entry.context) : "";
    const error = entry.error
      ? `${entry.error.name}: ${entry.error.message}`
      : "";

    return [
      entry.timestamp,
      entry.level,
      entry.component ?? "",
      entry.message,
      context,
      error,
    ]
      .map(quote)
      .join(",");
  }

  private output(entry: LogEntry): void {
    // Errors go to stderr, everything else to stdout
    const formatted =
      this.outputFormat === "json"
        ? JSON.stringify(entry)
        : this.formatHuman(entry, this.colorize);

    if (entry.level === "ERROR" || entry.level === "FATAL") {
      console.error(formatted);
    } else {
      console.log(formatted);
    }

    if (
      this.fileStream &&
      !this.fileStream.destroyed &&
      !this.fileStream.writableEnded
    ) {
      switch (this.fileOutput?.format ?? "human") {
        case "json":
          this.fileStream.write(JSON.stringify(entry) + "\n");
          break;
        case "csv":
          this.fileStream.write(this.formatCSV(entry) + "\n");
          break;
        default:
          this.fileStream.write(this.formatHuman(entry, false) + "\n");
      }
    }
  }

  private log(
    level: LogLevel,
    message: string,
    context?: ErrorContext,
    error?: Error,
  ): void {
    if (!this.shouldLog(level)) return;

    this.output(this.createLogEntry(level, message, context, error));
  }

  trace(message: string, context?: ErrorContext): void {
    this.log(LogLevel.TRACE, message, context);
  }

  debug(message: string, context?: ErrorContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: ErrorContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: ErrorContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(messageOrError: string | Error, context?: ErrorContext): void {
    if (messageOrError instanceof Error) {
      this.log(LogLevel.ERROR, messageOrError.message, context, messageOrError);
    } else {
      this.log(LogLevel.ERROR, messageOrError, context);
    }
  }

  fatal(messageOrError: string | Error, context?: ErrorContext): void {
    if (messageOrError instanceof Error) {
      this.log(LogLevel.FATAL, messageOrError.message, context, messageOrError);
    } else {
      this.log(LogLevel.FATAL, messageOrError, context);
    }
  }

  timing(operation: string, duration: number, context?: ErrorContext): void {
    this.debug(`Operation "${operation}" completed in ${duration}ms`, {
      ...context,
      operation,
      processingTime: duration,
    });
  }

  /**
   * Close the file stream and drop progress state
   */
  cleanup(): void {
    if (this.fileStream && this.ownsFileStream) {
      this.fileStream.end();
    }
    this.fileStream = undefined;
    this.ownsFileStream = false;
    this.progressStates.clear();
  }

  getState(): {
    level: LogLevel;
    verbose: boolean;
    veryVerbose: boolean;
    quiet: boolean;
    silent: boolean;
    fileOutputEnabled: boolean;
    progressTrackingEnabled: boolean;
    activeProgressCount: number;
  } {
    return {
      level: this.level,
      verbose: this.verbose,
      veryVerbose: this.veryVerbose,
      quiet: this.quiet,
      silent: this.silent,
      fileOutputEnabled: this.fileOutput !== undefined,
      progressTrackingEnabled: this.enableProgressTracking,
      activeProgressCount: this.progressStates.size,
    };
  }
}

/**
 * Parse log level from string; unknown names fall back to INFO
 */
export function parseLogLevel(level?: string): LogLevel {
  if (!level) return LogLevel.INFO;

  switch (level.toUpperCase()) {
    case "TRACE":
      return LogLevel.TRACE;
    case "DEBUG":
      return LogLevel.DEBUG;
    case "INFO":
      return LogLevel.INFO;
    case "WARN":
      return LogLevel.WARN;
    case "ERROR":
      return LogLevel.ERROR;
    case "FATAL":
      return LogLevel.FATAL;
    default:
      return LogLevel.INFO;
  }
}

function parseFileLogFormat(format?: string): FileLogFormat {
  return format === "json" || format === "csv" ? format : "human";
}

function createFileOutputFromEnv(): FileOutputOptions | undefined {
  const filePath = process.env.LAYER_MIGRATE_LOG_FILE;
  if (!filePath) return undefined;

  return {
    filePath,
    format: parseFileLogFormat(process.env.LAYER_MIGRATE_LOG_FORMAT),
  };
}

/**
 * Default logger instance
 */
export const logger = new Logger({
  level: process.env.LAYER_MIGRATE_LOG_LEVEL
    ? parseLogLevel(process.env.LAYER_MIGRATE_LOG_LEVEL)
    : process.env.NODE_ENV === "development"
      ? LogLevel.DEBUG
      : LogLevel.INFO,
  verbose: process.env.LAYER_MIGRATE_VERBOSE === "true",
  quiet: process.env.LAYER_MIGRATE_QUIET === "true",
  colorize: process.stdout.isTTY,
  timestamp: true,
  fileOutput: createFileOutputFromEnv(),
  enableProgressTracking:
    process.env.LAYER_MIGRATE_PROGRESS_TRACKING !== "false",
});

/**
 * Create a logger with specific component context
 */
export function createLogger(
  component: string,
  options?: Partial<LoggerOptions>,
): Logger {
  return logger.child(component, options);
}
