/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { existsSync, readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import yargs from "yargs";
import {
  createSampleConfig,
  loadConfig,
  resolveEntities,
  type MigrationConfig,
} from "./config.js";
import {
  CliError,
  ErrorExitCodes,
  ErrorUtils,
  getExitCode,
} from "./errors.js";
import {
  Logger,
  LogLevel,
  parseLogLevel,
  type FileOutputOptions,
} from "./logger.js";
import { RewriteDriver, type RunSummary } from "./rewriteDriver.js";

export interface MigrateArguments {
  config?: string;
  dryRun?: boolean;
  entity?: string[];
  backup?: boolean;
  atomic?: boolean;
  verbose?: boolean;
  veryVerbose?: boolean;
  quiet?: boolean;
  logLevel?: string;
  logFile?: string;
  logFormat?: string;
  json?: boolean;
}

type MigrateMode = "run" | "check";

/**
 * Version from the nearest package.json above this module (source or dist)
 */
export function readPackageVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (let depth = 0; depth < 3; depth++) {
    const candidate = join(dir, "package.json");
    if (existsSync(candidate)) {
      const parsed: unknown = JSON.parse(readFileSync(candidate, "utf8"));
      if (
        parsed !== null &&
        typeof parsed === "object" &&
        "version" in parsed &&
        typeof parsed.version === "string"
      ) {
        return parsed.version;
      }
    }
    dir = dirname(dir);
  }
  return "0.0.0";
}

/**
 * CLI logger configured from the merged configuration
 */
export function createCliLogger(
  config: Pick<
    MigrationConfig,
    "verbose" | "veryVerbose" | "quiet" | "logLevel" | "logFile" | "logFormat"
  >,
  silent = false,
): Logger {
  let level: LogLevel = LogLevel.INFO;
  if (config.logLevel) {
    level = parseLogLevel(config.logLevel);
  } else if (config.veryVerbose) {
    level = LogLevel.TRACE;
  } else if (config.verbose) {
    level = LogLevel.DEBUG;
  } else if (config.quiet) {
    level = LogLevel.WARN;
  }

  let fileOutput: FileOutputOptions | undefined;
  if (config.logFile) {
    fileOutput = {
      filePath: config.logFile,
      format: config.logFormat ?? "human",
    };
  }

  return new Logger({
    level,
    verbose: config.verbose,
    veryVerbose: config.veryVerbose,
    quiet: config.quiet,
    silent,
    colorize: process.stdout.isTTY,
    timestamp: true,
    component: "CLI",
    fileOutput,
    enableProgressTracking: process.env.LAYER_MIGRATE_PROGRESS_TRACKING !== "false",
  });
}

function reportSummary(
  cliLogger: Logger,
  summary: RunSummary,
  mode: MigrateMode,
): void {
  for (const result of summary.results) {
    const applied = result.rules.filter((rule) => rule.matchCount > 0).length;
    cliLogger.info(
      `${result.entity}: ${result.status}, ${applied}/${result.rules.length} rules matched, block ${result.block.outcome}`,
      { filePath: result.filePath },
    );
  }

  if (mode === "check") {
    cliLogger.info(
      summary.pending === 0
        ? `All ${summary.processed} layer(s) are up to date`
        : `${summary.pending} of ${summary.processed} layer(s) need migration`,
    );
  } else {
    cliLogger.info(
      `Done: ${summary.rewritten} rewritten, ${summary.unchanged} unchanged`,
      { processingTime: summary.duration },
    );
  }
}

async function migrate(
  argv: MigrateArguments,
  mode: MigrateMode,
  cwd: string,
): Promise<number> {
  const loaded = await loadConfig(
    {
      config: argv.config,
      dryRun: argv.dryRun,
      backup: argv.backup,
      atomic: argv.atomic,
      verbose: argv.verbose,
      veryVerbose: argv.veryVerbose,
      quiet: argv.quiet,
      logLevel: argv.logLevel,
      logFile: argv.logFile,
      logFormat: argv.logFormat,
    },
    cwd,
  );
  const { config } = loaded;
  const cliLogger = createCliLogger(config, argv.json ?? false);

  try {
    if (loaded.filepath) {
      cliLogger.debug(`Using configuration from ${loaded.filepath}`);
    }

    const driver = new RewriteDriver({
      dryRun: mode === "check" || config.dryRun,
      atomicWrite: config.atomicWrite,
      createBackup: config.createBackup,
      logger: cliLogger.child("RewriteDriver"),
    });

    const summary = await driver.runAll(resolveEntities(loaded, cwd), {
      only: argv.entity,
    });

    if (argv.json) {
      console.log(JSON.stringify(summary, null, 2));
    } else {
      reportSummary(cliLogger, summary, mode);
    }

    return mode === "check" && summary.pending > 0
      ? ErrorExitCodes.GENERIC_ERROR
      : ErrorExitCodes.SUCCESS;
  } finally {
    cliLogger.cleanup();
  }
}

/**
 * Parses `args` and runs the selected command. Resolves to the exit code.
 */
export async function runCli(
  args: string[],
  cwd: string = process.cwd(),
): Promise<number> {
  let exitCode: number = ErrorExitCodes.SUCCESS;
  const baseLogger = new Logger({
    level: parseLogLevel(process.env.LAYER_MIGRATE_LOG_LEVEL),
    colorize: process.stderr.isTTY,
    timestamp: false,
    component: "CLI",
  });

  const handle = async (
    argv: MigrateArguments,
    mode: MigrateMode,
  ): Promise<void> => {
    try {
      exitCode = await migrate(argv, mode, cwd);
    } catch (error) {
      const wrapped = ErrorUtils.wrapUnknownError(error, mode);
      baseLogger.error(wrapped.message, {
        errorCode: wrapped.code,
        errorId: wrapped.errorId,
      });
      exitCode = getExitCode(wrapped.code);
    }
  };

  try {
    await yargs(args)
      .scriptName("layer-migrate")
      .usage("Usage: $0 [command] [options]")
      .version(readPackageVersion())
      .alias("version", "v")
      .option("config", {
        alias: "c",
        type: "string",
        description: "Path to configuration file",
      })
      .option("dry-run", {
        alias: "d",
        type: "boolean",
        description: "Report what would change without writing files",
      })
      .option("entity", {
        alias: "e",
        type: "string",
        array: true,
        description: "Only process the named layer (repeatable)",
      })
      .option("backup", {
        type: "boolean",
        description: "Keep a copy of each file before overwriting it",
      })
      .option("atomic", {
        type: "boolean",
        description: "Write through a temp file and rename (--no-atomic to disable)",
      })
      .option("verbose", {
        type: "boolean",
        description: "Enable verbose logging (shows debug messages)",
      })
      .option("very-verbose", {
        type: "boolean",
        description:
          "Enable very verbose logging (shows trace messages and file operations)",
      })
      .option("quiet", {
        type: "boolean",
        description: "Quiet mode (only warnings and errors)",
      })
      .option("log-level", {
        type: "string",
        choices: ["trace", "debug", "info", "warn", "error", "fatal"],
        description: "Set the minimum log level",
      })
      .option("log-file", {
        type: "string",
        description: "Write logs to file",
      })
      .option("log-format", {
        type: "string",
        choices: ["human", "json", "csv"],
        description: "Format for file logging (default: human)",
      })
      .option("json", {
        type: "boolean",
        description: "Print the run summary as JSON",
      })
      .command(
        ["run", "$0"],
        "Rewrite every configured layer file",
        (cmd) => cmd,
        (argv) => handle(argv, "run"),
      )
      .command(
        "check",
        "Exit with code 1 if any configured layer still needs migration",
        (cmd) => cmd,
        (argv) => handle(argv, "check"),
      )
      .command("init-config", "Print a sample configuration file", (cmd) => cmd, () => {
        baseLogger.info("Sample configuration file content:");
        console.log(createSampleConfig());
        baseLogger.info("Save this as .layermigraterc.json in your project root.");
      })
      .strict()
      .help()
      .alias("help", "h")
      .exitProcess(false)
      .fail((message, error) => {
        throw error ?? new CliError(message, "parse", ["Run with --help for usage"]);
      })
      .parseAsync();
  } catch (error) {
    const wrapped =
      error instanceof CliError
        ? error
        : new CliError(ErrorUtils.getErrorMessage(error), "parse");
    baseLogger.error(wrapped.message, { errorCode: wrapped.code });
    return getExitCode(wrapped.code);
  }

  return exitCode;
}
