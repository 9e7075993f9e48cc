/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { cosmiconfig } from "cosmiconfig";
import { dirname, isAbsolute, resolve } from "path";
import { z } from "zod";
import { ConfigError, ValidationError } from "./errors.js";
import { createLogger } from "./logger.js";
import type { EntityParameters, EntityTarget } from "./types/rewrite.js";

export { ConfigError };

export const CONFIG_MODULE_NAME = "layermigrate";

const identifier = (what: string) =>
  z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, `${what} must be an identifier`);

/**
 * Values substituted into the rule templates for one entity
 */
export const EntityParametersSchema = z.object({
  name: identifier("name").describe("Class name of the layer"),
  description: z
    .string()
    .min(1, "description must not be empty")
    .describe("Text returned by the description accessor"),
  priorityLabel: identifier("priorityLabel").describe(
    "LayerPriority member, e.g. postProcessing",
  ),
});

export const EntityTargetSchema = EntityParametersSchema.extend({
  filePath: z.string().min(1).describe("File to rewrite in place"),
});

/**
 * Configuration schema using Zod for validation
 */
export const MigrationConfigSchema = z.object({
  rootDir: z
    .string()
    .optional()
    .describe("Base directory for relative entity paths"),
  entities: z
    .array(EntityTargetSchema)
    .min(1, "at least one entity must be configured")
    .describe("Files to rewrite, processed in order"),

  dryRun: z
    .boolean()
    .default(false)
    .describe("Report what would change without writing"),
  atomicWrite: z
    .boolean()
    .default(true)
    .describe("Write through a temporary file and rename"),
  createBackup: z
    .boolean()
    .default(false)
    .describe("Keep a copy of each file before overwriting it"),

  verbose: z.boolean().default(false).describe("Enable verbose logging"),
  veryVerbose: z
    .boolean()
    .default(false)
    .describe("Enable very verbose logging"),
  quiet: z
    .boolean()
    .default(false)
    .describe("Quiet mode (only warnings and errors)"),
  logLevel: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal"])
    .optional()
    .describe("Set the minimum log level"),
  logFile: z.string().optional().describe("Write logs to file"),
  logFormat: z
    .enum(["human", "json", "csv"])
    .optional()
    .describe("Format for file logging"),
});

export type MigrationConfig = z.infer<typeof MigrationConfigSchema>;

/**
 * CLI arguments that map onto configuration
 */
export interface CliArguments {
  config?: string;
  dryRun?: boolean;
  backup?: boolean;
  atomic?: boolean;
  verbose?: boolean;
  veryVerbose?: boolean;
  quiet?: boolean;
  /** Checked against the schema once merged */
  logLevel?: string;
  logFile?: string;
  logFormat?: string;
}

export interface ConfigResult {
  config: MigrationConfig;
  filepath?: string;
  isEmpty?: boolean;
}

const configLogger = createLogger("Config");

function isRecord(item: unknown): item is Record<string, unknown> {
  return item !== null && typeof item === "object" && !Array.isArray(item);
}

/**
 * Convert CLI arguments to configuration format
 */
function normalizeCliArguments(args: CliArguments): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  if (args.dryRun !== undefined) config.dryRun = args.dryRun;
  if (args.backup !== undefined) config.createBackup = args.backup;
  if (args.atomic !== undefined) config.atomicWrite = args.atomic;
  if (args.verbose !== undefined) config.verbose = args.verbose;
  if (args.veryVerbose !== undefined) config.veryVerbose = args.veryVerbose;
  if (args.quiet !== undefined) config.quiet = args.quiet;
  if (args.logLevel !== undefined) config.logLevel = args.logLevel;
  if (args.logFile !== undefined) config.logFile = args.logFile;
  if (args.logFormat !== undefined) config.logFormat = args.logFormat;

  return config;
}

/**
 * Validate configuration using Zod schema
 */
export function validateConfig(
  config: unknown,
  filepath?: string,
): MigrationConfig {
  const parsed = MigrationConfigSchema.safeParse(config);
  if (parsed.success) {
    return parsed.data;
  }

  const issues = parsed.error.issues
    .map((issue) => `  - ${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("\n");

  throw new ConfigError(
    `Invalid configuration${filepath ? ` in ${filepath}` : ""}:\n${issues}`,
    filepath,
    parsed.error,
    { operation: "validateConfig", issueCount: parsed.error.issues.length },
  );
}

/**
 * Validate one entity's template parameters
 */
export function parseEntityParameters(params: unknown): EntityParameters {
  const parsed = EntityParametersSchema.safeParse(params);
  if (parsed.success) {
    return parsed.data;
  }

  const [issue] = parsed.error.issues;
  const field = issue ? issue.path.join(".") : undefined;
  throw new ValidationError(
    `Invalid entity parameters: ${issue ? `${field}: ${issue.message}` : "unknown issue"}`,
    field,
    params,
    parsed.error,
  );
}

/**
 * Load configuration from a file using cosmiconfig
 */
async function loadConfigFromFile(
  searchFrom: string,
  configFile?: string,
): Promise<{
  config: Record<string, unknown>;
  filepath?: string;
  isEmpty?: boolean;
}> {
  configLogger.debug("Loading configuration from file", {
    searchFrom,
    configFile,
    operation: "loadConfigFromFile",
  });

  const explorer = cosmiconfig(CONFIG_MODULE_NAME);
  const configPath = configFile ? resolve(searchFrom, configFile) : undefined;

  let result;
  try {
    result = configPath
      ? await explorer.load(configPath)
      : await explorer.search(searchFrom);
  } catch (error) {
    throw new ConfigError(
      `Failed to load configuration${configPath ? ` from ${configPath}` : ""}`,
      configPath,
      error instanceof Error ? error : undefined,
      { operation: "loadConfigFromFile", searchFrom },
    );
  }

  if (!result) {
    configLogger.info("No configuration file found");
    return { config: {} };
  }

  const loaded: unknown = result.config;
  if (loaded !== undefined && loaded !== null && !isRecord(loaded)) {
    throw new ConfigError(
      `Configuration in ${result.filepath} must be an object`,
      result.filepath,
    );
  }

  configLogger.debug("Configuration file loaded", {
    filepath: result.filepath,
    isEmpty: result.isEmpty,
  });

  return {
    config: isRecord(loaded) ? loaded : {},
    filepath: result.filepath,
    isEmpty: result.isEmpty,
  };
}

/**
 * Load configuration with CLI args support; CLI values win over the file
 */
export async function loadConfig(
  cliArgs: CliArguments = {},
  searchFrom: string = process.cwd(),
): Promise<ConfigResult> {
  const { config: fileConfig, filepath, isEmpty } = await loadConfigFromFile(
    searchFrom,
    cliArgs.config,
  );

  const merged = { ...fileConfig, ...normalizeCliArguments(cliArgs) };
  const config = validateConfig(merged, filepath);

  return { config, filepath, isEmpty };
}

/**
 * Entities with absolute file paths. Relative paths resolve against
 * `rootDir` (itself relative to the config file), else the config file's
 * directory, else `cwd`.
 */
export function resolveEntities(
  result: ConfigResult,
  cwd: string = process.cwd(),
): EntityTarget[] {
  const configDir = result.filepath ? dirname(result.filepath) : cwd;
  const base = result.config.rootDir
    ? resolve(configDir, result.config.rootDir)
    : configDir;

  return result.config.entities.map((entity) => ({
    ...entity,
    filePath: isAbsolute(entity.filePath)
      ? entity.filePath
      : resolve(base, entity.filePath),
  }));
}

/**
 * Keep only the named entities, in configuration order
 */
export function selectEntities(
  entities: EntityTarget[],
  names?: string[],
): EntityTarget[] {
  if (!names || names.length === 0) {
    return entities;
  }

  const known = new Set(entities.map((entity) => entity.name));
  const unknown = names.filter((name) => !known.has(name));
  if (unknown.length > 0) {
    throw new ValidationError(
      `Unknown entity: ${unknown.join(", ")} (configured: ${[...known].join(", ")})`,
      "entity",
      unknown,
    );
  }

  const wanted = new Set(names);
  return entities.filter((entity) => wanted.has(entity.name));
}

/**
 * Sample `.layermigraterc.json` content
 */
export function createSampleConfig(): string {
  const sample = {
    entities: [
      {
        filePath: "lib/src/layers/post_processing_layer.dart",
        name: "PostProcessingLayer",
        description:
          "Post-processing layer: final text formatting, capitalization, punctuation, and quality assessment",
        priorityLabel: "postProcessing",
      },
      {
        filePath: "lib/src/layers/word_order_layer.dart",
        name: "WordOrderLayer",
        description:
          "Word order layer: reorders words according to target language syntax (SVO, SOV, VSO, etc.)",
        priorityLabel: "wordOrder",
      },
    ],
    dryRun: false,
    atomicWrite: true,
    createBackup: false,
  };

  return `${JSON.stringify(sample, null, 2)}\n`;
}
