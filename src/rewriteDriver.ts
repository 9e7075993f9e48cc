/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

/**
 * @fileoverview Loads each target file, runs the rewrite engine over it and
 * writes the result back in place. Entities are processed one at a time.
 * @module rewriteDriver
 */

import { readFile } from "fs/promises";
import { AtomicFileWriter } from "./atomicOps/AtomicFileWriter.js";
import { parseEntityParameters, selectEntities } from "./config.js";
import { ErrorUtils, FileReadError, FileWriteError } from "./errors.js";
import { createLayerContractEngine } from "./layerContract.js";
import { createLogger, type Logger } from "./logger.js";
import type { RewriteEngine } from "./rewriteEngine.js";
import type {
  BlockOutcome,
  EntityParameters,
  EntityTarget,
  RuleApplication,
} from "./types/rewrite.js";

export type FileRewriteStatus = "rewritten" | "unchanged" | "dry-run";

export interface FileRewriteResult {
  filePath: string;
  entity: string;
  status: FileRewriteStatus;
  /** Whether the rewritten text differs from what was read */
  changed: boolean;
  rules: RuleApplication[];
  block: {
    id: string;
    outcome: BlockOutcome;
    candidates: number;
  };
  bytesWritten: number;
  backupPath?: string;
  duration: number;
}

export interface RunSummary {
  results: FileRewriteResult[];
  processed: number;
  rewritten: number;
  unchanged: number;
  /** Entities whose text would change (dry run) or did change */
  pending: number;
  duration: number;
}

export interface RewriteDriverOptions {
  engine?: RewriteEngine;
  writer?: AtomicFileWriter;
  logger?: Logger;
  dryRun?: boolean;
  atomicWrite?: boolean;
  createBackup?: boolean;
}

export interface RunAllOptions {
  /** Restrict the run to these entity names */
  only?: string[];
}

export class RewriteDriver {
  private readonly engine: RewriteEngine;
  private readonly writer: AtomicFileWriter;
  private readonly logger: Logger;
  private readonly dryRun: boolean;

  constructor(options: RewriteDriverOptions = {}) {
    this.engine = options.engine ?? createLayerContractEngine();
    this.writer =
      options.writer ??
      new AtomicFileWriter({
        atomic: options.atomicWrite ?? true,
        createBackup: options.createBackup ?? false,
      });
    this.logger = options.logger ?? createLogger("RewriteDriver");
    this.dryRun = options.dryRun ?? false;
  }

  /**
   * Rewrites one file for one entity. Read and write failures are fatal.
   */
  async run(
    filePath: string,
    params: EntityParameters,
  ): Promise<FileRewriteResult> {
    const startTime = Date.now();
    const entity = parseEntityParameters(params);

    this.logger.info(`Fixing ${filePath}...`, { entity: entity.name });

    const original = await this.readSource(filePath);
    this.logger.fileOperation("read", filePath, {
      size: Buffer.byteLength(original, "utf8"),
    });

    const report = this.engine.rewrite(original, entity);

    for (const application of report.rules) {
      this.logger.debug(
        `${application.ruleId}: ${application.matchCount} match(es)`,
        { filePath, entity: entity.name },
      );
    }

    if (report.block.candidates > 1) {
      this.logger.warn(
        `Found ${report.block.candidates} candidates for ${report.block.blockId}; only the first was processed`,
        { filePath, entity: entity.name },
      );
    } else if (report.block.outcome !== "replaced") {
      this.logger.debug(`${report.block.blockId}: ${report.block.outcome}`, {
        filePath,
        entity: entity.name,
      });
    }

    const result: FileRewriteResult = {
      filePath,
      entity: entity.name,
      status: "unchanged",
      changed: report.changed,
      rules: report.rules,
      block: {
        id: report.block.blockId,
        outcome: report.block.outcome,
        candidates: report.block.candidates,
      },
      bytesWritten: 0,
      duration: 0,
    };

    if (this.dryRun) {
      result.status = "dry-run";
      this.logger.info(
        `${report.changed ? "Would fix" : "Already up to date"} ${filePath}`,
        { entity: entity.name },
      );
    } else if (!report.changed) {
      this.logger.info(`No changes needed for ${filePath}`, {
        entity: entity.name,
      });
    } else {
      const written = await this.writer.writeFile(filePath, report.text);
      if (!written.success) {
        throw new FileWriteError(
          `Failed to write ${filePath}: ${written.error?.message ?? "unknown error"}`,
          filePath,
          written.error?.code,
          undefined,
          { operation: "run", entity: entity.name },
        );
      }

      result.status = "rewritten";
      result.bytesWritten = written.bytesProcessed;
      result.backupPath = written.metadata.backupPath;
      this.logger.fileOperation("write", filePath, {
        size: written.bytesProcessed,
        processingTime: written.duration,
      });
      this.logger.info(`Fixed ${filePath}`, { entity: entity.name });
    }

    result.duration = Date.now() - startTime;
    return result;
  }

  /**
   * Processes entities in order and stops at the first failure
   */
  async runAll(
    entities: EntityTarget[],
    options: RunAllOptions = {},
  ): Promise<RunSummary> {
    const startTime = Date.now();
    const selected = selectEntities(entities, options.only);
    const results: FileRewriteResult[] = [];

    this.logger.startProgress("entities", {
      total: selected.length,
      label: "Rewriting layers",
    });

    for (const [index, target] of selected.entries()) {
      const { filePath, ...params } = target;
      results.push(await this.run(filePath, params));
      this.logger.updateProgress("entities", index + 1, target.name);
    }

    const summary: RunSummary = {
      results,
      processed: results.length,
      rewritten: results.filter((r) => r.status === "rewritten").length,
      unchanged: results.filter((r) => !r.changed).length,
      pending: results.filter((r) => r.changed).length,
      duration: Date.now() - startTime,
    };

    this.logger.completeProgress(
      "entities",
      `${summary.processed} processed, ${summary.rewritten} rewritten`,
    );
    return summary;
  }

  private async readSource(filePath: string): Promise<string> {
    try {
      return await readFile(filePath, "utf8");
    } catch (error) {
      const code = ErrorUtils.getSystemErrorCode(error);
      throw new FileReadError(
        code === "ENOENT"
          ? `File not found: ${filePath}`
          : `Failed to read ${filePath}: ${ErrorUtils.getErrorMessage(error)}`,
        filePath,
        ErrorUtils.toError(error),
        { operation: "readSource", systemCode: code },
      );
    }
  }
}
