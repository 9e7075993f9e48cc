/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

/**
 * @fileoverview In-place file replacement through write-file-atomic, with
 * an optional backup of the previous content
 * @module atomicOps/AtomicFileWriter
 */

import * as fs from "fs/promises";
import * as path from "path";
import { v4 as uuidv4 } from "uuid";
import writeFileAtomic from "write-file-atomic";

import {
  AtomicOperationError,
  type AtomicFileOptions,
  type AtomicOperationResult,
  type FileWriteOptions,
} from "../types/atomicOps.js";

const DEFAULT_OPTIONS: Required<AtomicFileOptions> = {
  atomic: true,
  createBackup: false,
};

class BackupError extends Error {
  constructor(message: string, cause: unknown) {
    super(message, { cause });
    this.name = "BackupError";
  }
}

/**
 * Replaces a file's content. A failed write never reports success and,
 * in atomic mode, leaves the original file untouched.
 */
export class AtomicFileWriter {
  private readonly options: Required<AtomicFileOptions>;

  constructor(options: AtomicFileOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  isAtomic(): boolean {
    return this.options.atomic;
  }

  async writeFile(
    filePath: string,
    content: string,
    options: FileWriteOptions = {},
  ): Promise<AtomicOperationResult> {
    const startTime = Date.now();
    const createBackup = options.createBackup ?? this.options.createBackup;
    const fsyncUsed = this.options.atomic;

    const result: AtomicOperationResult = {
      success: false,
      operation: "write",
      filePath,
      duration: 0,
      bytesProcessed: 0,
      metadata: {
        startTime,
        endTime: 0,
        atomic: this.options.atomic,
        fsyncUsed,
        backupCreated: false,
      },
    };

    try {
      if (!filePath) {
        throw new Error("File path is required");
      }

      if (createBackup && (await this.fileExists(filePath))) {
        result.metadata.backupPath = await this.createBackup(filePath);
        result.metadata.backupCreated = true;
      }

      if (this.options.atomic) {
        await writeFileAtomic(filePath, content, {
          encoding: "utf8",
          fsync: fsyncUsed,
          tmpfileCreated: (tmpfile: string) => {
            result.metadata.tempFilePath = tmpfile;
          },
        });
      } else {
        await fs.writeFile(filePath, content, "utf8");
      }

      result.success = true;
      result.bytesProcessed = Buffer.byteLength(content, "utf8");
    } catch (error) {
      const failure = error instanceof BackupError ? error.cause : error;
      result.error = {
        code:
          error instanceof BackupError
            ? AtomicOperationError.BACKUP_FAILED
            : this.getErrorCode(failure),
        message: failure instanceof Error ? failure.message : String(failure),
        stack: failure instanceof Error ? failure.stack : undefined,
      };
    }

    const endTime = Date.now();
    result.metadata.endTime = endTime;
    result.duration = endTime - startTime;
    return result;
  }

  private async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  private async createBackup(filePath: string): Promise<string> {
    const ext = path.extname(filePath);
    const baseName = path.basename(filePath, ext);
    const dirName = path.dirname(filePath);
    const backupPath = path.join(
      dirName,
      `${baseName}.backup-${uuidv4().slice(0, 8)}${ext}`,
    );

    try {
      await fs.copyFile(filePath, backupPath);
    } catch (error) {
      throw new BackupError(`Failed to back up ${filePath}`, error);
    }

    return backupPath;
  }

  private getErrorCode(error: unknown): string {
    if (
      error &&
      typeof error === "object" &&
      "code" in error &&
      typeof error.code === "string"
    ) {
      switch (error.code) {
        case "ENOENT":
          return AtomicOperationError.FILE_NOT_FOUND;
        case "EACCES":
        case "EPERM":
          return AtomicOperationError.PERMISSION_DENIED;
        case "EISDIR":
          return AtomicOperationError.INVALID_OPERATION;
        case "ENOSPC":
          return AtomicOperationError.DISK_FULL;
        case "EMFILE":
        case "ENFILE":
          return AtomicOperationError.TEMP_FILE_CREATION_FAILED;
        default:
          return error.code;
      }
    }

    return AtomicOperationError.INVALID_OPERATION;
  }
}
