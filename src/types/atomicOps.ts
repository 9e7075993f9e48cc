/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

/**
 * @fileoverview Types for in-place file replacement
 * @module types/atomicOps
 */

/** Options shared by every write */
export interface AtomicFileOptions {
  /** Write through a temp file, fsync it and rename (default: true) */
  atomic?: boolean;

  /** Copy the current file aside before replacing it (default: false) */
  createBackup?: boolean;
}

/** Per-call overrides */
export interface FileWriteOptions {
  createBackup?: boolean;
}

export interface AtomicOperationResultMetadata {
  startTime: number;
  endTime: number;
  atomic: boolean;
  fsyncUsed: boolean;
  backupCreated: boolean;
  backupPath?: string;
  /** Temp file write-file-atomic staged the content in */
  tempFilePath?: string;
}

/** Result of an atomic file operation */
export interface AtomicOperationResult {
  success: boolean;
  operation: "write";
  filePath: string;

  /** Operation duration in milliseconds */
  duration: number;

  bytesProcessed: number;

  error?: {
    code: string;
    message: string;
    stack?: string;
  };

  metadata: AtomicOperationResultMetadata;
}

export enum AtomicOperationError {
  FILE_NOT_FOUND = "FILE_NOT_FOUND",
  PERMISSION_DENIED = "PERMISSION_DENIED",
  TEMP_FILE_CREATION_FAILED = "TEMP_FILE_CREATION_FAILED",
  BACKUP_FAILED = "BACKUP_FAILED",
  INVALID_OPERATION = "INVALID_OPERATION",
  DISK_FULL = "DISK_FULL",
}
