/**
 * PlanExecutor - applies a change plan to the destination filesystem
 *
 * Best effort: a failing operation is recorded in the result and the next
 * one runs, so one locked file never blocks the rest of the tree. After the
 * plan, directories left empty below the destination root are removed.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { log } from '../../utils/logger.js';
import { mcpLogger } from '../../utils/mcpLogger.js';
import { errorCode, errorMessage } from '../../errors/mirrorErrors.js';
import {
  emptySyncResult,
  type ChangeAction,
  type ChangeOp,
  type ChangePlan,
  type ProgressCallback,
  type SyncResult
} from './types.js';

/**
 * Filesystem calls made by the executor
 */
export interface FileSystemOps {
  mkdir(dirPath: string, options: { recursive: true }): Promise<unknown>;
  copyFile(source: string, destination: string): Promise<void>;
  stat(filePath: string): Promise<{ atime: Date; mtime: Date }>;
  lstat(filePath: string): Promise<{ isDirectory(): boolean }>;
  utimes(filePath: string, atime: Date, mtime: Date): Promise<void>;
  unlink(filePath: string): Promise<void>;
  readdir(dirPath: string): Promise<string[]>;
  rmdir(dirPath: string): Promise<void>;
}

export const nodeFileSystem: FileSystemOps = {
  mkdir: (dirPath, options) => fs.mkdir(dirPath, options),
  copyFile: (source, destination) => fs.copyFile(source, destination),
  stat: (filePath) => fs.stat(filePath),
  lstat: (filePath) => fs.lstat(filePath),
  utimes: (filePath, atime, mtime) => fs.utimes(filePath, atime, mtime),
  unlink: (filePath) => fs.unlink(filePath),
  readdir: (dirPath) => fs.readdir(dirPath),
  rmdir: (dirPath) => fs.rmdir(dirPath)
};

export interface ExecuteOptions {
  /** Root whose empty subdirectories are pruned afterwards */
  destinationRoot: string;
  /** Identical files found while planning, carried into the result */
  skipped?: number;
  onProgress?: ProgressCallback;
  signal?: AbortSignal;
}

const PAST_TENSE: Record<ChangeAction, string> = {
  create: 'Created',
  update: 'Updated',
  delete: 'Deleted'
};

export class PlanExecutor {
  private fileSystem: FileSystemOps;

  constructor(fileSystem?: FileSystemOps) {
    this.fileSystem = fileSystem || nodeFileSystem;
  }

  /**
   * Apply every operation in order
   *
   * Never rejects because of a single file; check result.errors and
   * result.failures for partial success.
   */
  async execute(operations: ChangePlan, options: ExecuteOptions): Promise<SyncResult> {
    const { destinationRoot, skipped = 0, onProgress, signal } = options;
    const result = emptySyncResult(skipped);
    const total = operations.length;

    log.info(`[EXECUTOR] Applying ${total} operations to ${destinationRoot}`);

    for (let index = 0; index < total; index++) {
      if (signal?.aborted) {
        log.warn(`[EXECUTOR] Cancelled after ${index} of ${total} operations`);
        result.cancelled = true;
        break;
      }

      const op = operations[index];
      let message: string;
      try {
        await this.apply(op);
        this.count(result, op.kind);
        message = `${PAST_TENSE[op.kind]} ${op.path}`;
        log.debug(`[EXECUTOR] ${message}`);
      } catch (error) {
        const code = errorCode(error);
        const reason = errorMessage(error);
        result.errors++;
        result.failures.push({ path: op.path, action: op.kind, code, reason });
        message = `Failed to ${op.kind} ${op.path}: ${code || reason}`;
        mcpLogger.warning('sync', `[EXECUTOR] ${message}`);
      }

      onProgress?.('syncing', index + 1, total, message);
    }

    await this.removeEmptyDirectories(destinationRoot);

    log.info(
      `[EXECUTOR] Done: +${result.created} ~${result.updated} -${result.deleted}, ` +
      `${result.skipped} skipped, ${result.errors} errors`
    );
    return result;
  }

  private async apply(op: ChangeOp): Promise<void> {
    if (op.kind === 'delete') {
      try {
        await this.fileSystem.unlink(op.destinationPath);
      } catch (error) {
        // Already gone is the state we wanted
        if (errorCode(error) !== 'ENOENT') {
          throw error;
        }
      }
      return;
    }

    await this.fileSystem.mkdir(path.dirname(op.destinationPath), { recursive: true });
    await this.fileSystem.copyFile(op.sourcePath, op.destinationPath);
    await this.copyTimestamps(op.sourcePath, op.destinationPath);
  }

  private async copyTimestamps(source: string, destination: string): Promise<void> {
    try {
      const stat = await this.fileSystem.stat(source);
      await this.fileSystem.utimes(destination, stat.atime, stat.mtime);
    } catch (error) {
      log.debug(`[EXECUTOR] Could not copy timestamps to ${destination}: ${errorMessage(error)}`);
    }
  }

  private count(result: SyncResult, kind: ChangeAction): void {
    switch (kind) {
      case 'create':
        result.created++;
        break;
      case 'update':
        result.updated++;
        break;
      case 'delete':
        result.deleted++;
        break;
    }
  }

  /**
   * Bottom-up removal of empty directories below root (root kept).
   * Failures are ignored: a concurrent writer may have refilled a directory.
   */
  async removeEmptyDirectories(root: string): Promise<void> {
    const prune = async (dir: string): Promise<boolean> => {
      let entries: string[];
      try {
        entries = await this.fileSystem.readdir(dir);
      } catch (error) {
        log.debug(`[EXECUTOR] Cannot read ${dir}: ${errorMessage(error)}`);
        return false;
      }

      let empty = true;
      for (const name of entries) {
        const full = path.join(dir, name);
        if (await this.isPlainDirectory(full)) {
          if (!(await prune(full))) empty = false;
        } else {
          empty = false;
        }
      }

      if (empty && dir !== root) {
        try {
          await this.fileSystem.rmdir(dir);
          log.debug(`[EXECUTOR] Removed empty directory ${dir}`);
        } catch (error) {
          log.debug(`[EXECUTOR] Could not remove ${dir}: ${errorMessage(error)}`);
          return false;
        }
      }
      return empty;
    };

    await prune(root);
  }

  /** Links to directories are left alone, never descended into */
  private async isPlainDirectory(dirPath: string): Promise<boolean> {
    try {
      return (await this.fileSystem.lstat(dirPath)).isDirectory();
    } catch {
      return false;
    }
  }
}
