/**
 * MirrorService - the two sync pipelines and their read-only checks
 *
 * Archive → local and local → local share one plan/execute pipeline; only
 * the way the source tree is obtained differs. Configuration arrives as
 * arguments; nothing here reads environment or config files.
 */

import { promises as fs } from 'fs';
import { log } from '../../utils/logger.js';
import { FileOperationError, MirrorError, ValidationError, errorMessage } from '../../errors/mirrorErrors.js';
import { rootsOverlap } from '../../utils/pathExpansion.js';
import type { ArchiveProvider, DownloadProgress } from '../../api/archiveProvider.js';
import { DiffPlanner } from './DiffPlanner.js';
import { PlanExecutor } from './PlanExecutor.js';
import {
  emptySyncResult,
  type ChangeAction,
  type DiffPlan,
  type PlanSummary,
  type ProgressCallback,
  type RelativePath,
  type SyncResult
} from './types.js';

export const NO_CHANGES_MESSAGE = 'No changes (already up to date)';
export const MISSING_SOURCE_MESSAGE = 'Source directory does not exist';

export interface ArchiveSyncRequest {
  repository: string;
  ref: string;
  destination: string;
  subPath?: string;
  onProgress?: ProgressCallback;
  onDownloadProgress?: DownloadProgress;
  signal?: AbortSignal;
}

export interface LocalMirrorRequest {
  source: string;
  destination: string;
  onProgress?: ProgressCallback;
  signal?: AbortSignal;
}

export interface ArchiveCheckRequest {
  repository: string;
  ref: string;
  destinations: string[];
  subPath?: string;
  signal?: AbortSignal;
}

export interface PlannedChange {
  action: ChangeAction;
  path: RelativePath;
}

export interface DestinationCheck {
  destination: string;
  summary: PlanSummary;
  changes: PlannedChange[];
}

export interface CheckReport {
  destinations: DestinationCheck[];
  /** Sum of planned operations over all destinations */
  totalChanges: number;
}

export interface MirrorServiceDeps {
  provider?: ArchiveProvider;
  planner?: DiffPlanner;
  executor?: PlanExecutor;
}

export class MirrorService {
  private provider?: ArchiveProvider;
  private planner: DiffPlanner;
  private executor: PlanExecutor;

  constructor(deps: MirrorServiceDeps = {}) {
    this.provider = deps.provider;
    this.planner = deps.planner || new DiffPlanner();
    this.executor = deps.executor || new PlanExecutor();
  }

  /**
   * Make destination an exact copy of repository@ref (optionally one
   * sub-directory of it)
   *
   * @throws ArchiveError when the snapshot cannot be obtained
   * @throws FileOperationError when the destination root cannot be created
   */
  async syncFromArchive(request: ArchiveSyncRequest): Promise<SyncResult> {
    const { repository, ref, destination, subPath, onProgress, onDownloadProgress, signal } = request;
    const provider = this.requireProvider();

    onProgress?.('discovering', 0, 1, `Downloading ${repository}@${ref}`);
    const snapshot = await provider.acquire({ repository, ref, subPath, onDownloadProgress, signal });

    try {
      return await this.apply(snapshot.root, destination, onProgress, signal);
    } finally {
      await snapshot.dispose();
    }
  }

  /**
   * Make destination an exact copy of a local source directory. A missing
   * source is not an error: nothing happens and a zero result comes back.
   *
   * @throws ValidationError when one root contains the other
   */
  async mirrorLocal(request: LocalMirrorRequest): Promise<SyncResult> {
    const { source, destination, onProgress, signal } = request;
    assertSeparateRoots(source, destination);

    if (!(await isDirectory(source))) {
      log.info(`[MIRROR] ${source} does not exist, nothing to mirror`);
      onProgress?.('done', 1, 1, MISSING_SOURCE_MESSAGE);
      return emptySyncResult();
    }

    return this.apply(source, destination, onProgress, signal);
  }

  /**
   * Count pending changes of repository@ref against each destination
   * without touching any of them
   */
  async checkArchive(request: ArchiveCheckRequest): Promise<CheckReport> {
    const { repository, ref, destinations, subPath, signal } = request;
    const provider = this.requireProvider();

    const snapshot = await provider.acquire({ repository, ref, subPath, signal });
    try {
      const checks: DestinationCheck[] = [];
      for (const destination of destinations) {
        checks.push(toCheck(await this.planner.plan(snapshot.root, destination)));
      }
      return toReport(checks);
    } finally {
      await snapshot.dispose();
    }
  }

  /**
   * Read-only plan of a local mirror
   *
   * @throws FileOperationError when the source is not a directory
   * @throws ValidationError when one root contains the other
   */
  async checkLocal(request: { source: string; destination: string }): Promise<CheckReport> {
    assertSeparateRoots(request.source, request.destination);
    const plan = await this.planner.plan(request.source, request.destination);
    return toReport([toCheck(plan)]);
  }

  private async apply(
    sourceRoot: string,
    destination: string,
    onProgress?: ProgressCallback,
    signal?: AbortSignal
  ): Promise<SyncResult> {
    try {
      await fs.mkdir(destination, { recursive: true });
    } catch (error) {
      throw new FileOperationError('create', destination, errorMessage(error));
    }

    onProgress?.('discovering', 0, 1, 'Comparing files');
    const plan = await this.planner.plan(sourceRoot, destination);
    const total = plan.operations.length;

    if (total === 0) {
      onProgress?.('done', 1, 1, NO_CHANGES_MESSAGE);
      return emptySyncResult(plan.skipped);
    }

    const result = await this.executor.execute(plan.operations, {
      destinationRoot: destination,
      skipped: plan.skipped,
      onProgress,
      signal
    });

    onProgress?.('done', total, total, formatResult(result));
    return result;
  }

  private requireProvider(): ArchiveProvider {
    if (!this.provider) {
      throw new MirrorError('No archive provider configured', -32000);
    }
    return this.provider;
  }
}

/**
 * One-line result for progress messages and the CLI
 */
export function formatResult(result: SyncResult): string {
  const head = result.cancelled ? 'Sync cancelled' : 'Sync complete';
  const text =
    `${head}: ${result.created} created, ${result.updated} updated, ` +
    `${result.deleted} deleted, ${result.skipped} unchanged`;
  return result.errors > 0 ? `${text}, ${result.errors} failed` : text;
}

function toCheck(plan: DiffPlan): DestinationCheck {
  return {
    destination: plan.destinationRoot,
    summary: DiffPlanner.summarize(plan),
    changes: plan.operations.map(op => ({ action: op.kind, path: op.path }))
  };
}

function toReport(destinations: DestinationCheck[]): CheckReport {
  return {
    destinations,
    totalChanges: destinations.reduce((sum, check) => sum + check.summary.total, 0)
  };
}

/**
 * A source inside its destination would be planned for deletion, and a
 * destination inside its source would be copied into itself
 */
function assertSeparateRoots(source: string, destination: string): void {
  if (rootsOverlap(source, destination)) {
    throw new ValidationError('destination', destination, `a directory that neither contains nor lies inside ${source}`);
  }
}

async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await fs.stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}
