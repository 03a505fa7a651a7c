/**
 * TargetRunner - "check for updates" and "start updates" over the
 * configured targets
 *
 * run(): for each enabled target, the current publish directory is first
 * mirrored into its backup directory, then the branch snapshot is synced
 * into the publish directory. Targets run concurrently; their destination
 * roots must therefore be disjoint.
 */

import { log } from '../../utils/logger.js';
import { resolveLocalPath, rootsOverlap } from '../../utils/pathExpansion.js';
import { ValidationError, errorMessage } from '../../errors/mirrorErrors.js';
import { REPOSITORY_PATTERN, type MirrorConfig, type MirrorTarget } from '../../config/mirrorConfig.js';
import type { MirrorService, DestinationCheck } from '../sync/MirrorService.js';
import type { ProgressCallback, SyncPhase, SyncResult } from '../sync/types.js';

export type TargetStage = 'backup' | 'publish';

export type TargetProgressCallback = (
  branch: string,
  stage: TargetStage,
  phase: SyncPhase,
  current: number,
  total: number,
  message: string
) => void;

export interface TargetPlan {
  branch: string;
  enabled: boolean;
  backupDir?: string;
  publishDir?: string;
  subPath?: string;
  /** Publish directory gets copied to the backup directory */
  backup: boolean;
  /** Branch snapshot gets synced into the publish directory */
  publish: boolean;
}

export interface TargetCheckOutcome {
  branch: string;
  ok: boolean;
  /** Pending changes in the publish directory */
  changes?: number;
  check?: DestinationCheck;
  error?: string;
}

export interface TargetRunOutcome {
  branch: string;
  ok: boolean;
  backup?: SyncResult;
  publish?: SyncResult;
  error?: string;
}

export class TargetRunner {
  constructor(
    private service: MirrorService,
    private config: MirrorConfig
  ) {}

  /**
   * What run() would do for every configured target
   */
  list(): TargetPlan[] {
    return this.config.targets.map(target => this.describe(target));
  }

  /**
   * Count pending changes of each enabled target's publish directory
   */
  async check(signal?: AbortSignal): Promise<TargetCheckOutcome[]> {
    const repository = this.requireRepository();
    const active = this.list().filter(plan => plan.enabled && plan.publishDir && this.config.publishEnabled);

    const settled = await Promise.allSettled(
      active.map(async plan => {
        const publishDir = resolveLocalPath(plan.publishDir || '');
        const report = await this.service.checkArchive({
          repository,
          ref: plan.branch,
          destinations: [publishDir],
          subPath: plan.subPath,
          signal
        });
        return report.destinations[0];
      })
    );

    return settled.map((outcome, index) => {
      const branch = active[index].branch;
      if (outcome.status === 'fulfilled') {
        log.info(`[TARGETS] ${branch}: ${outcome.value.summary.total} files to update`);
        return { branch, ok: true, changes: outcome.value.summary.total, check: outcome.value };
      }
      log.warn(`[TARGETS] ${branch}: check failed: ${errorMessage(outcome.reason)}`);
      return { branch, ok: false, error: errorMessage(outcome.reason) };
    });
  }

  /**
   * Back up and publish every enabled target
   *
   * @throws ValidationError when two active destination roots overlap
   */
  async run(onProgress?: TargetProgressCallback, signal?: AbortSignal): Promise<TargetRunOutcome[]> {
    const repository = this.requireRepository();
    const active = this.list().filter(plan => plan.enabled && (plan.backup || plan.publish));
    this.assertDisjointDestinations(active);

    const settled = await Promise.allSettled(
      active.map(plan => this.runTarget(repository, plan, onProgress, signal))
    );

    return settled.map((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        return outcome.value;
      }
      const branch = active[index].branch;
      log.error(`[TARGETS] ${branch}: ${errorMessage(outcome.reason)}`);
      return { branch, ok: false, error: errorMessage(outcome.reason) };
    });
  }

  private async runTarget(
    repository: string,
    plan: TargetPlan,
    onProgress?: TargetProgressCallback,
    signal?: AbortSignal
  ): Promise<TargetRunOutcome> {
    const outcome: TargetRunOutcome = { branch: plan.branch, ok: true };
    const forward = (stage: TargetStage): ProgressCallback | undefined =>
      onProgress && ((phase, current, total, message) => onProgress(plan.branch, stage, phase, current, total, message));

    if (plan.backup && plan.publishDir && plan.backupDir) {
      log.info(`[TARGETS] ${plan.branch}: backing up ${plan.publishDir} -> ${plan.backupDir}`);
      outcome.backup = await this.service.mirrorLocal({
        source: resolveLocalPath(plan.publishDir),
        destination: resolveLocalPath(plan.backupDir),
        onProgress: forward('backup'),
        signal
      });
    }

    if (plan.publish && plan.publishDir) {
      log.info(`[TARGETS] ${plan.branch}: publishing ${repository}@${plan.branch} -> ${plan.publishDir}`);
      outcome.publish = await this.service.syncFromArchive({
        repository,
        ref: plan.branch,
        destination: resolveLocalPath(plan.publishDir),
        subPath: plan.subPath,
        onProgress: forward('publish'),
        signal
      });
    }

    outcome.ok = [outcome.backup, outcome.publish].every(result => !result || (result.errors === 0 && !result.cancelled));
    return outcome;
  }

  private describe(target: MirrorTarget): TargetPlan {
    return {
      branch: target.branch,
      enabled: target.enabled,
      backupDir: target.backupDir,
      publishDir: target.publishDir,
      subPath: target.subPath,
      backup: this.config.backupEnabled && Boolean(target.backupDir && target.publishDir),
      publish: this.config.publishEnabled && Boolean(target.publishDir)
    };
  }

  private assertDisjointDestinations(plans: TargetPlan[]): void {
    const roots: Array<{ branch: string; dir: string }> = [];
    for (const plan of plans) {
      if (plan.backup && plan.backupDir) roots.push({ branch: plan.branch, dir: resolveLocalPath(plan.backupDir) });
      if (plan.publish && plan.publishDir) roots.push({ branch: plan.branch, dir: resolveLocalPath(plan.publishDir) });
    }

    for (let i = 0; i < roots.length; i++) {
      for (let j = i + 1; j < roots.length; j++) {
        if (rootsOverlap(roots[i].dir, roots[j].dir)) {
          throw new ValidationError(
            'targets',
            `${roots[i].branch}: ${roots[i].dir}, ${roots[j].branch}: ${roots[j].dir}`,
            'destination directories that do not overlap'
          );
        }
      }
    }
  }

  private requireRepository(): string {
    const { repository } = this.config;
    if (!REPOSITORY_PATTERN.test(repository)) {
      throw new ValidationError('repository', repository, 'owner/name');
    }
    return repository;
  }
}
