/**
 * MirrorSyncTool - make a local directory an exact copy of a repository
 * branch (or one sub-directory of it)
 *
 * dryRun only plans and reports the pending operations.
 */

import { BaseTool, type ToolCallContext, type ToolInputSchema } from '../base.js';
import { log } from '../../utils/logger.js';
import { formatResult, type CheckReport } from '../../core/sync/MirrorService.js';
import type { SyncResult } from '../../core/sync/types.js';

interface MirrorSyncResponse {
  success: boolean;
  operation: 'sync';
  repository: string;
  branch: string;
  localDir: string;
  result: SyncResult;
  summary: string;
}

interface MirrorSyncPlanResponse {
  success: true;
  operation: 'plan';
  repository: string;
  branch: string;
  localDir: string;
  plan: CheckReport['destinations'][number];
}

export class MirrorSyncTool extends BaseTool {
  public name = 'mirror_sync';

  public description = `Mirror a GitHub repository branch into a local directory (one-way).

Downloads the branch archive, compares it with the directory and applies only the
differences: new files are created, changed files updated, files missing from the
branch deleted. Text files differing only in CRLF/LF line endings count as unchanged.

Use dryRun: true to list pending operations without modifying anything.`;

  public inputSchema: ToolInputSchema = {
    type: 'object',
    additionalProperties: false,
    properties: {
      repository: {
        type: 'string',
        description: 'owner/name; defaults to the configured repository'
      },
      branch: {
        type: 'string',
        description: 'Branch, tag or commit to mirror'
      },
      localDir: {
        type: 'string',
        description: 'Destination directory (~ is expanded); created if missing'
      },
      subPath: {
        type: 'string',
        description: 'Only mirror this directory of the repository'
      },
      dryRun: {
        type: 'boolean',
        default: false,
        description: 'Plan only, do not modify the destination'
      }
    },
    required: ['branch', 'localDir']
  };

  public annotations = {
    title: 'Mirror branch',
    destructiveHint: true,
    idempotentHint: true,
    openWorldHint: true
  };

  async execute(
    params: Record<string, unknown>,
    context: ToolCallContext = {}
  ): Promise<MirrorSyncResponse | MirrorSyncPlanResponse> {
    const config = await this.deps.loadConfig();
    const repository = this.resolveRepository(params, config);
    const branch = this.validate.string(params.branch, 'branch');
    const localDir = this.validate.directory(params.localDir, 'localDir');
    const subPath = this.validate.optionalString(params.subPath, 'subPath');
    const dryRun = this.validate.boolean(params.dryRun, 'dryRun', false);

    const service = this.createService(config);
    log.info(`[MIRROR_SYNC] ${dryRun ? 'plan' : 'sync'} ${repository}@${branch} -> ${localDir}`);

    if (dryRun) {
      const report = await service.checkArchive({
        repository,
        ref: branch,
        destinations: [localDir],
        subPath,
        signal: context.signal
      });
      return { success: true, operation: 'plan', repository, branch, localDir, plan: report.destinations[0] };
    }

    const result = await service.syncFromArchive({
      repository,
      ref: branch,
      destination: localDir,
      subPath,
      onProgress: this.progressReporter(context),
      signal: context.signal
    });

    return {
      success: result.errors === 0 && !result.cancelled,
      operation: 'sync',
      repository,
      branch,
      localDir,
      result,
      summary: formatResult(result)
    };
  }
}
