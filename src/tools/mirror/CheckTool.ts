import { BaseTool, type ToolCallContext, type ToolInputSchema } from '../base.js';
import type { CheckReport } from '../../core/sync/MirrorService.js';

/**
 * CheckTool - how many files each local directory is behind a branch
 */
export class CheckTool extends BaseTool {
  public name = 'mirror_check';

  public description = `Count the files that mirroring a branch would change in one or more local directories.

Read-only. A directory that does not exist counts every file of the branch as a create.`;

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
        description: 'Branch, tag or commit to compare against'
      },
      localDirs: {
        type: 'array',
        items: { type: 'string' },
        minItems: 1,
        description: 'Directories to compare'
      },
      subPath: {
        type: 'string',
        description: 'Only compare this directory of the repository'
      }
    },
    required: ['branch', 'localDirs']
  };

  public annotations = {
    title: 'Check for updates',
    readOnlyHint: true,
    openWorldHint: true
  };

  async execute(
    params: Record<string, unknown>,
    context: ToolCallContext = {}
  ): Promise<{ success: true; repository: string; branch: string; upToDate: boolean } & CheckReport> {
    const config = await this.deps.loadConfig();
    const repository = this.resolveRepository(params, config);
    const branch = this.validate.string(params.branch, 'branch');
    const localDirs = this.validate.directories(params.localDirs, 'localDirs');
    const subPath = this.validate.optionalString(params.subPath, 'subPath');

    const report = await this.createService(config).checkArchive({
      repository,
      ref: branch,
      destinations: localDirs,
      subPath,
      signal: context.signal
    });

    return {
      success: true,
      repository,
      branch,
      upToDate: report.totalChanges === 0,
      ...report
    };
  }
}
