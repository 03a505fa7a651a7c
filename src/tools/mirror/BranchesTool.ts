import { BaseTool, type ToolInputSchema } from '../base.js';

/**
 * BranchesTool - branch names of a repository, optionally with the head
 * commit of one of them
 */
export class BranchesTool extends BaseTool {
  public name = 'mirror_branches';

  public description = 'List the branches of a GitHub repository. With branch set, also returns its latest commit SHA.';

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
        description: 'Branch whose latest commit SHA should be included'
      }
    }
  };

  public annotations = {
    title: 'List branches',
    readOnlyHint: true,
    openWorldHint: true
  };

  async execute(params: Record<string, unknown>): Promise<{
    success: true;
    repository: string;
    branches: string[];
    latestCommit?: { branch: string; sha: string };
  }> {
    const config = await this.deps.loadConfig();
    const repository = this.resolveRepository(params, config);
    const branch = this.validate.optionalString(params.branch, 'branch');
    const provider = this.deps.createProvider(config.token);

    const branches = await provider.listBranches(repository);
    if (!branch) {
      return { success: true, repository, branches };
    }

    const sha = await provider.getLatestCommitSha(repository, branch);
    return { success: true, repository, branches, latestCommit: { branch, sha } };
  }
}
