import { BaseTool, type ToolCallContext, type ToolInputSchema } from '../base.js';
import { log } from '../../utils/logger.js';
import { MirrorService, formatResult, type DestinationCheck } from '../../core/sync/MirrorService.js';
import type { SyncResult } from '../../core/sync/types.js';

/**
 * LocalMirrorTool - one-way mirror between two local directories, e.g. a
 * backup of a published directory
 */
export class LocalMirrorTool extends BaseTool {
  public name = 'mirror_local';

  public description = `Mirror one local directory into another (one-way).

The destination becomes an exact copy of the source. A missing source is not an error:
nothing is changed and all counts are zero. Use dryRun: true to list pending operations.`;

  public inputSchema: ToolInputSchema = {
    type: 'object',
    additionalProperties: false,
    properties: {
      source: {
        type: 'string',
        description: 'Directory to copy from (~ is expanded)'
      },
      destination: {
        type: 'string',
        description: 'Directory to make identical to source; created if missing'
      },
      dryRun: {
        type: 'boolean',
        default: false,
        description: 'Plan only, do not modify the destination'
      }
    },
    required: ['source', 'destination']
  };

  public annotations = {
    title: 'Mirror local directory',
    destructiveHint: true,
    idempotentHint: true,
    openWorldHint: false
  };

  async execute(
    params: Record<string, unknown>,
    context: ToolCallContext = {}
  ): Promise<
    | { success: boolean; operation: 'mirror'; source: string; destination: string; result: SyncResult; summary: string }
    | { success: true; operation: 'plan'; source: string; destination: string; plan: DestinationCheck }
  > {
    const source = this.validate.directory(params.source, 'source');
    const destination = this.validate.directory(params.destination, 'destination');
    const dryRun = this.validate.boolean(params.dryRun, 'dryRun', false);

    const service = new MirrorService();
    log.info(`[MIRROR_LOCAL] ${dryRun ? 'plan' : 'mirror'} ${source} -> ${destination}`);

    if (dryRun) {
      const report = await service.checkLocal({ source, destination });
      return { success: true, operation: 'plan', source, destination, plan: report.destinations[0] };
    }

    const result = await service.mirrorLocal({
      source,
      destination,
      onProgress: this.progressReporter(context),
      signal: context.signal
    });

    return {
      success: result.errors === 0 && !result.cancelled,
      operation: 'mirror',
      source,
      destination,
      result,
      summary: formatResult(result)
    };
  }
}
