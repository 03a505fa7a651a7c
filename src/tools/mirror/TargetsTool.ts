/**
 * TargetsTool - run the configured targets from mirror-config.json
 *
 * list:  what a run would do per target
 * check: pending changes per publish directory
 * run:   back up each publish directory, then publish the branch into it
 */

import { BaseTool, type ToolCallContext, type ToolInputSchema } from '../base.js';
import { log } from '../../utils/logger.js';
import { TargetRunner, type TargetProgressCallback } from '../../core/targets/TargetRunner.js';

const OPERATIONS = ['list', 'check', 'run'] as const;

export class TargetsTool extends BaseTool {
  public name = 'mirror_targets';

  public description = `Work with the sync targets configured in mirror-config.json.

Operations:
- list: show targets and whether each will be backed up and/or published
- check: count files that differ between each branch and its publish directory
- run: for each enabled target, mirror the publish directory into the backup directory,
  then mirror the branch into the publish directory`;

  public inputSchema: ToolInputSchema = {
    type: 'object',
    additionalProperties: false,
    properties: {
      operation: {
        type: 'string',
        enum: [...OPERATIONS],
        description: 'list, check or run'
      }
    },
    required: ['operation']
  };

  public annotations = {
    title: 'Configured targets',
    destructiveHint: true,
    openWorldHint: true
  };

  async execute(params: Record<string, unknown>, context: ToolCallContext = {}): Promise<unknown> {
    const operation = this.validate.enum(params.operation, 'operation', OPERATIONS);
    const config = await this.deps.loadConfig();
    const runner = new TargetRunner(this.createService(config), config);

    log.info(`[TARGETS] ${operation} (${config.targets.length} configured)`);

    switch (operation) {
      case 'list':
        return {
          success: true,
          operation,
          repository: config.repository,
          backupEnabled: config.backupEnabled,
          publishEnabled: config.publishEnabled,
          targets: runner.list()
        };

      case 'check': {
        const targets = await runner.check(context.signal);
        return { success: targets.every(t => t.ok), operation, targets };
      }

      case 'run': {
        const targets = await runner.run(this.targetProgress(context), context.signal);
        return { success: targets.every(t => t.ok), operation, targets };
      }
    }
  }

  /**
   * Targets run concurrently, so progress is reported per finished stage
   */
  private targetProgress(context: ToolCallContext): TargetProgressCallback | undefined {
    const report = this.progressReporter(context);
    if (!report) {
      return undefined;
    }
    return (branch, stage, phase, current, total, message) => {
      if (phase === 'done') {
        report(phase, current, total, `${branch} ${stage}: ${message}`);
      }
    };
  }
}
