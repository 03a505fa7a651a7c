/**
 * DiffPlanner - computes the change plan that makes a destination tree an
 * exact content copy of a source tree
 *
 * Read-only: lists both trees and compares common files, never writes.
 *
 * Plan order is deterministic: creates and updates in path order, then
 * deletes in path order as a trailing batch. The two groups never share a
 * path, since deletes only target paths missing from the source.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { mcpLogger } from '../../utils/mcpLogger.js';
import { fromPosix } from '../../utils/pathExpansion.js';
import { ContentComparator, defaultComparator } from './ContentComparator.js';
import { listTree, listTreeIfExists, sortedPaths } from './TreeLister.js';
import type { ChangeOp, ChangePlan, DeleteOperation, DiffPlan, PlanSummary } from './types.js';

export class DiffPlanner {
  private comparator: ContentComparator;

  constructor(comparator?: ContentComparator) {
    this.comparator = comparator || defaultComparator;
  }

  /**
   * Plan the operations for sourceRoot → destinationRoot
   *
   * A missing destination is planned as empty, so every source file becomes
   * a create.
   *
   * @throws FileOperationError when the source root is not a directory
   */
  async plan(sourceRoot: string, destinationRoot: string): Promise<DiffPlan> {
    mcpLogger.debug('sync', `[PLANNER] Planning ${sourceRoot} -> ${destinationRoot}`);

    const sourceListing = await listTree(sourceRoot);
    const destinationListing = await listTreeIfExists(destinationRoot);

    const copies: ChangeOp[] = [];
    const deletes: DeleteOperation[] = [];
    let skipped = 0;

    for (const rel of sortedPaths(sourceListing)) {
      const sourcePath = path.join(sourceRoot, fromPosix(rel));
      const destinationPath = path.join(destinationRoot, fromPosix(rel));

      if (await isRegularFile(destinationPath)) {
        if (await this.comparator.identical(sourcePath, destinationPath)) {
          skipped++;
        } else {
          copies.push({ kind: 'update', path: rel, sourcePath, destinationPath });
        }
      } else {
        // Also reached when a directory sits where the file should go;
        // the copy fails at execution time and is reported per file.
        copies.push({ kind: 'create', path: rel, sourcePath, destinationPath });
      }
    }

    for (const rel of sortedPaths(destinationListing)) {
      if (!sourceListing.paths.has(rel)) {
        deletes.push({ kind: 'delete', path: rel, destinationPath: path.join(destinationRoot, fromPosix(rel)) });
      }
    }

    const operations: ChangePlan = [...copies, ...deletes];
    const plan: DiffPlan = {
      sourceRoot,
      destinationRoot,
      sourceListing,
      destinationListing,
      operations,
      skipped
    };

    mcpLogger.info('sync', `[PLANNER] ${DiffPlanner.formatSummary(plan)}`);
    return plan;
  }

  /**
   * Count operations by kind
   */
  static summarize(plan: DiffPlan): PlanSummary {
    const summary: PlanSummary = {
      create: 0,
      update: 0,
      delete: 0,
      skipped: plan.skipped,
      total: plan.operations.length
    };
    for (const op of plan.operations) {
      summary[op.kind]++;
    }
    return summary;
  }

  /**
   * Create a summary string for display
   */
  static formatSummary(plan: DiffPlan): string {
    const summary = DiffPlanner.summarize(plan);
    if (summary.total === 0) {
      return 'No changes detected';
    }

    const parts: string[] = [];
    if (summary.create > 0) {
      parts.push(`+${summary.create} create`);
    }
    if (summary.update > 0) {
      parts.push(`~${summary.update} update`);
    }
    if (summary.delete > 0) {
      parts.push(`-${summary.delete} delete`);
    }

    return parts.join(', ') + ` (${summary.total} total)`;
  }
}

async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}
