/**
 * Shared types for the one-way sync engine
 */

/**
 * Root-relative path with `/` separators, whatever the host uses.
 * Join key between a source and a destination listing.
 */
export type RelativePath = string;

/**
 * Files found under one root at one point in time
 */
export interface TreeListing {
  readonly root: string;
  readonly paths: ReadonlySet<RelativePath>;
}

export type ChangeAction = 'create' | 'update' | 'delete';

export interface CopyOperation {
  kind: 'create' | 'update';
  path: RelativePath;
  sourcePath: string;
  destinationPath: string;
}

export interface DeleteOperation {
  kind: 'delete';
  path: RelativePath;
  destinationPath: string;
}

export type ChangeOp = CopyOperation | DeleteOperation;

/**
 * Ordered operations: creates/updates by path, then deletes by path
 */
export type ChangePlan = readonly ChangeOp[];

export interface DiffPlan {
  sourceRoot: string;
  destinationRoot: string;
  sourceListing: TreeListing;
  destinationListing: TreeListing;
  operations: ChangePlan;
  /** Source files whose destination copy is already identical */
  skipped: number;
}

export interface PlanSummary {
  create: number;
  update: number;
  delete: number;
  skipped: number;
  total: number;
}

export interface SyncFailure {
  path: RelativePath;
  action: ChangeAction;
  code?: string;
  reason: string;
}

export interface SyncResult {
  skipped: number;
  created: number;
  updated: number;
  deleted: number;
  errors: number;
  failures: SyncFailure[];
  /** Stopped through the abort signal before the plan was exhausted */
  cancelled: boolean;
}

export type SyncPhase = 'discovering' | 'syncing' | 'done';

/**
 * Progress sink. current/total allow an exact percentage.
 */
export type ProgressCallback = (
  phase: SyncPhase,
  current: number,
  total: number,
  message: string
) => void;

export function emptySyncResult(skipped = 0): SyncResult {
  return {
    skipped,
    created: 0,
    updated: 0,
    deleted: 0,
    errors: 0,
    failures: [],
    cancelled: false
  };
}
