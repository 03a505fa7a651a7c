/**
 * Contract between the sync orchestrators and whatever produces the
 * authoritative source tree.
 */

export interface DownloadProgress {
  (megabytes: number, done: boolean): void;
}

export interface ArchiveRequest {
  /** owner/name */
  repository: string;
  /** Branch, tag or commit */
  ref: string;
  /** Only this directory of the snapshot becomes the source root */
  subPath?: string;
  onDownloadProgress?: DownloadProgress;
  signal?: AbortSignal;
}

/**
 * Extracted snapshot on local disk. dispose() must run on every exit path.
 */
export interface ArchiveSnapshot {
  /** Source root, already narrowed to the requested sub-path */
  root: string;
  /** Temporary directory holding the whole extraction */
  tempDir: string;
  dispose(): Promise<void>;
}

export interface ArchiveProvider {
  /**
   * @throws ArchiveError
   */
  acquire(request: ArchiveRequest): Promise<ArchiveSnapshot>;
  listBranches(repository: string): Promise<string[]>;
  getLatestCommitSha(repository: string, branch: string): Promise<string>;
}
