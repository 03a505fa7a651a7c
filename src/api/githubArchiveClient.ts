/**
 * GitHubArchiveClient - obtains branch snapshots through the GitHub REST API
 *
 * Downloads the zipball of a ref, extracts it into a fresh temporary
 * directory and hands back the content root. GitHub wraps the archive in a
 * single `owner-repo-sha/` directory, which is unwrapped here.
 */

import AdmZip from 'adm-zip';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { log } from '../utils/logger.js';
import { fromPosix, isWithinRoot } from '../utils/pathExpansion.js';
import { ArchiveError, errorMessage } from '../errors/mirrorErrors.js';
import type { ArchiveProvider, ArchiveRequest, ArchiveSnapshot, DownloadProgress } from './archiveProvider.js';

export const GITHUB_API_BASE = 'https://api.github.com';
export const TEMP_DIR_PREFIX = 'branch-mirror-';

const API_TIMEOUT_MS = 30_000;
const DOWNLOAD_TIMEOUT_MS = 120_000;
const BYTES_PER_MEGABYTE = 1024 * 1024;

interface Deadline {
  signal: AbortSignal;
  /** Restart the timeout */
  rearm(): void;
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface GitHubArchiveClientOptions {
  token?: string;
  apiBase?: string;
  /** Replaces the global fetch, mainly for tests */
  fetch?: FetchFn;
  /** Parent directory of the extraction directories (default: os.tmpdir()) */
  tempRoot?: string;
  apiTimeoutMs?: number;
  /** Longest wait for the response or for the next archive chunk */
  downloadTimeoutMs?: number;
}

export class GitHubArchiveClient implements ArchiveProvider {
  private readonly token?: string;
  private readonly apiBase: string;
  private readonly fetchFn: FetchFn;
  private readonly tempRoot: string;
  private readonly apiTimeoutMs: number;
  private readonly downloadTimeoutMs: number;

  constructor(options: GitHubArchiveClientOptions = {}) {
    this.token = options.token || undefined;
    this.apiBase = (options.apiBase || GITHUB_API_BASE).replace(/\/+$/, '');
    this.fetchFn = options.fetch || ((input, init) => fetch(input, init));
    this.tempRoot = options.tempRoot || os.tmpdir();
    this.apiTimeoutMs = options.apiTimeoutMs ?? API_TIMEOUT_MS;
    this.downloadTimeoutMs = options.downloadTimeoutMs ?? DOWNLOAD_TIMEOUT_MS;
  }

  /**
   * Download and extract a snapshot of repository@ref
   */
  async acquire(request: ArchiveRequest): Promise<ArchiveSnapshot> {
    const { repository, ref, subPath, onDownloadProgress, signal } = request;
    const url = `${this.apiBase}/repos/${repository}/zipball/${ref}`;

    log.info(`[ARCHIVE] Downloading ${repository}@${ref}`);
    const archive = await this.withDeadline(this.downloadTimeoutMs, signal, async deadline => {
      const response = await this.request(url, `archive of ${repository}@${ref}`, deadline.signal);
      return this.readBody(response, deadline, onDownloadProgress);
    });

    const tempDir = await fs.mkdtemp(path.join(this.tempRoot, TEMP_DIR_PREFIX));
    const dispose = async (): Promise<void> => {
      await fs.rm(tempDir, { recursive: true, force: true });
      log.debug(`[ARCHIVE] Removed ${tempDir}`);
    };

    try {
      this.extract(archive, tempDir);
      const contentRoot = await this.findContentRoot(tempDir);
      const root = subPath ? await this.narrow(contentRoot, subPath) : contentRoot;

      log.info(`[ARCHIVE] Extracted ${repository}@${ref} to ${root}`);
      return { root, tempDir, dispose };
    } catch (error) {
      await dispose();
      throw error;
    }
  }

  /**
   * All branch names, following pagination
   */
  async listBranches(repository: string): Promise<string[]> {
    const branches: string[] = [];
    let url: string | undefined = `${this.apiBase}/repos/${repository}/branches?per_page=100`;

    while (url) {
      const pageUrl: string = url;
      const { body, link } = await this.withDeadline(this.apiTimeoutMs, undefined, async deadline => {
        const response = await this.request(pageUrl, `branches of ${repository}`, deadline.signal);
        return { body: await readJson(response), link: response.headers.get('link') };
      });

      if (!Array.isArray(body)) {
        throw new ArchiveError('NETWORK_ERROR', `Unexpected branch list response for '${repository}'`);
      }
      for (const item of body) {
        if (isRecord(item) && typeof item.name === 'string') {
          branches.push(item.name);
        }
      }
      url = nextPageUrl(link);
    }

    log.debug(`[ARCHIVE] ${branches.length} branches in ${repository}`);
    return branches;
  }

  /**
   * SHA of the newest commit on a branch
   */
  async getLatestCommitSha(repository: string, branch: string): Promise<string> {
    const body = await this.withDeadline(this.apiTimeoutMs, undefined, async deadline => {
      const response = await this.request(
        `${this.apiBase}/repos/${repository}/commits/${branch}`,
        `latest commit of ${repository}@${branch}`,
        deadline.signal
      );
      return readJson(response);
    });

    if (!isRecord(body) || typeof body.sha !== 'string') {
      throw new ArchiveError('NETWORK_ERROR', `Unexpected commit response for '${repository}@${branch}'`);
    }
    return body.sha;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { Accept: 'application/vnd.github+json' };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }
    return headers;
  }

  /**
   * Run fn with a signal that aborts once timeoutMs pass without activity,
   * or when the caller's signal aborts. fn marks activity with rearm().
   */
  private async withDeadline<T>(
    timeoutMs: number,
    signal: AbortSignal | undefined,
    fn: (deadline: Deadline) => Promise<T>
  ): Promise<T> {
    const controller = new AbortController();
    let timer = setTimeout(() => controller.abort(), timeoutMs);
    const deadline: Deadline = {
      signal: controller.signal,
      rearm: () => {
        clearTimeout(timer);
        timer = setTimeout(() => controller.abort(), timeoutMs);
      }
    };
    const forwardAbort = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    }
    signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      return await fn(deadline);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  /**
   * GET; non-2xx responses become classified ArchiveErrors
   */
  private async request(url: string, resource: string, signal: AbortSignal): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchFn(url, { headers: this.headers(), signal });
    } catch (error) {
      throw new ArchiveError('NETWORK_ERROR', `Network error: ${errorMessage(error)}`, { url });
    }

    await this.checkResponse(response, resource);
    return response;
  }

  private async checkResponse(response: Response, resource: string): Promise<void> {
    if (response.ok) {
      return;
    }

    switch (response.status) {
      case 401:
        throw new ArchiveError('UNAUTHORIZED', 'Authentication failed (401): token invalid or expired.', { status: 401 });
      case 403: {
        const apiMessage = await readApiMessage(response);
        throw new ArchiveError('FORBIDDEN', `Access denied (403): ${apiMessage}`, { status: 403 });
      }
      case 404:
        throw new ArchiveError('NOT_FOUND', `Not found (404): ${resource}. Check the repository and branch names.`, { status: 404 });
      default: {
        const text = await response.text().catch(() => '');
        throw new ArchiveError(
          'NETWORK_ERROR',
          `API request failed (${response.status}): ${resource}${text ? `\n${text}` : ''}`,
          { status: response.status }
        );
      }
    }
  }

  /**
   * Read the archive into memory, reporting megabytes as chunks arrive.
   * Every chunk restarts the idle timeout, so a slow but steady download
   * may take as long as it needs.
   */
  private async readBody(response: Response, deadline: Deadline, onProgress?: DownloadProgress): Promise<Buffer> {
    if (!response.body) {
      return Buffer.alloc(0);
    }

    const chunks: Buffer[] = [];
    let downloaded = 0;
    const reader = response.body.getReader();

    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        deadline.rearm();
        if (value instanceof Uint8Array) {
          chunks.push(Buffer.from(value));
          downloaded += value.byteLength;
          onProgress?.(downloaded / BYTES_PER_MEGABYTE, false);
        }
      }
    } catch (error) {
      throw new ArchiveError('NETWORK_ERROR', `Network error while downloading: ${errorMessage(error)}`);
    }

    onProgress?.(downloaded / BYTES_PER_MEGABYTE, true);
    log.debug(`[ARCHIVE] Downloaded ${(downloaded / BYTES_PER_MEGABYTE).toFixed(1)} MB`);
    return Buffer.concat(chunks);
  }

  private extract(archive: Buffer, targetDir: string): void {
    try {
      new AdmZip(archive).extractAllTo(targetDir, true);
    } catch (error) {
      throw new ArchiveError('NETWORK_ERROR', `Downloaded archive could not be extracted: ${errorMessage(error)}`);
    }
  }

  /**
   * A single top-level directory is the repository wrapper; unwrap it
   */
  private async findContentRoot(tempDir: string): Promise<string> {
    const entries = await fs.readdir(tempDir, { withFileTypes: true });
    if (entries.length === 1 && entries[0].isDirectory()) {
      return path.join(tempDir, entries[0].name);
    }
    return tempDir;
  }

  private async narrow(contentRoot: string, subPath: string): Promise<string> {
    const trimmed = subPath.replace(/^\/+|\/+$/g, '');
    const candidate = path.join(contentRoot, fromPosix(trimmed));

    if (isWithinRoot(candidate, contentRoot) && (await isDirectory(candidate))) {
      return candidate;
    }

    throw new ArchiveError(
      'SUBPATH_NOT_FOUND',
      `Sub-directory '${subPath}' does not exist in the remote repository.`,
      { subPath }
    );
  }
}

/**
 * URL of the rel="next" page in a Link header, if any
 */
export function nextPageUrl(linkHeader: string | null): string | undefined {
  if (!linkHeader) {
    return undefined;
  }
  for (const part of linkHeader.split(',')) {
    if (part.includes('rel="next"')) {
      return part.split(';')[0].trim().replace(/^<|>$/g, '');
    }
  }
  return undefined;
}

async function readJson(response: Response): Promise<unknown> {
  try {
    const body: unknown = await response.json();
    return body;
  } catch (error) {
    throw new ArchiveError('NETWORK_ERROR', `Invalid API response: ${errorMessage(error)}`);
  }
}

async function readApiMessage(response: Response): Promise<string> {
  try {
    const body: unknown = await response.json();
    if (isRecord(body) && typeof body.message === 'string') {
      return body.message;
    }
  } catch (error) {
    log.debug(`[ARCHIVE] 403 body is not JSON: ${errorMessage(error)}`);
  }
  return '';
}

async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await fs.stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}
