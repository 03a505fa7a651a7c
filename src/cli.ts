#!/usr/bin/env node

/**
 * branch-mirror-sync - one-shot mirror of a repository branch into a local
 * directory
 *
 * Exit codes: 0 everything applied, 2 some files failed (or the run was
 * interrupted), 1 nothing could be done.
 */

import { promises as fs } from 'fs';
import { confirm } from '@inquirer/prompts';
import { GitHubArchiveClient } from './api/githubArchiveClient.js';
import type { ArchiveProvider } from './api/archiveProvider.js';
import { MirrorService, formatResult } from './core/sync/MirrorService.js';
import type { ProgressCallback } from './core/sync/types.js';
import { REPOSITORY_PATTERN } from './config/mirrorConfig.js';
import { ValidationError, errorMessage } from './errors/mirrorErrors.js';
import { resolveLocalPath } from './utils/pathExpansion.js';
import { isEntryPoint } from './utils/entryPoint.js';
import { setLogLevel } from './utils/logger.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  FATAL: 1,
  PARTIAL: 2
} as const;

export interface CliOptions {
  repo: string;
  branch: string;
  localDir: string;
  subDir?: string;
  token?: string;
  yes: boolean;
}

export interface CliIO {
  print(line: string): void;
  printError(line: string): void;
  confirm(message: string): Promise<boolean>;
  env: NodeJS.ProcessEnv;
  createProvider(token: string | undefined): ArchiveProvider;
  signal?: AbortSignal;
}

export const USAGE = `Usage: branch-mirror-sync --repo <owner/name> --branch <ref> --local-dir <dir> [options]

Mirror a GitHub repository branch into a local directory (one-way).

Options:
  --repo <owner/name>   Repository, e.g. octocat/Hello-World
  --branch <ref>        Branch to mirror, e.g. main
  --local-dir <dir>     Destination directory
  --sub-dir <path>      Only mirror this directory of the repository
  --token <token>       GitHub token (default: $GITHUB_TOKEN)
  -y, --yes             Create a missing destination without asking
  -h, --help            Show this help`;

const VALUE_FLAGS: Record<string, keyof Omit<CliOptions, 'yes'>> = {
  '--repo': 'repo',
  '--branch': 'branch',
  '--local-dir': 'localDir',
  '--sub-dir': 'subDir',
  '--token': 'token'
};

/**
 * Parse argv (without node and script). Returns null for --help.
 *
 * @throws ValidationError on unknown flags or missing values
 */
export function parseCliArgs(args: string[]): CliOptions | null {
  const values: Partial<Record<keyof Omit<CliOptions, 'yes'>, string>> = {};
  let yes = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '-h' || arg === '--help') {
      return null;
    }
    if (arg === '-y' || arg === '--yes') {
      yes = true;
      continue;
    }

    const [flag, inlineValue]: [string, string | undefined] = arg.includes('=') ? splitOnce(arg, '=') : [arg, undefined];
    const key = VALUE_FLAGS[flag];
    if (!key) {
      throw new ValidationError('argument', arg, `one of ${Object.keys(VALUE_FLAGS).join(', ')}, --yes, --help`);
    }

    const value = inlineValue ?? args[++i];
    if (value === undefined || value === '') {
      throw new ValidationError(flag, value, 'a value');
    }
    values[key] = value;
  }

  const { repo, branch, localDir } = values;
  if (!repo || !REPOSITORY_PATTERN.test(repo)) {
    throw new ValidationError('--repo', repo, 'owner/name');
  }
  if (!branch) {
    throw new ValidationError('--branch', branch, 'a branch name');
  }
  if (!localDir) {
    throw new ValidationError('--local-dir', localDir, 'a directory path');
  }

  return { repo, branch, localDir, subDir: values.subDir, token: values.token, yes };
}

/**
 * Run the CLI and return the process exit code
 */
export async function runCli(args: string[], io: CliIO): Promise<number> {
  let options: CliOptions | null;
  try {
    options = parseCliArgs(args);
  } catch (error) {
    io.printError(`Error: ${errorMessage(error)}`);
    io.printError(USAGE);
    return EXIT_CODES.FATAL;
  }
  if (!options) {
    io.print(USAGE);
    return EXIT_CODES.SUCCESS;
  }

  const localDir = resolveLocalPath(options.localDir);
  if (!(await isDirectory(localDir))) {
    const create = options.yes || (await io.confirm(`Local directory '${localDir}' does not exist. Create it?`));
    if (!create) {
      io.printError('Cancelled.');
      return EXIT_CODES.FATAL;
    }
  }

  const token = options.token || io.env.GITHUB_TOKEN || undefined;
  const service = new MirrorService({ provider: io.createProvider(token) });
  const label = `${options.repo}@${options.branch}${options.subDir ? `/${options.subDir}` : ''}`;
  io.print(`Syncing ${label} -> ${localDir}`);

  try {
    const result = await service.syncFromArchive({
      repository: options.repo,
      ref: options.branch,
      destination: localDir,
      subPath: options.subDir,
      onProgress: printProgress(io),
      onDownloadProgress: (megabytes, done) => {
        if (done) io.print(`Downloaded ${megabytes.toFixed(1)} MB`);
      },
      signal: io.signal
    });

    for (const failure of result.failures) {
      io.printError(`  [ERROR] ${failure.action} ${failure.path}: ${failure.code || failure.reason}`);
    }
    io.print(formatResult(result));

    return result.errors > 0 || result.cancelled ? EXIT_CODES.PARTIAL : EXIT_CODES.SUCCESS;
  } catch (error) {
    io.printError(`Error: ${errorMessage(error)}`);
    return EXIT_CODES.FATAL;
  }
}

function printProgress(io: CliIO): ProgressCallback {
  return (phase, current, total, message) => {
    if (phase === 'syncing') {
      io.print(`  [${current}/${total}] ${message}`);
    } else if (phase === 'discovering') {
      io.print(message);
    }
  };
}

function splitOnce(value: string, separator: string): [string, string] {
  const index = value.indexOf(separator);
  return [value.slice(0, index), value.slice(index + 1)];
}

async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await fs.stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}

if (isEntryPoint(import.meta.url)) {
  // The sync's own lines go to stdout; keep stderr for problems
  setLogLevel('warn');
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  runCli(process.argv.slice(2), {
    print: line => console.log(line),
    printError: line => console.error(line),
    confirm: message => confirm({ message, default: false }),
    env: process.env,
    createProvider: token => new GitHubArchiveClient({ token }),
    signal: controller.signal
  })
    .then(code => process.exit(code))
    .catch((error: unknown) => {
      console.error(`Error: ${errorMessage(error)}`);
      process.exit(EXIT_CODES.FATAL);
    });
}
