import { expect } from 'chai';
import { describe, it, beforeEach, afterEach } from 'mocha';
import * as sinon from 'sinon';
import * as fs from 'fs/promises';
import * as path from 'path';

import { EXIT_CODES, USAGE, parseCliArgs, runCli, type CliIO } from '../../src/cli.js';
import type { ArchiveProvider } from '../../src/api/archiveProvider.js';
import { ValidationError } from '../../src/errors/mirrorErrors.js';
import { LocalArchiveProvider, exists, makeTempDir, readTree, removeDir, writeTree } from '../helpers/treeFixtures.js';

describe('branch-mirror-sync CLI', () => {
  describe('parseCliArgs', () => {
    it('should accept separate and inline values', () => {
      expect(parseCliArgs(['--repo', 'octo/site', '--branch=main', '--local-dir', '/srv/site', '-y'])).to.deep.equal({
        repo: 'octo/site',
        branch: 'main',
        localDir: '/srv/site',
        subDir: undefined,
        token: undefined,
        yes: true
      });
    });

    it('should return null for help', () => {
      expect(parseCliArgs(['--repo', 'octo/site', '--help'])).to.be.null;
    });

    it('should reject unknown flags', () => {
      expect(() => parseCliArgs(['--force'])).to.throw(
        ValidationError,
        'Invalid argument: expected one of --repo, --branch, --local-dir, --sub-dir, --token, --yes, --help, got "--force"'
      );
    });

    it('should reject a flag without a value', () => {
      expect(() => parseCliArgs(['--branch', 'main', '--repo'])).to.throw(
        ValidationError,
        'Invalid --repo: expected a value, got "undefined"'
      );
    });

    it('should require a well-formed repository and the mandatory flags', () => {
      expect(() => parseCliArgs(['--repo', 'octo', '--branch', 'main', '--local-dir', 'x'])).to.throw(
        'Invalid --repo: expected owner/name, got "octo"'
      );
      expect(() => parseCliArgs(['--repo', 'octo/site', '--local-dir', 'x'])).to.throw('Invalid --branch');
      expect(() => parseCliArgs(['--repo', 'octo/site', '--branch', 'main'])).to.throw('Invalid --local-dir');
    });
  });

  describe('runCli', () => {
    let tempDir: string;
    let provider: LocalArchiveProvider;
    let output: string[];
    let errors: string[];
    let confirm: sinon.SinonStub<[string], Promise<boolean>>;
    let createProvider: sinon.SinonStub<[string | undefined], ArchiveProvider>;

    const io = (overrides: Partial<CliIO> = {}): CliIO => ({
      print: line => output.push(line),
      printError: line => errors.push(line),
      confirm,
      env: {},
      createProvider,
      ...overrides
    });

    const args = (localDir: string, ...extra: string[]) => [
      '--repo', 'octo/site', '--branch', 'main', '--local-dir', localDir, ...extra
    ];

    beforeEach(async () => {
      tempDir = await makeTempDir('cli-test-');
      await writeTree(path.join(tempDir, 'snapshots', 'main'), { 'a.txt': 'A', 'docs/b.md': 'B' });
      provider = new LocalArchiveProvider(path.join(tempDir, 'snapshots'));
      output = [];
      errors = [];
      confirm = sinon.stub<[string], Promise<boolean>>().resolves(true);
      createProvider = sinon.stub<[string | undefined], ArchiveProvider>().returns(provider);
    });

    afterEach(async () => {
      sinon.restore();
      await removeDir(tempDir);
    });

    it('should print usage for --help', async () => {
      const code = await runCli(['--help'], io());

      expect(code).to.equal(EXIT_CODES.SUCCESS);
      expect(output).to.deep.equal([USAGE]);
    });

    it('should print the error and usage for bad arguments', async () => {
      const code = await runCli(['--repo', 'octo/site'], io());

      expect(code).to.equal(EXIT_CODES.FATAL);
      expect(errors).to.deep.equal(['Error: Invalid --branch: expected a branch name, got "undefined"', USAGE]);
    });

    it('should mirror into an existing directory and print each step', async () => {
      const localDir = path.join(tempDir, 'site');
      await writeTree(localDir, { 'a.txt': 'A' });

      const code = await runCli(args(localDir), io());

      expect(code).to.equal(EXIT_CODES.SUCCESS);
      expect(output).to.deep.equal([
        `Syncing octo/site@main -> ${localDir}`,
        'Downloading octo/site@main',
        'Comparing files',
        '  [1/1] Created docs/b.md',
        'Sync complete: 1 created, 0 updated, 0 deleted, 1 unchanged'
      ]);
      expect(confirm.called).to.be.false;
      expect(await readTree(localDir)).to.deep.equal({ 'a.txt': 'A', 'docs/b.md': 'B' });
    });

    it('should ask before creating a missing directory', async () => {
      const localDir = path.join(tempDir, 'new');

      const code = await runCli(args(localDir), io());

      expect(code).to.equal(EXIT_CODES.SUCCESS);
      expect(confirm.calledOnceWithExactly(`Local directory '${localDir}' does not exist. Create it?`)).to.be.true;
      expect(await readTree(localDir)).to.deep.equal({ 'a.txt': 'A', 'docs/b.md': 'B' });
    });

    it('should stop when creation is declined', async () => {
      confirm.resolves(false);
      const localDir = path.join(tempDir, 'new');

      const code = await runCli(args(localDir), io());

      expect(code).to.equal(EXIT_CODES.FATAL);
      expect(errors).to.deep.equal(['Cancelled.']);
      expect(await exists(localDir)).to.be.false;
      expect(createProvider.called).to.be.false;
    });

    it('should not ask with --yes', async () => {
      const code = await runCli(args(path.join(tempDir, 'new'), '--yes'), io());

      expect(code).to.equal(EXIT_CODES.SUCCESS);
      expect(confirm.called).to.be.false;
    });

    it('should take the token from the environment unless given', async () => {
      const localDir = path.join(tempDir, 'site');

      await runCli(args(localDir, '-y'), io({ env: { GITHUB_TOKEN: 'test-secret' } }));
      await runCli(args(localDir, '--token', 'test-flag-secret'), io({ env: { GITHUB_TOKEN: 'test-secret' } }));
      await runCli(args(localDir), io());

      expect(createProvider.args).to.deep.equal([['test-secret'], ['test-flag-secret'], [undefined]]);
    });

    it('should pass the sub-directory to the provider', async () => {
      const localDir = path.join(tempDir, 'docs');

      const code = await runCli(args(localDir, '--sub-dir', 'docs', '-y'), io());

      expect(code).to.equal(EXIT_CODES.SUCCESS);
      expect(output[0]).to.equal(`Syncing octo/site@main/docs -> ${localDir}`);
      expect(await readTree(localDir)).to.deep.equal({ 'b.md': 'B' });
    });

    it('should print failed steps and exit with PARTIAL', async () => {
      await fs.symlink(path.join(tempDir, 'nowhere'), path.join(tempDir, 'snapshots', 'main', 'broken'));
      const localDir = path.join(tempDir, 'site');

      const code = await runCli(args(localDir, '-y'), io());

      expect(code).to.equal(EXIT_CODES.PARTIAL);
      expect(output).to.deep.equal([
        `Syncing octo/site@main -> ${localDir}`,
        'Downloading octo/site@main',
        'Comparing files',
        '  [1/3] Created a.txt',
        '  [2/3] Failed to create broken: ENOENT',
        '  [3/3] Created docs/b.md',
        'Sync complete: 2 created, 0 updated, 0 deleted, 0 unchanged, 1 failed'
      ]);
      expect(errors).to.deep.equal(['  [ERROR] create broken: ENOENT']);
    });

    it('should exit with FATAL when the archive cannot be obtained', async () => {
      const code = await runCli(['--repo', 'octo/site', '--branch', 'gone', '--local-dir', tempDir], io());

      expect(code).to.equal(EXIT_CODES.FATAL);
      expect(errors).to.deep.equal(['Error: Not found (404): gone']);
    });

    it('should exit with PARTIAL when interrupted', async () => {
      const controller = new AbortController();
      controller.abort();
      const localDir = path.join(tempDir, 'site');

      const code = await runCli(args(localDir, '-y'), io({ signal: controller.signal }));

      expect(code).to.equal(EXIT_CODES.PARTIAL);
      expect(output[output.length - 1]).to.equal('Sync cancelled: 0 created, 0 updated, 0 deleted, 0 unchanged');
      expect(await readTree(localDir)).to.deep.equal({});
    });
  });
});
