import { expect } from 'chai';
import { describe, it, beforeEach, afterEach } from 'mocha';
import * as sinon from 'sinon';
import * as fs from 'fs/promises';
import * as path from 'path';

import { PlanExecutor, nodeFileSystem, type FileSystemOps } from '../../../../src/core/sync/PlanExecutor.js';
import type { ChangeOp, CopyOperation } from '../../../../src/core/sync/types.js';
import { exists, listDirectories, makeTempDir, readTree, removeDir, writeTree } from '../../../helpers/treeFixtures.js';

function permissionDenied(target: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(`EACCES: permission denied, open '${target}'`);
  error.code = 'EACCES';
  return error;
}

describe('PlanExecutor', () => {
  let tempDir: string;
  let source: string;
  let destination: string;

  const create = (rel: string): CopyOperation => ({
    kind: 'create',
    path: rel,
    sourcePath: path.join(source, rel),
    destinationPath: path.join(destination, rel)
  });
  const update = (rel: string): ChangeOp => ({ ...create(rel), kind: 'update' });
  const remove = (rel: string): ChangeOp => ({
    kind: 'delete',
    path: rel,
    destinationPath: path.join(destination, rel)
  });

  beforeEach(async () => {
    tempDir = await makeTempDir('executor-test-');
    source = path.join(tempDir, 'source');
    destination = path.join(tempDir, 'destination');
    await fs.mkdir(destination, { recursive: true });
  });

  afterEach(async () => {
    await removeDir(tempDir);
    sinon.restore();
  });

  it('should apply creates, updates and deletes', async () => {
    await writeTree(source, { 'a.txt': 'new a', 'sub/b.txt': 'new b' });
    await writeTree(destination, { 'sub/b.txt': 'old b', 'gone.txt': 'x' });

    const result = await new PlanExecutor().execute(
      [create('a.txt'), update('sub/b.txt'), remove('gone.txt')],
      { destinationRoot: destination, skipped: 3 }
    );

    expect(result).to.deep.equal({
      skipped: 3,
      created: 1,
      updated: 1,
      deleted: 1,
      errors: 0,
      failures: [],
      cancelled: false
    });
    expect(await readTree(destination)).to.deep.equal({ 'a.txt': 'new a', 'sub/b.txt': 'new b' });
  });

  it('should create missing parent directories', async () => {
    await writeTree(source, { 'deep/er/file.txt': 'f' });

    await new PlanExecutor().execute([create('deep/er/file.txt')], { destinationRoot: destination });

    expect(await readTree(destination)).to.deep.equal({ 'deep/er/file.txt': 'f' });
  });

  it('should copy modification times', async () => {
    await writeTree(source, { 'a.txt': 'a' });
    const mtime = new Date('2020-01-02T03:04:05Z');
    await fs.utimes(path.join(source, 'a.txt'), mtime, mtime);

    await new PlanExecutor().execute([create('a.txt')], { destinationRoot: destination });

    const stat = await fs.stat(path.join(destination, 'a.txt'));
    expect(stat.mtime.getTime()).to.equal(mtime.getTime());
  });

  it('should record a failing operation and continue with the rest', async () => {
    await writeTree(source, { '1.txt': '1', '2.txt': '2', '3.txt': '3' });
    await writeTree(destination, { '4.txt': '4', '5.txt': '5' });
    const locked = path.join(destination, '3.txt');
    const fileSystem: FileSystemOps = {
      ...nodeFileSystem,
      copyFile: async (from, to) => {
        if (to === locked) throw permissionDenied(to);
        await nodeFileSystem.copyFile(from, to);
      }
    };

    const progress: string[] = [];
    const result = await new PlanExecutor(fileSystem).execute(
      [create('1.txt'), create('2.txt'), create('3.txt'), remove('4.txt'), remove('5.txt')],
      {
        destinationRoot: destination,
        onProgress: (phase, current, total, message) => progress.push(`${phase} ${current}/${total} ${message}`)
      }
    );

    expect(result.created).to.equal(2);
    expect(result.deleted).to.equal(2);
    expect(result.errors).to.equal(1);
    expect(result.failures).to.deep.equal([
      {
        path: '3.txt',
        action: 'create',
        code: 'EACCES',
        reason: `EACCES: permission denied, open '${locked}'`
      }
    ]);
    expect(await readTree(destination)).to.deep.equal({ '1.txt': '1', '2.txt': '2' });
    expect(progress).to.deep.equal([
      'syncing 1/5 Created 1.txt',
      'syncing 2/5 Created 2.txt',
      'syncing 3/5 Failed to create 3.txt: EACCES',
      'syncing 4/5 Deleted 4.txt',
      'syncing 5/5 Deleted 5.txt'
    ]);
  });

  it('should record a failed delete without aborting', async () => {
    await writeTree(destination, { 'keep.txt': 'k', 'drop.txt': 'd' });
    const fileSystem: FileSystemOps = {
      ...nodeFileSystem,
      unlink: async (target) => {
        if (target.endsWith('keep.txt')) throw permissionDenied(target);
        await nodeFileSystem.unlink(target);
      }
    };

    const result = await new PlanExecutor(fileSystem).execute(
      [remove('drop.txt'), remove('keep.txt')],
      { destinationRoot: destination }
    );

    expect(result.deleted).to.equal(1);
    expect(result.errors).to.equal(1);
    expect(result.failures[0].action).to.equal('delete');
    expect(result.failures[0].path).to.equal('keep.txt');
    expect(await readTree(destination)).to.deep.equal({ 'keep.txt': 'k' });
  });

  it('should count a file that vanished before its delete as deleted', async () => {
    const result = await new PlanExecutor().execute([remove('already-gone.txt')], { destinationRoot: destination });

    expect(result.deleted).to.equal(1);
    expect(result.errors).to.equal(0);
  });

  it('should record a missing source file as a failure', async () => {
    await fs.mkdir(source, { recursive: true });

    const result = await new PlanExecutor().execute([create('vanished.txt')], { destinationRoot: destination });

    expect(result.created).to.equal(0);
    expect(result.errors).to.equal(1);
    expect(result.failures[0].code).to.equal('ENOENT');
  });

  it('should remove directories emptied by deletes, up to but excluding the root', async () => {
    await writeTree(destination, { 'a/b/c/only.txt': 'x', 'a/keep.txt': 'k', 'top.txt': 't' });

    await new PlanExecutor().execute([remove('a/b/c/only.txt')], { destinationRoot: destination });

    expect(await listDirectories(destination)).to.deep.equal(['a']);
    expect(await readTree(destination)).to.deep.equal({ 'a/keep.txt': 'k', 'top.txt': 't' });
  });

  it('should keep the destination root even when it ends up empty', async () => {
    await writeTree(destination, { 'x/y.txt': 'y' });

    await new PlanExecutor().execute([remove('x/y.txt')], { destinationRoot: destination });

    expect(await exists(destination)).to.be.true;
    expect(await fs.readdir(destination)).to.deep.equal([]);
  });

  it('should not descend into links to directories while pruning', async () => {
    const outside = path.join(tempDir, 'outside');
    await fs.mkdir(path.join(outside, 'empty'), { recursive: true });
    await fs.symlink(outside, path.join(destination, 'link'));

    await new PlanExecutor().execute([], { destinationRoot: destination });

    expect(await exists(path.join(outside, 'empty'))).to.be.true;
    expect(await fs.readdir(destination)).to.deep.equal(['link']);
  });

  it('should stop between operations once the signal is aborted', async () => {
    await writeTree(source, { '1.txt': '1', '2.txt': '2', '3.txt': '3' });
    const controller = new AbortController();

    const result = await new PlanExecutor().execute(
      [create('1.txt'), create('2.txt'), create('3.txt')],
      {
        destinationRoot: destination,
        signal: controller.signal,
        onProgress: (_phase, current) => {
          if (current === 1) controller.abort();
        }
      }
    );

    expect(result.cancelled).to.be.true;
    expect(result.created).to.equal(1);
    expect(await readTree(destination)).to.deep.equal({ '1.txt': '1' });
  });

  it('should treat an uncopyable timestamp as success', async () => {
    await writeTree(source, { 'a.txt': 'a' });
    const fileSystem: FileSystemOps = {
      ...nodeFileSystem,
      utimes: sinon.stub<[string, Date, Date], Promise<void>>().rejects(new Error('EPERM'))
    };

    const result = await new PlanExecutor(fileSystem).execute([create('a.txt')], { destinationRoot: destination });

    expect(result.created).to.equal(1);
    expect(result.errors).to.equal(0);
  });
});
