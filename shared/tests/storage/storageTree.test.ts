/**
 * Tests for the storage root boundary and folder cursor.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import * as fs from 'fs/promises';
import * as path from 'path';

import { StorageTree } from '../../src/storage/StorageTree.js';
import { InvalidNameError, IoFailureError, NotFoundError } from '../../src/utils/errorTypes.js';
import { makeScratchDir, removeScratchDir } from '../helpers/fixtures.js';

describe('StorageTree', () => {
  let scratch: string;
  let rootPath: string;

  beforeEach(async () => {
    scratch = await makeScratchDir();
    rootPath = path.join(scratch, 'alice');
  });

  afterEach(async () => {
    await removeScratchDir(scratch);
  });

  describe('ensureRoot', () => {
    it('should create a missing root', async () => {
      const tree = await StorageTree.open(rootPath);

      const stats = await fs.stat(rootPath);
      assert.ok(stats.isDirectory());
      assert.strictEqual(tree.rootPath, rootPath);
      assert.strictEqual(tree.currentPath, rootPath);
    });

    it('should be idempotent', async () => {
      const tree = await StorageTree.open(rootPath);
      await fs.writeFile(path.join(rootPath, 'keep.txt'), 'data');

      await tree.ensureRoot();

      assert.strictEqual(await fs.readFile(path.join(rootPath, 'keep.txt'), 'utf-8'), 'data');
    });

    it('should fail with IoFailureError when a file is in the way', async () => {
      await fs.writeFile(rootPath, 'not a folder');

      await assert.rejects(StorageTree.open(rootPath), IoFailureError);
    });
  });

  describe('navigation', () => {
    it('should enter child folders and go back up', async () => {
      await fs.mkdir(path.join(rootPath, 'Notes', '2024'), { recursive: true });
      const tree = await StorageTree.open(rootPath);

      await tree.enter('Notes');
      await tree.enter('2024');
      assert.strictEqual(tree.displayPath, '/Notes/2024');
      assert.strictEqual(tree.currentPath, path.join(rootPath, 'Notes', '2024'));
      assert.deepStrictEqual(tree.location().segments, ['Notes', '2024']);

      assert.strictEqual(tree.up(), true);
      assert.strictEqual(tree.displayPath, '/Notes');
    });

    it('should treat up at the root as a no-op', async () => {
      const tree = await StorageTree.open(rootPath);

      assert.strictEqual(tree.up(), false);
      assert.strictEqual(tree.currentPath, rootPath);
      assert.strictEqual(tree.isAtRoot(), true);
    });

    it('should refuse to enter a missing folder', async () => {
      const tree = await StorageTree.open(rootPath);

      await assert.rejects(tree.enter('Nope'), (error: unknown) => {
        assert.ok(error instanceof NotFoundError);
        assert.strictEqual(error.message, "No folder named 'Nope'");
        return true;
      });
      assert.strictEqual(tree.displayPath, '/');
    });

    it('should refuse to enter a file', async () => {
      const tree = await StorageTree.open(rootPath);
      await fs.writeFile(path.join(rootPath, 'a.txt'), 'hi');

      await assert.rejects(tree.enter('a.txt'), NotFoundError);
    });

    it('should refuse dot names', async () => {
      const tree = await StorageTree.open(rootPath);

      await assert.rejects(tree.enter('..'), InvalidNameError);
      await assert.rejects(tree.enter('.'), InvalidNameError);
    });

    it('should report a current folder removed underneath it', async () => {
      await fs.mkdir(path.join(rootPath, 'Gone'), { recursive: true });
      const tree = await StorageTree.open(rootPath);
      await tree.enter('Gone');
      await fs.rm(path.join(rootPath, 'Gone'), { recursive: true });

      await assert.rejects(tree.getCanonicalCurrent(), NotFoundError);
    });
  });

  describe('resolve', () => {
    it('should return the path of a name in the current folder', async () => {
      await fs.mkdir(path.join(rootPath, 'Notes'), { recursive: true });
      const tree = await StorageTree.open(rootPath);
      await tree.enter('Notes');

      assert.strictEqual(await tree.resolve('new.txt'), path.join(rootPath, 'Notes', 'new.txt'));
    });

    it('should reject separators and blank names', async () => {
      const tree = await StorageTree.open(rootPath);

      await assert.rejects(tree.resolve('../escape'), InvalidNameError);
      await assert.rejects(tree.resolve('a\\b'), InvalidNameError);
      await assert.rejects(tree.resolve('   '), InvalidNameError);
    });

    it('should reject a symlink pointing outside the current folder', async () => {
      const tree = await StorageTree.open(rootPath);
      const outside = path.join(scratch, 'outside.txt');
      await fs.writeFile(outside, 'secret');
      await fs.symlink(outside, path.join(rootPath, 'link.txt'));

      await assert.rejects(tree.resolve('link.txt'), (error: unknown) => {
        assert.ok(error instanceof InvalidNameError);
        assert.strictEqual(error.message, "'link.txt' resolves outside the current folder");
        return true;
      });
    });

    it('should reject a symlinked folder pointing outside the root', async () => {
      const tree = await StorageTree.open(rootPath);
      await fs.mkdir(path.join(scratch, 'elsewhere'));
      await fs.symlink(path.join(scratch, 'elsewhere'), path.join(rootPath, 'portal'));

      await assert.rejects(tree.enter('portal'), InvalidNameError);
      assert.strictEqual(tree.isAtRoot(), true);
    });

    it('should accept a symlink that stays inside the current folder', async () => {
      const tree = await StorageTree.open(rootPath);
      await fs.writeFile(path.join(rootPath, 'real.txt'), 'x');
      await fs.symlink(path.join(rootPath, 'real.txt'), path.join(rootPath, 'alias.txt'));

      assert.strictEqual(await tree.resolve('alias.txt'), path.join(rootPath, 'alias.txt'));
    });
  });
});
