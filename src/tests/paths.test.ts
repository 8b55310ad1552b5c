import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  canonicalize,
  canonicalizeRoots,
  deepestExistingAncestor,
  expandHome,
  findContainingRoot,
  isWithin,
} from '../core/paths.js';
import { makeSandbox, type Sandbox } from './fixtures.js';

describe('canonicalize', () => {
  let sandbox: Sandbox;

  beforeEach(() => {
    sandbox = makeSandbox('guardrun-paths-');
  });

  afterEach(() => {
    sandbox.cleanup();
  });

  it('resolves relative paths and .. segments against the base', () => {
    assert.strictEqual(canonicalize('a/../b.txt', sandbox.root), path.join(sandbox.root, 'b.txt'));
    assert.strictEqual(canonicalize('..', sandbox.root), sandbox.base);
  });

  it('keeps missing trailing segments below the deepest existing directory', () => {
    assert.strictEqual(
      canonicalize('new/dir/file.txt', sandbox.root),
      path.join(sandbox.root, 'new', 'dir', 'file.txt'),
    );
  });

  it('follows symlinks that exist on disk', () => {
    fs.symlinkSync(sandbox.outside, path.join(sandbox.root, 'link'));
    assert.strictEqual(canonicalize('link/file.txt', sandbox.root), path.join(sandbox.outside, 'file.txt'));
  });

  it('applies .. to the target of a symlink, not to the link', () => {
    fs.mkdirSync(path.join(sandbox.outside, 'sub'));
    fs.symlinkSync(path.join(sandbox.outside, 'sub'), path.join(sandbox.root, 'link'));
    assert.strictEqual(canonicalize('link/../secret.txt', sandbox.root), path.join(sandbox.outside, 'secret.txt'));
    assert.strictEqual(canonicalize('link/../new/file.txt', sandbox.root), path.join(sandbox.outside, 'new', 'file.txt'));
  });

  it('still follows symlinks after climbing out of a missing directory', () => {
    fs.symlinkSync(sandbox.outside, path.join(sandbox.root, 'link'));
    assert.strictEqual(canonicalize('missing/../link/x.txt', sandbox.root), path.join(sandbox.outside, 'x.txt'));
  });

  it('follows relative symlink targets from the link directory', () => {
    fs.mkdirSync(path.join(sandbox.root, 'nested'));
    fs.symlinkSync('../../outside', path.join(sandbox.root, 'nested', 'up'));
    assert.strictEqual(canonicalize('nested/up/file.txt', sandbox.root), path.join(sandbox.outside, 'file.txt'));
  });

  it('follows a dangling symlink to its target', () => {
    fs.symlinkSync(path.join(sandbox.outside, 'missing.txt'), path.join(sandbox.root, 'dangling'));
    assert.strictEqual(canonicalize('dangling', sandbox.root), path.join(sandbox.outside, 'missing.txt'));
  });

  it('expands ~ to the home directory', () => {
    assert.strictEqual(expandHome('~/notes'), path.join(os.homedir(), 'notes'));
    assert.strictEqual(expandHome('~'), os.homedir());
    assert.strictEqual(expandHome('a/~'), 'a/~');
  });

  it('finds the deepest existing ancestor', () => {
    assert.strictEqual(deepestExistingAncestor(path.join(sandbox.root, 'x', 'y')), sandbox.root);
    assert.strictEqual(deepestExistingAncestor(sandbox.outside), sandbox.outside);
  });

  it('drops roots that cannot be resolved', () => {
    fs.symlinkSync(path.join(sandbox.base, 'loop-b'), path.join(sandbox.base, 'loop-a'));
    fs.symlinkSync(path.join(sandbox.base, 'loop-a'), path.join(sandbox.base, 'loop-b'));
    assert.deepStrictEqual(canonicalizeRoots([sandbox.root, path.join(sandbox.base, 'loop-a')]), [sandbox.root]);
  });
});

describe('containment', () => {
  it('treats a root as containing itself and its descendants', () => {
    assert.strictEqual(isWithin('/srv/app', '/srv/app'), true);
    assert.strictEqual(isWithin('/srv/app/src/index.ts', '/srv/app'), true);
  });

  it('does not match on a shared name prefix', () => {
    assert.strictEqual(isWithin('/srv/app-evil/x', '/srv/app'), false);
    assert.strictEqual(isWithin('/srv', '/srv/app'), false);
  });

  it('returns the first containing root', () => {
    assert.strictEqual(findContainingRoot('/data/b/file', ['/data/a', '/data/b']), '/data/b');
    assert.strictEqual(findContainingRoot('/etc/passwd', ['/data/a', '/data/b']), null);
  });
});
