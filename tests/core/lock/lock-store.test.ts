import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { readdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';

import { LockStore } from '../../../src/core/lock/lock-store.js';
import { parseLock } from '../../../src/core/lock/lock-format.js';
import type { ResolutionResult, ResolvedPackage } from '../../../src/core/resolution/types.js';
import { InvalidLockfileError } from '../../../src/utils/errors.js';
import { makeTempDir, removeTempDir } from '../../test-helpers.js';

function registryPackage(identity: string, version: string, extra: Partial<ResolvedPackage> = {}): ResolvedPackage {
  return {
    identity,
    registryName: identity,
    version,
    source: { type: 'registry' },
    requestedBy: ['root'],
    requirementsSatisfied: true,
    ...extra
  };
}

describe('LockStore', () => {
  let root: string;
  let store: LockStore;
  let result: ResolutionResult;

  beforeEach(async () => {
    root = await makeTempDir();
    store = new LockStore(join(root, 'deplock.lock'), root);
    result = {
      packages: new Map<string, ResolvedPackage>([
        ['postgrex', registryPackage('postgrex', '0.2.1')],
        ['ecto', registryPackage('ecto', '0.2.0', { checksum: 'sha256-test-ecto' })],
        [
          'local_lib',
          {
            identity: 'local_lib',
            registryName: 'local_lib',
            version: '0.1.0',
            source: { type: 'path', location: join(root, 'vendor', 'local_lib') },
            requestedBy: ['root'],
            requirementsSatisfied: true
          }
        ],
        ['decimal', registryPackage('decimal', '1.2.0', { registryName: 'decimal_fork' })]
      ]),
      warnings: []
    };
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('reads an empty lock when no file exists', async () => {
    const lock = await store.read();
    assert.equal(lock.size, 0);
  });

  it('writes entries sorted by identity with a fixed field order', async () => {
    assert.equal(await store.write(result), true);

    const content = await readFile(join(root, 'deplock.lock'), 'utf8');
    assert.equal(
      content,
      [
        '# This file is generated by deplock. Do not edit it by hand.',
        'lockfileVersion: 1',
        'packages:',
        '  decimal:',
        '    source: registry',
        '    package: decimal_fork',
        '    version: 1.2.0',
        '  ecto:',
        '    source: registry',
        '    package: ecto',
        '    version: 0.2.0',
        '    checksum: sha256-test-ecto',
        '  local_lib:',
        '    source: path',
        '    path: vendor/local_lib',
        '    version: 0.1.0',
        '  postgrex:',
        '    source: registry',
        '    package: postgrex',
        '    version: 0.2.1',
        ''
      ].join('\n')
    );
  });

  it('does not rewrite an unchanged lock', async () => {
    assert.equal(await store.write(result), true);
    assert.equal(await store.write(result), false);
    assert.deepEqual(await readdir(root), ['deplock.lock']);
  });

  it('reads back what it wrote', async () => {
    await store.write(result);
    const lock = await store.read();

    assert.deepEqual([...lock.keys()], ['decimal', 'ecto', 'local_lib', 'postgrex']);
    assert.deepEqual(lock.get('decimal'), {
      source: 'registry',
      identity: 'decimal',
      registryName: 'decimal_fork',
      version: '1.2.0'
    });
    assert.deepEqual(lock.get('local_lib'), {
      source: 'path',
      identity: 'local_lib',
      path: 'vendor/local_lib',
      version: '0.1.0'
    });
  });

  it('rejects a lock file from another format version', async () => {
    await writeFile(join(root, 'deplock.lock'), 'lockfileVersion: 2\npackages: {}\n', 'utf8');
    await assert.rejects(
      store.read(),
      (error: unknown) =>
        error instanceof InvalidLockfileError &&
        error.message === `Invalid lock file ${join(root, 'deplock.lock')}: unsupported lockfileVersion '2'`
    );
  });
});

describe('parseLock', () => {
  it('treats an empty document as an empty lock', () => {
    assert.equal(parseLock('', 'deplock.lock').size, 0);
  });

  it('accepts non-semantic versions on path entries only', () => {
    const lock = parseLock(
      'lockfileVersion: 1\npackages:\n  tool:\n    source: path\n    path: tool\n    version: dev\n',
      'deplock.lock'
    );
    assert.equal(lock.get('tool')?.version, 'dev');

    assert.throws(
      () => parseLock(
        'lockfileVersion: 1\npackages:\n  ecto:\n    source: registry\n    package: ecto\n    version: dev\n',
        'deplock.lock'
      ),
      (error: unknown) =>
        error instanceof InvalidLockfileError &&
        error.message === "Invalid lock file deplock.lock: entry 'ecto' has invalid version 'dev'"
    );
  });

  it('rejects entries with an unknown source', () => {
    assert.throws(
      () => parseLock('lockfileVersion: 1\npackages:\n  ecto:\n    source: git\n    version: 1.0.0\n', 'deplock.lock'),
      InvalidLockfileError
    );
  });
});
