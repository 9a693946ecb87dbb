import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { writeFile } from 'fs/promises';
import { join } from 'path';

import { createExecutionContext, readProjectManifest } from '../../src/core/execution-context.js';
import { InvalidManifestError, ValidationError } from '../../src/utils/errors.js';
import { makeTempDir, removeTempDir } from '../test-helpers.js';

describe('createExecutionContext', () => {
  let root: string;

  before(async () => {
    root = await makeTempDir();
    await writeFile(join(root, 'deplock.config.json'), '{ "lockfile": "locks/app.lock" }', 'utf8');
  });

  after(async () => {
    await removeTempDir(root);
  });

  it('resolves the project root and the lock path from configuration', async () => {
    const ctx = await createExecutionContext({ cwd: root });

    assert.equal(ctx.projectRoot, root);
    assert.equal(ctx.config.lockfile, 'locks/app.lock');
    assert.equal(ctx.lockStore.path, join(root, 'locks', 'app.lock'));
    assert.equal(ctx.output, undefined);
  });

  it('rejects a project directory that does not exist', async () => {
    await assert.rejects(createExecutionContext({ cwd: join(root, 'missing') }), ValidationError);
  });

  it('requires a manifest in the project root', async () => {
    await assert.rejects(
      readProjectManifest(root),
      (error: unknown) =>
        error instanceof InvalidManifestError &&
        error.message === `Invalid manifest at ${root}: no deplock.yml found`
    );
  });
});
