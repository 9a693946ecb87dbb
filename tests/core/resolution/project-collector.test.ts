import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { resolve } from 'path';

import { collectProjectRequirements } from '../../../src/core/resolution/project-collector.js';
import type { ProjectManifest } from '../../../src/types/index.js';
import { ConflictingOverrideError, PathNotFoundError } from '../../../src/utils/errors.js';
import { InMemoryPathReader } from '../../test-helpers.js';

const baseDir = resolve('/workspace/app');
const dirA = resolve('/workspace/a');
const dirB = resolve('/workspace/b');

function app(dependencies: ProjectManifest['dependencies']): ProjectManifest {
  return { name: 'app', dependencies };
}

describe('collectProjectRequirements', () => {
  it('returns root requirements when there are no path dependencies', async () => {
    const reader = new InMemoryPathReader({});
    const layer = await collectProjectRequirements(
      app([{ name: 'ecto', version: '0.2.0' }, { name: 'postgrex', version: '>= 0.0.0' }]),
      baseDir,
      reader
    );

    assert.deepEqual(layer.requirements.map(requirement => requirement.identity), ['ecto', 'postgrex']);
    assert.equal(layer.pathPackages.size, 0);
    assert.deepEqual(reader.reads, []);
  });

  it('follows path packages declared by path packages', async () => {
    const reader = new InMemoryPathReader({
      [dirA]: { name: 'local_a', dependencies: [{ name: 'local_b', path: '../b' }] },
      [dirB]: { name: 'local_b', dependencies: [{ name: 'ecto', version: '0.2.0' }] }
    });

    const layer = await collectProjectRequirements(app([{ name: 'local_a', path: '../a' }]), baseDir, reader);

    assert.deepEqual([...layer.pathPackages.keys()], ['local_a', 'local_b']);
    assert.equal(layer.pathPackages.get('local_b')?.location, dirB);
    assert.deepEqual(
      layer.requirements.map(requirement => `${requirement.requestor}:${requirement.identity}`),
      ['root:local_a', 'local_a:local_b', 'local_b:ecto']
    );
    assert.deepEqual(reader.reads, [dirA, dirB]);
  });

  it('does not read a path package that loses to an explicit override', async () => {
    const reader = new InMemoryPathReader({
      [dirA]: { name: 'local_a', dependencies: [{ name: 'local_b', path: '../b' }] }
    });

    const layer = await collectProjectRequirements(
      app([{ name: 'local_a', path: '../a' }, { name: 'local_b', version: '1.0.0', override: true }]),
      baseDir,
      reader
    );

    assert.deepEqual([...layer.pathPackages.keys()], ['local_a']);
    assert.deepEqual(
      layer.requirements.map(requirement => `${requirement.requestor}:${requirement.identity}`),
      ['root:local_a', 'root:local_b', 'local_a:local_b']
    );
    assert.deepEqual(layer.requirements[2]?.source, { type: 'registry' });
    assert.deepEqual(layer.root.map(requirement => `${requirement.requestor}:${requirement.identity}`), ['root:local_a', 'root:local_b']);
    assert.deepEqual(reader.reads, [dirA]);
  });

  it('rejects path packages that disagree on a location', async () => {
    const reader = new InMemoryPathReader({
      [dirA]: { name: 'local_a', dependencies: [{ name: 'local_b', path: '../b2' }] },
      [resolve('/workspace/b1')]: { name: 'local_b', dependencies: [] }
    });

    await assert.rejects(
      collectProjectRequirements(
        app([{ name: 'local_a', path: '../a' }, { name: 'local_b', path: '../b1' }]),
        baseDir,
        reader
      ),
      ConflictingOverrideError
    );
  });

  it('propagates a missing path package', async () => {
    await assert.rejects(
      collectProjectRequirements(app([{ name: 'local_a', path: '../a' }]), baseDir, new InMemoryPathReader({})),
      PathNotFoundError
    );
  });
});
