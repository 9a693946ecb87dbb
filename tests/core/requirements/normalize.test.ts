import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { resolve } from 'path';

import { normalizeDeclaration, normalizeDeclarations } from '../../../src/core/requirements/normalize.js';
import { InvalidDeclarationError } from '../../../src/utils/errors.js';

const baseDir = resolve('/workspace/my_app');

function rejectsWith(message: string): (error: unknown) => boolean {
  return (error: unknown) => error instanceof InvalidDeclarationError && error.message === message;
}

describe('normalizeDeclaration', () => {
  it('normalizes a registry declaration', () => {
    const requirement = normalizeDeclaration({ name: ' Ecto ', version: '~> 0.2' }, 'root', { baseDir });

    assert.deepEqual(requirement, {
      requestor: 'root',
      identity: 'ecto',
      registryName: 'ecto',
      constraint: '~> 0.2',
      range: '>=0.2.0 <1.0.0',
      source: { type: 'registry' },
      optional: false,
      override: false
    });
  });

  it('keeps the alias as identity and queries the published name', () => {
    const requirement = normalizeDeclaration(
      { name: 'app_name', version: '>= 0.0.0', package: 'package_name' },
      'root',
      { baseDir }
    );
    assert.equal(requirement.identity, 'app_name');
    assert.equal(requirement.registryName, 'package_name');
  });

  it('resolves path sources against the declaring manifest', () => {
    const requirement = normalizeDeclaration({ name: 'local_lib', path: '../local_lib' }, 'root', { baseDir });
    assert.deepEqual(requirement.source, { type: 'path', location: resolve(baseDir, '../local_lib') });
    assert.equal(requirement.constraint, '*');
    assert.equal(requirement.range, '*');
  });

  it('carries optional and override flags', () => {
    const requirement = normalizeDeclaration(
      { name: 'ex_doc', version: '~> 0.1.0', optional: true, override: true },
      'root',
      { baseDir }
    );
    assert.equal(requirement.optional, true);
    assert.equal(requirement.override, true);
  });

  it('rejects a declaration without a source', () => {
    assert.throws(
      () => normalizeDeclaration({ name: 'ecto' }, 'root', { baseDir }),
      rejectsWith("Invalid dependency declaration: 'ecto' (declared by root) must specify a version or a path")
    );
    assert.throws(
      () => normalizeDeclaration({ name: 'ex_doc', override: true }, 'root', { baseDir }),
      rejectsWith(
        "Invalid dependency declaration: override of 'ex_doc' (declared by root) has no resolvable source; give it a version or a path"
      )
    );
  });

  it('rejects conflicting source fields', () => {
    assert.throws(
      () => normalizeDeclaration({ name: 'ecto', version: '0.2.0', path: '../ecto' }, 'root', { baseDir }),
      rejectsWith("Invalid dependency declaration: 'ecto' (declared by root) has both a version and a path; choose exactly one")
    );
    assert.throws(
      () => normalizeDeclaration({ name: 'ecto', path: '../ecto', package: 'ecto_core' }, 'root', { baseDir }),
      rejectsWith("Invalid dependency declaration: 'ecto' (declared by root) is a path dependency and cannot set 'package'")
    );
  });

  it('rejects invalid names and constraints', () => {
    assert.throws(
      () => normalizeDeclaration({ name: '1ecto', version: '1.0.0' }, 'root', { baseDir }),
      /package name '1ecto' may only contain lowercase letters/
    );
    assert.throws(
      () => normalizeDeclaration({ name: 'root', version: '1.0.0' }, 'ecto', { baseDir }),
      rejectsWith("Invalid dependency declaration: 'root' is reserved for the project itself (name declared by ecto)")
    );
    assert.throws(
      () => normalizeDeclaration({ name: 'ecto', version: '~> 1' }, 'root', { baseDir }),
      rejectsWith(
        "Invalid dependency declaration: 'ecto' (declared by root) has an invalid version constraint: invalid operand for '~>': '1'"
      )
    );
  });

  describe('declarations from registry metadata', () => {
    it('rejects path sources', () => {
      assert.throws(
        () => normalizeDeclaration({ name: 'x', path: '../x' }, 'ecto', { baseDir, origin: 'registry' }),
        rejectsWith("Invalid dependency declaration: 'x' (declared by ecto) is a path dependency inside published registry metadata")
      );
    });

    it('drops the override flag', () => {
      const requirement = normalizeDeclaration(
        { name: 'ex_doc', version: '0.0.1', override: true },
        'ecto',
        { baseDir, origin: 'registry' }
      );
      assert.equal(requirement.override, false);
    });
  });
});

describe('normalizeDeclarations', () => {
  it('keeps declaration order and accepts a missing list', () => {
    const requirements = normalizeDeclarations(
      [{ name: 'postgrex', version: '>= 0.0.0' }, { name: 'ecto', version: '0.2.0' }],
      'root',
      { baseDir }
    );
    assert.deepEqual(requirements.map(requirement => requirement.identity), ['postgrex', 'ecto']);
    assert.deepEqual(normalizeDeclarations(undefined, 'root', { baseDir }), []);
  });

  it('skips path declarations in registry metadata', () => {
    const requirements = normalizeDeclarations(
      [{ name: 'sample', path: '../sample' }, { name: 'postgrex', version: '>= 0.0.0' }],
      'ecto',
      { baseDir, origin: 'registry' }
    );
    assert.deepEqual(requirements.map(requirement => requirement.identity), ['postgrex']);
  });

  it('keeps path declarations of the project', () => {
    const requirements = normalizeDeclarations([{ name: 'sample', path: '../sample' }], 'root', { baseDir });
    assert.deepEqual(requirements[0].source, { type: 'path', location: resolve(baseDir, '../sample') });
  });
});
