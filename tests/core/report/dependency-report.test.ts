import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { resolve } from 'path';

import { buildDependencyReport, formatDependencyReport } from '../../../src/core/report/dependency-report.js';
import type { LockEntry } from '../../../src/core/lock/lock-format.js';
import type { ResolutionResult, ResolvedPackage } from '../../../src/core/resolution/types.js';

const projectRoot = resolve('/workspace/app');

function resolved(identity: string, version: string, extra: Partial<ResolvedPackage> = {}): ResolvedPackage {
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

const result: ResolutionResult = {
  packages: new Map<string, ResolvedPackage>([
    ['ecto', resolved('ecto', '0.2.0')],
    ['postgrex', resolved('postgrex', '0.2.1')],
    ['decimal', resolved('decimal', '1.2.0')],
    ['local_lib', resolved('local_lib', '0.1.0', { source: { type: 'path', location: resolve('/workspace/local_lib') } })]
  ]),
  warnings: []
};

const lock = new Map<string, LockEntry>([
  ['ecto', { source: 'registry', identity: 'ecto', registryName: 'ecto', version: '0.2.0' }],
  ['postgrex', { source: 'registry', identity: 'postgrex', registryName: 'postgrex', version: '0.2.0' }],
  ['local_lib', { source: 'path', identity: 'local_lib', path: '../local_lib', version: '0.1.0' }]
]);

describe('buildDependencyReport', () => {
  it('compares each selection with its lock entry', () => {
    const report = buildDependencyReport(result, lock, projectRoot);

    assert.deepEqual(
      report.map(entry => [entry.name, entry.sourceLabel, entry.lockStatus, entry.lockedVersion]),
      [
        ['ecto', 'registry package', 'locked', '0.2.0'],
        ['postgrex', 'registry package', 'fresh', '0.2.0'],
        ['decimal', 'registry package', 'fresh', undefined],
        ['local_lib', 'path ../local_lib', 'locked', '0.1.0']
      ]
    );
  });

  it('treats a changed registry name as outdated', () => {
    const renamed = new Map<string, LockEntry>([
      ['ecto', { source: 'registry', identity: 'ecto', registryName: 'ecto_fork', version: '0.2.0' }]
    ]);
    const [ecto] = buildDependencyReport(result, renamed, projectRoot);
    assert.equal(ecto.lockStatus, 'fresh');
    assert.equal(ecto.lockedRegistryName, 'ecto_fork');
  });
});

describe('formatDependencyReport', () => {
  it('prints the lock status under each package', () => {
    const lines = formatDependencyReport(buildDependencyReport(result, lock, projectRoot));

    assert.deepEqual(lines, [
      '* ecto 0.2.0 (registry package)',
      '  locked at 0.2.0 (ecto)',
      '  ok',
      '* postgrex 0.2.1 (registry package)',
      '  locked at 0.2.0 (postgrex)',
      '  the dependency lock is outdated',
      '* decimal 1.2.0 (registry package)',
      '  the dependency is not locked',
      '* local_lib 0.1.0 (path ../local_lib)',
      '  ok'
    ]);
  });
});
