import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { readFileSync } from 'node:fs';
import { mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';

import type { InstallationRecord, ResolutionResult, ResolvedPackage } from '../../../src/types/index.js';
import {
  generateRecord,
  parseRecord,
  readRecord,
  serializeRecord,
  writeRecord
} from '../../../src/core/record/installation-record.js';
import { computeSandboxStateDiff } from '../../../src/core/sandbox/state-diff.js';
import { PersistenceError, ValidationError } from '../../../src/utils/errors.js';
import { makeSpec, makeTempDir } from '../../test-helpers.js';

function resolution(packages: ResolvedPackage[], external: string[] = []): ResolutionResult {
  return {
    targets: [{ name: 'App', platform: 'ios', packageNames: packages.map(p => p.name) }],
    packagesByTarget: new Map([['App', packages]]),
    diff: computeSandboxStateDiff(null, packages),
    externalSourceNames: new Set(external)
  };
}

const branchSpec = makeSpec({
  name: 'Beta',
  version: '0.0.0',
  source: { type: 'git', url: 'https://example.com/beta.git', branch: 'main' }
});

describe('generateRecord', () => {
  it('records versions, targets, external sources and fetched revisions', () => {
    const record = generateRecord(
      resolution([makeSpec({ name: 'Zeta' }), branchSpec, makeSpec({ name: 'alpha', head: true })], ['Beta']),
      new Map([['Beta', { git: 'https://example.com/beta.git', commit: 'e'.repeat(40) }]]),
      null
    );

    assert.deepEqual(Object.keys(record.packages), ['Beta', 'Zeta', 'alpha']);
    assert.deepEqual(record.packages.alpha, {
      version: '1.0.0',
      head: true,
      source: 'git:https://example.com/alpha#tag=1.0.0'
    });
    assert.deepEqual(record.targets, { App: ['Beta', 'Zeta', 'alpha'] });
    assert.deepEqual(record.externalSources, {
      Beta: { type: 'git', url: 'https://example.com/beta.git', branch: 'main' }
    });
    assert.deepEqual(record.checkoutOptions, { Beta: { git: 'https://example.com/beta.git', commit: 'e'.repeat(40) } });
  });

  it('carries a previous checkout forward only while the source is unchanged', () => {
    const previous = generateRecord(
      resolution([branchSpec], ['Beta']),
      new Map([['Beta', { git: 'https://example.com/beta.git', commit: 'f'.repeat(40) }]]),
      null
    );

    const same = generateRecord(resolution([branchSpec], ['Beta']), new Map(), previous);
    assert.equal(same.checkoutOptions.Beta?.commit, 'f'.repeat(40));

    const moved = makeSpec({ ...branchSpec, source: { type: 'git', url: 'https://example.com/beta.git', branch: 'next' } });
    const changed = generateRecord(resolution([moved], ['Beta']), new Map(), previous);
    assert.deepEqual(changed.checkoutOptions, {});
  });
});

describe('serializeRecord', () => {
  it('produces the same bytes whatever the insertion order', () => {
    const forward = generateRecord(resolution([makeSpec({ name: 'A' }), makeSpec({ name: 'B' })]), new Map(), null);
    const backward = generateRecord(resolution([makeSpec({ name: 'B' }), makeSpec({ name: 'A' })]), new Map(), null);

    const text = serializeRecord(forward);
    assert.equal(serializeRecord(backward), text);
    assert.ok(text.startsWith('# This file is generated by sandkit install\n\n'));
    assert.ok(text.indexOf('checkout-options:') < text.indexOf('lockfile-version: 1'));
    assert.ok(text.indexOf('lockfile-version: 1') < text.indexOf('packages:'));
    assert.deepEqual(parseRecord(text, 'sandkit.lock'), forward);
  });

  it('rejects records without a version', () => {
    assert.throws(() => parseRecord('packages: {}\n', 'sandkit.lock'), ValidationError);
    assert.throws(() => parseRecord('- just\n- a list\n', 'sandkit.lock'), ValidationError);
  });
});

describe('writeRecord', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
  });

  it('writes identical bytes to every location', async () => {
    dir = await makeTempDir('record');
    const record: InstallationRecord = generateRecord(resolution([makeSpec({ name: 'A' })]), new Map(), null);
    const locations = [join(dir, 'sandkit.lock'), join(dir, 'Packages', 'Manifest.lock')];

    const content = await writeRecord(record, locations);

    assert.equal(readFileSync(locations[0] ?? '', 'utf8'), content);
    assert.equal(readFileSync(locations[1] ?? '', 'utf8'), content);
    assert.deepEqual(await readRecord(locations[1] ?? ''), record);
    assert.equal(await readRecord(join(dir, 'missing.lock')), null);
  });

  it('names the location that could not be written', async () => {
    dir = await makeTempDir('record-fail');
    const blocked = join(dir, 'blocked');
    await mkdir(blocked);
    const record = generateRecord(resolution([makeSpec({ name: 'A' })]), new Map(), null);

    await assert.rejects(writeRecord(record, [join(dir, 'sandkit.lock'), blocked]), (error: unknown) => {
      assert.ok(error instanceof PersistenceError);
      assert.equal(error.details?.location, blocked);
      assert.equal(error.details?.phase, 'write-record');
      return true;
    });
  });
});
