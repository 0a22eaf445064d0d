import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { readFileSync } from 'node:fs';
import { rm } from 'node:fs/promises';
import { join } from 'node:path';

import { BuildProject, isCompiledSource } from '../../../src/core/generator/build-project.js';
import { ValidationError } from '../../../src/utils/errors.js';
import { makeTempDir } from '../../test-helpers.js';

function sampleProject(path: string): BuildProject {
  const project = new BuildProject(path);
  project.addManifest('../sandkit.yml');
  const ref = project.packageGroup('Alpha', false).addFile('Alpha/Alpha.m');
  project.addTarget('Packages-App', 'ios').addSourceFile(ref);
  return project;
}

describe('BuildProject', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
  });

  it('starts with the standard groups and files packages by origin', () => {
    const project = new BuildProject('/tmp/unused.json');
    assert.deepEqual(
      project.mainGroup.children.map(group => group.name),
      ['Packages', 'Local Packages', 'Targets Support Files', 'Manifest']
    );

    project.packageGroup('Remote', false).addFile('Remote/a.m');
    project.packageGroup('Local', true).addFile('../Local/b.m');
    assert.deepEqual(project.mainGroup.findGroup('Packages')?.children.map(g => g.name), ['Remote']);
    assert.deepEqual(project.mainGroup.findGroup('Local Packages')?.children.map(g => g.name), ['Local']);
  });

  it('adds a file once and derives stable IDs from paths', () => {
    const project = new BuildProject('/tmp/unused.json');
    const group = project.packageGroup('Alpha', false);
    const first = group.addFile('Alpha/Alpha.m');

    assert.equal(group.addFile('Alpha/Alpha.m'), first);
    assert.equal(group.files.length, 1);
    assert.match(first.id, /^[0-9A-F]{24}$/);
    assert.equal(sampleProject('/tmp/a.json').serialize(), sampleProject('/tmp/b.json').serialize());
  });

  it('rejects a second target with the same name', () => {
    const project = new BuildProject('/tmp/unused.json');
    project.addTarget('Packages-App', 'ios');
    assert.throws(() => project.addTarget('Packages-App', 'macos'), ValidationError);
  });

  it('is written exactly once per run', async () => {
    dir = await makeTempDir('build-project');
    const project = sampleProject(join(dir, 'Packages', 'Packages.project.json'));

    assert.equal(project.isSaved, false);
    await project.save();
    assert.equal(project.isSaved, true);
    assert.equal(readFileSync(project.path, 'utf8'), `${project.serialize()}\n`);
    await assert.rejects(project.save(), ValidationError);
  });

  it('compiles sources but not headers', () => {
    assert.equal(isCompiledSource('a/b.m'), true);
    assert.equal(isCompiledSource('a/b.swift'), true);
    assert.equal(isCompiledSource('a/b.h'), false);
  });
});
