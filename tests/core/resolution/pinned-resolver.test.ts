import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { InstallationRecord, ResolutionResult, ResolvedPackage } from '../../../src/types/index.js';
import { BuildProject } from '../../../src/core/generator/build-project.js';
import { HOOK_CONTEXT_ENV, type CommandRunOptions } from '../../../src/core/resolution/command-hooks.js';
import { PinnedResolver } from '../../../src/core/resolution/pinned-resolver.js';
import { ResolutionError } from '../../../src/utils/errors.js';
import { makeTempDir } from '../../test-helpers.js';

const MANIFEST = `
platform: ios
targets:
  App:
    packages: [Alpha, Beta, Shared]
packages:
  Alpha:
    version: 1.0.0
    source: { git: https://example.com/alpha.git, tag: 1.0.0 }
  Beta:
    git: https://example.com/beta.git
    branch: main
    hooks:
      post_install: ./configure.sh
  Shared:
    path: Shared
`;

const PINNED = 'd'.repeat(40);

const LOCKFILE: InstallationRecord = {
  lockfileVersion: 1,
  packages: {
    Alpha: { version: '1.0.0', source: 'git:https://example.com/alpha#tag=1.0.0' },
    Beta: { version: '0.0.0', source: 'git:https://example.com/beta#branch=main' },
    Shared: { version: '0.0.0', source: 'path:Shared' }
  },
  targets: { App: ['Alpha', 'Beta', 'Shared'] },
  externalSources: {
    Beta: { type: 'git', url: 'https://example.com/beta.git', branch: 'main' },
    Shared: { type: 'path', path: 'Shared' }
  },
  checkoutOptions: { Beta: { git: 'https://example.com/beta.git', commit: PINNED } }
};

function find(result: ResolutionResult, name: string): ResolvedPackage {
  const pkg = result.packagesByTarget.get('App')?.find(p => p.name === name);
  assert.ok(pkg, `${name} was not resolved`);
  return pkg;
}

describe('PinnedResolver', () => {
  let projectDir: string;
  let manifestPath: string;
  const commands: Array<{ command: string; options: CommandRunOptions }> = [];

  beforeEach(async () => {
    projectDir = await makeTempDir('resolver');
    manifestPath = join(projectDir, 'sandkit.yml');
    await writeFile(manifestPath, MANIFEST);
    await mkdir(join(projectDir, 'Shared'));
    commands.length = 0;
  });

  afterEach(async () => {
    await rm(projectDir, { recursive: true, force: true });
  });

  function resolver(): PinnedResolver {
    return new PinnedResolver(manifestPath, projectDir, async (command, options) => {
      commands.push({ command, options });
    });
  }

  it('holds external packages at the recorded commit outside update mode', async () => {
    const result = await resolver().resolve({ lockfile: LOCKFILE, sandboxManifest: LOCKFILE, updateMode: false });

    assert.equal(find(result, 'Beta').pinnedCommit, PINNED);
    assert.equal(find(result, 'Alpha').pinnedCommit, undefined);
    assert.equal(find(result, 'Shared').locallySourced, true);
    assert.deepEqual([...result.externalSourceNames], ['Beta']);
    assert.deepEqual([...result.diff.unchanged], ['Alpha', 'Beta', 'Shared']);
    assert.equal(result.manifestPath, manifestPath);
  });

  it('ignores the lockfile in update mode', async () => {
    const result = await resolver().resolve({ lockfile: LOCKFILE, sandboxManifest: LOCKFILE, updateMode: true });
    assert.equal(find(result, 'Beta').pinnedCommit, undefined);
  });

  it('drops the pin once the declared source changes', async () => {
    await writeFile(manifestPath, MANIFEST.replace('branch: main', 'branch: develop'));
    const result = await resolver().resolve({ lockfile: LOCKFILE, sandboxManifest: LOCKFILE, updateMode: false });

    assert.equal(find(result, 'Beta').pinnedCommit, undefined);
    assert.deepEqual([...result.diff.changed], ['Beta']);
  });

  it('fails when a path package directory is missing', async () => {
    await rm(join(projectDir, 'Shared'), { recursive: true });
    await assert.rejects(
      resolver().resolve({ lockfile: null, sandboxManifest: null, updateMode: false }),
      (error: unknown) => error instanceof ResolutionError && /Path of package 'Shared' does not exist/.test(error.message)
    );
  });

  it('runs manifest hook commands in the package root with the context in the environment', async () => {
    const result = await resolver().resolve({ lockfile: null, sandboxManifest: null, updateMode: false });
    const beta = find(result, 'Beta');
    const target = result.targets[0];
    assert.ok(target);
    const projectTarget = new BuildProject(join(projectDir, 'Packages', 'Packages.project.json')).addTarget('Packages-App', 'ios');

    await beta.hooks?.postInstall?.({
      hook: 'post-install',
      package: { name: 'Beta', version: '0.0.0', variant: 'external', root: '/sandbox/Beta', platform: 'ios' },
      target,
      label: 'Packages-App',
      projectTarget
    });

    assert.equal(commands.length, 1);
    assert.equal(commands[0]?.command, './configure.sh');
    assert.equal(commands[0]?.options.cwd, '/sandbox/Beta');
    const payload: unknown = JSON.parse(commands[0]?.options.env[HOOK_CONTEXT_ENV] ?? 'null');
    assert.deepEqual(payload, {
      hook: 'post-install',
      package: { name: 'Beta', version: '0.0.0', variant: 'external', root: '/sandbox/Beta', platform: 'ios' },
      target: { name: 'App', platform: 'ios' },
      label: 'Packages-App'
    });
  });
});
