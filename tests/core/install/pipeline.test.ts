import { describe, it, before, after, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { existsSync, readFileSync } from 'node:fs';
import { rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { InstallerConfigOverrides } from '../../../src/core/config.js';
import type { InstallSummary } from '../../../src/core/install/install-reporting.js';
import { createInstallContext, type InstallPhase } from '../../../src/core/install/context.js';
import { analyzePhase } from '../../../src/core/install/phases/analyze.js';
import { runInstallPipeline } from '../../../src/core/install/pipeline.js';
import { ManifestIntegrator } from '../../../src/core/integration/host-integrator.js';
import { parseRecord } from '../../../src/core/record/installation-record.js';
import { HOOK_CONTEXT_ENV, type CommandRunner } from '../../../src/core/resolution/command-hooks.js';
import { PinnedResolver } from '../../../src/core/resolution/pinned-resolver.js';
import { AggregateFetchError, FetchError, HookError, PhaseError, ResolutionError } from '../../../src/utils/errors.js';
import { isRecordObject } from '../../../src/utils/guards.js';
import { FakeFetcher, makeConfig, makeTempDir, recordingOutput } from '../../test-helpers.js';

const ALPHA_URL = 'https://example.com/alpha.git';
const BETA_URL = 'https://example.com/beta.git';
const ZETA_URL = 'https://example.com/zeta.git';

const MANIFEST = `
platform: ios
targets:
  App:
    packages: [Zeta, alpha, Beta]
  Empty:
    packages: []
packages:
  Zeta:
    version: 1.0.0
    source: { git: ${ZETA_URL}, tag: 1.0.0 }
  alpha:
    version: 2.0.0
    source: { git: ${ALPHA_URL}, tag: 2.0.0 }
    license: { text: Apache-2.0 }
  Beta:
    git: ${BETA_URL}
    branch: main
`;

function trees(): Record<string, Record<string, string>> {
  return {
    [ALPHA_URL]: { 'alpha.h': '', 'alpha.m': '' },
    [BETA_URL]: { 'Beta.h': '', 'Beta.m': '', 'Tests/fixture.json': '{}' },
    [ZETA_URL]: { 'Zeta.h': '', 'Zeta.m': '', LICENSE: 'MIT', 'Docs/guide.txt': 'guide' }
  };
}

interface RunOptions {
  updateMode?: boolean;
  config?: InstallerConfigOverrides;
  runCommand?: CommandRunner;
}

async function install(
  projectDir: string,
  fetcher: FakeFetcher,
  options: RunOptions = {}
): Promise<{ summary: InstallSummary; lines: string[] }> {
  const { output, lines } = recordingOutput();
  const runCommand: CommandRunner = options.runCommand ?? (async () => undefined);
  const ctx = createInstallContext({
    projectDir,
    updateMode: options.updateMode ?? false,
    config: makeConfig(projectDir, options.config),
    output,
    collaborators: {
      resolver: new PinnedResolver(join(projectDir, 'sandkit.yml'), projectDir, runCommand),
      fetcher,
      integrator: new ManifestIntegrator()
    }
  });
  const summary = await runInstallPipeline(ctx);
  return { summary, lines };
}

/**
 * `@<target>` for a package hook context, empty for a project hook
 */
function hookTarget(context: unknown): string {
  if (!isRecordObject(context) || !isRecordObject(context.target)) {
    return '';
  }
  return `@${String(context.target.name)}`;
}

function read(projectDir: string, relativePath: string): string {
  return readFileSync(join(projectDir, relativePath), 'utf8');
}

describe('install pipeline', () => {
  let projectDir: string;
  const fetcher = new FakeFetcher(trees());
  let firstLockfile = '';
  let firstProject = '';

  before(async () => {
    projectDir = await makeTempDir('pipeline');
    await writeFile(join(projectDir, 'sandkit.yml'), MANIFEST);
  });

  after(async () => {
    await rm(projectDir, { recursive: true, force: true });
  });

  it('installs every package on the first run', async () => {
    const { summary, lines } = await install(projectDir, fetcher);

    assert.deepEqual(summary.installed, ['alpha', 'Beta', 'Zeta']);
    assert.deepEqual(summary.reused, []);
    assert.deepEqual(summary.targets, ['Packages-App']);
    assert.deepEqual(fetcher.fetchedUrls(), [ALPHA_URL, BETA_URL, ZETA_URL]);
    assert.deepEqual(
      lines.filter(line => line.startsWith('-> ')),
      ['-> Installing alpha (2.0.0)', '-> Installing Beta (0.0.0)', '-> Installing Zeta (1.0.0)']
    );

    // cleaned
    assert.ok(existsSync(join(projectDir, 'Packages/Zeta/LICENSE')));
    assert.ok(!existsSync(join(projectDir, 'Packages/Zeta/Docs')));
    assert.ok(!existsSync(join(projectDir, 'Packages/Beta/Tests')));

    // generated
    assert.ok(existsSync(join(projectDir, 'Packages/Headers/Beta/Beta.h')));
    assert.ok(existsSync(join(projectDir, 'Packages/Specifications/alpha.yml')));
    assert.ok(existsSync(join(projectDir, 'Packages/PackagesDummy_Packages_App.m')));
    assert.ok(!existsSync(join(projectDir, 'Packages/Target Support Files/Packages-Empty')));

    firstLockfile = read(projectDir, 'sandkit.lock');
    firstProject = read(projectDir, 'Packages/Packages.project.json');
    assert.equal(read(projectDir, 'Packages/Manifest.lock'), firstLockfile);

    const record = parseRecord(firstLockfile, 'sandkit.lock');
    assert.deepEqual(record.targets, { App: ['Beta', 'Zeta', 'alpha'], Empty: [] });
    assert.deepEqual(record.checkoutOptions, { Beta: { git: BETA_URL, commit: 'c'.repeat(40) } });
    assert.deepEqual(record.externalSources, { Beta: { type: 'git', url: BETA_URL, branch: 'main' } });

    const integration: unknown = JSON.parse(read(projectDir, 'sandkit-integration.json'));
    assert.deepEqual(integration, {
      sandbox: 'Packages',
      project: 'Packages/Packages.project.json',
      targets: {
        App: {
          label: 'Packages-App',
          platform: 'ios',
          library: 'libPackages-App.a',
          settings: 'Packages/Target Support Files/Packages-App/Packages-App.settings',
          acknowledgements: 'Packages/Target Support Files/Packages-App/Packages-App-acknowledgements.md'
        }
      }
    });
  });

  it('reuses everything and writes identical files on a second run', async () => {
    const { summary, lines } = await install(projectDir, fetcher);

    assert.deepEqual(summary.installed, []);
    assert.deepEqual(summary.reused, ['alpha', 'Beta', 'Zeta']);
    assert.equal(fetcher.calls.length, 3);
    assert.deepEqual(
      lines.filter(line => line.startsWith('-> ')),
      ['-> Using alpha (2.0.0)', '-> Using Beta (0.0.0)', '-> Using Zeta (1.0.0)']
    );
    assert.equal(read(projectDir, 'sandkit.lock'), firstLockfile);
    assert.equal(read(projectDir, 'Packages/Packages.project.json'), firstProject);
  });

  it('refetches external packages at their branch tip in update mode', async () => {
    fetcher.branchCommit = 'e'.repeat(40);
    const { summary } = await install(projectDir, fetcher, { updateMode: true });

    assert.deepEqual(summary.installed, ['Beta']);
    assert.deepEqual(fetcher.calls[3]?.source, { type: 'git', url: BETA_URL, branch: 'main' });
    const record = parseRecord(read(projectDir, 'sandkit.lock'), 'sandkit.lock');
    assert.equal(record.checkoutOptions.Beta?.commit, 'e'.repeat(40));
  });

  it('removes packages dropped from the manifest', async () => {
    await writeFile(join(projectDir, 'sandkit.yml'), MANIFEST.replace('[Zeta, alpha, Beta]', '[alpha, Beta]').replace(/  Zeta:\n.*\n.*\n/, ''));
    const { summary, lines } = await install(projectDir, fetcher);

    assert.deepEqual(summary.removed, ['Zeta']);
    assert.deepEqual(summary.installed, []);
    assert.ok(lines.includes('-> Removing Zeta'));
    assert.ok(!existsSync(join(projectDir, 'Packages/Zeta')));
    assert.ok(!existsSync(join(projectDir, 'Packages/Headers/Zeta')));
    assert.deepEqual(Object.keys(parseRecord(read(projectDir, 'sandkit.lock'), 'sandkit.lock').packages), ['Beta', 'alpha']);
  });
});

describe('commits pinned by the lockfile', () => {
  const TIP_URL = 'https://example.com/tip.git';
  let projectDir: string;

  beforeEach(async () => {
    projectDir = await makeTempDir('pipeline-pins');
  });

  afterEach(async () => {
    await rm(projectDir, { recursive: true, force: true });
  });

  async function writeManifest(head: boolean): Promise<void> {
    await writeFile(
      join(projectDir, 'sandkit.yml'),
      `
platform: ios
targets:
  App:
    packages: [Tip]
packages:
  Tip:
    git: ${TIP_URL}
    branch: main
    head: ${String(head)}
`
    );
  }

  it('reinstalls a head package at its recorded commit outside update mode', async () => {
    await writeManifest(true);
    const fetcher = new FakeFetcher({ [TIP_URL]: { 'Tip.h': '', 'Tip.m': '' } });
    fetcher.branchCommit = 'a'.repeat(40);
    await install(projectDir, fetcher);
    assert.equal(fetcher.calls[0]?.options.headMode, true);

    await rm(join(projectDir, 'Packages/Tip'), { recursive: true });
    fetcher.branchCommit = 'b'.repeat(40);
    const { summary } = await install(projectDir, fetcher);

    assert.deepEqual(summary.installed, ['Tip']);
    assert.deepEqual(fetcher.calls[1]?.source, { type: 'git', url: TIP_URL, branch: 'main', commit: 'a'.repeat(40) });
    assert.equal(fetcher.calls[1]?.options.headMode, false);
    const record = parseRecord(read(projectDir, 'sandkit.lock'), 'sandkit.lock');
    assert.equal(record.checkoutOptions.Tip?.commit, 'a'.repeat(40));
  });

  it('refetches a package whose locked commit moved since it was installed', async () => {
    await writeManifest(false);
    const fetcher = new FakeFetcher({ [TIP_URL]: { 'Tip.h': '', 'Tip.m': '' } });
    await install(projectDir, fetcher);

    const lockfilePath = join(projectDir, 'sandkit.lock');
    await writeFile(lockfilePath, read(projectDir, 'sandkit.lock').replace('c'.repeat(40), 'd'.repeat(40)));
    const { summary } = await install(projectDir, fetcher);

    assert.deepEqual(summary.installed, ['Tip']);
    assert.equal(fetcher.calls.length, 2);
    assert.deepEqual(fetcher.calls[1]?.source, { type: 'git', url: TIP_URL, branch: 'main', commit: 'd'.repeat(40) });
    const manifest = parseRecord(read(projectDir, 'Packages/Manifest.lock'), 'Manifest.lock');
    assert.equal(manifest.checkoutOptions.Tip?.commit, 'd'.repeat(40));
  });
});

describe('install pipeline failures', () => {
  let projectDir: string;

  beforeEach(async () => {
    projectDir = await makeTempDir('pipeline-failures');
    await writeFile(join(projectDir, 'sandkit.yml'), MANIFEST);
  });

  afterEach(async () => {
    await rm(projectDir, { recursive: true, force: true });
  });

  it('stops at the first failed fetch', async () => {
    const fetcher = new FakeFetcher(trees());
    fetcher.failing.add(ALPHA_URL);

    await assert.rejects(install(projectDir, fetcher), FetchError);
    assert.deepEqual(fetcher.fetchedUrls(), [ALPHA_URL]);
    assert.ok(!existsSync(join(projectDir, 'Packages/alpha')));
    assert.ok(!existsSync(join(projectDir, 'sandkit.lock')));
  });

  it('fetches everything before reporting all failures with keep-going', async () => {
    const fetcher = new FakeFetcher(trees());
    fetcher.failing.add(ALPHA_URL);

    await assert.rejects(install(projectDir, fetcher, { config: { keepGoing: true } }), (error: unknown) => {
      assert.ok(error instanceof AggregateFetchError);
      assert.deepEqual(error.failures.map(failure => failure.packageName), ['alpha']);
      assert.equal(error.details?.phase, 'install-packages');
      return true;
    });
    assert.deepEqual(fetcher.fetchedUrls(), [ALPHA_URL, BETA_URL, ZETA_URL]);
    assert.ok(!existsSync(join(projectDir, 'sandkit.lock')));
  });

  it('leaves the sandbox untouched when resolution fails', async () => {
    await writeFile(join(projectDir, 'sandkit.yml'), MANIFEST.replace('[Zeta, alpha, Beta]', '[Zeta, Missing]'));

    await assert.rejects(install(projectDir, new FakeFetcher(trees())), (error: unknown) => {
      assert.ok(error instanceof ResolutionError);
      assert.equal(error.details?.phase, 'analyze');
      return true;
    });
    assert.ok(!existsSync(join(projectDir, 'Packages')));
  });

  it('runs hooks in order around the support files, before the build project is written', async () => {
    await writeFile(
      join(projectDir, 'sandkit.yml'),
      `
platform: ios
targets:
  App:
    packages: [alpha, Zeta]
  Widget:
    packages: [Zeta]
packages:
  alpha:
    version: 2.0.0
    source: { git: ${ALPHA_URL}, tag: 2.0.0 }
    hooks:
      pre_install: alpha-pre
      post_install: alpha-post
  Zeta:
    version: 1.0.0
    source: { git: ${ZETA_URL}, tag: 1.0.0 }
    hooks:
      pre_install: zeta-pre
      post_install: zeta-post
hooks:
  pre_install: project-pre
  post_install: project-post
`
    );
    const projectJson = join(projectDir, 'Packages/Packages.project.json');
    const settingsFiles = ['App', 'Widget'].map(target =>
      join(projectDir, `Packages/Target Support Files/Packages-${target}/Packages-${target}.settings`)
    );
    interface HookCall {
      call: string;
      settingsWritten: boolean[];
      projectWritten: boolean;
      context: unknown;
    }
    const seen: HookCall[] = [];
    const runCommand: CommandRunner = async (command, { env }) => {
      const context: unknown = JSON.parse(env[HOOK_CONTEXT_ENV] ?? 'null');
      seen.push({
        call: `${command}${hookTarget(context)}`,
        settingsWritten: settingsFiles.map(file => existsSync(file)),
        projectWritten: existsSync(projectJson),
        context
      });
    };

    await install(projectDir, new FakeFetcher(trees()), { runCommand, config: { integrateTargets: false } });

    assert.deepEqual(
      seen.map(hook => hook.call),
      [
        'alpha-pre@App',
        'zeta-pre@App',
        'zeta-pre@Widget',
        'project-pre',
        'alpha-post@App',
        'zeta-post@App',
        'zeta-post@Widget',
        'project-post'
      ]
    );
    const missing = [false, false];
    const written = [true, true];
    assert.deepEqual(
      seen.map(hook => hook.settingsWritten),
      [missing, missing, missing, missing, written, written, written, written]
    );
    assert.ok(seen.every(hook => !hook.projectWritten));
    assert.deepEqual(seen[7]?.context, {
      hook: 'post-install',
      sandboxRoot: join(projectDir, 'Packages'),
      targets: ['App', 'Widget'],
      packageNames: ['alpha', 'Zeta'],
      installedNames: ['alpha', 'Zeta']
    });
    assert.ok(existsSync(projectJson));
    assert.ok(!existsSync(join(projectDir, 'sandkit-integration.json')));
  });

  it('aborts before writing records when a hook fails', async () => {
    const runCommand: CommandRunner = async () => {
      throw new Error('exit code 1');
    };
    await writeFile(join(projectDir, 'sandkit.yml'), `${MANIFEST}hooks:\n  post_install: ./verify.sh\n`);

    await assert.rejects(install(projectDir, new FakeFetcher(trees()), { runCommand }), (error: unknown) => {
      assert.ok(error instanceof HookError);
      assert.equal(error.message, 'The post-install hook of project failed: exit code 1');
      assert.equal(error.details?.phase, 'generate-targets');
      return true;
    });
    assert.ok(!existsSync(join(projectDir, 'Packages/Packages.project.json')));
    assert.ok(!existsSync(join(projectDir, 'sandkit.lock')));
  });

  it('wraps unexpected errors with the failing phase', async () => {
    const { output } = recordingOutput();
    const ctx = createInstallContext({
      projectDir,
      updateMode: false,
      config: makeConfig(projectDir),
      output,
      collaborators: {
        resolver: new PinnedResolver(join(projectDir, 'sandkit.yml'), projectDir),
        fetcher: new FakeFetcher(),
        integrator: new ManifestIntegrator()
      }
    });
    const failing: InstallPhase = {
      name: 'registry',
      run: async () => {
        throw new Error('disk on fire');
      }
    };

    await assert.rejects(runInstallPipeline(ctx, [analyzePhase, failing]), (error: unknown) => {
      assert.ok(error instanceof PhaseError);
      assert.equal(error.message, "Install phase 'registry' failed: disk on fire");
      assert.equal(error.details?.phase, 'registry');
      return true;
    });
  });
});
