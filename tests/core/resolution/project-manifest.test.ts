import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { DEFAULT_SOURCE_FILES, parseProjectManifest } from '../../../src/core/resolution/project-manifest.js';
import { ResolutionError } from '../../../src/utils/errors.js';

const MANIFEST = `
platform: ios
targets:
  App:
    packages: [Alpha, Beta, Shared, Alpha]
  MacApp:
    platform: macos
    packages: Alpha
packages:
  Alpha:
    version: 2.1.0
    source: { git: https://example.com/alpha.git, tag: 2.1.0 }
    frameworks: [UIKit]
    license: LICENSE.txt
  Beta:
    git: https://example.com/beta.git
    tag: v3
    public_headers: Include/*.h
    hooks:
      post_install: echo done
  Shared:
    path: ../Shared
hooks:
  pre_install: echo start
`;

function parse(content: string) {
  return parseProjectManifest(content, 'sandkit.yml');
}

describe('parseProjectManifest', () => {
  it('reads targets and the three kinds of package', () => {
    const manifest = parse(MANIFEST);

    assert.deepEqual(
      manifest.targets.map(t => [t.name, t.platform, t.packageNames]),
      [
        ['App', 'ios', ['Alpha', 'Beta', 'Shared']],
        ['MacApp', 'macos', ['Alpha']]
      ]
    );
    assert.deepEqual(manifest.hooks, { preInstall: 'echo start' });

    const alpha = manifest.packages.get('Alpha');
    assert.equal(alpha?.kind, 'registry');
    assert.equal(alpha?.version, '2.1.0');
    assert.deepEqual(alpha?.source, { type: 'git', url: 'https://example.com/alpha.git', tag: '2.1.0' });
    assert.deepEqual(alpha?.license, { file: 'LICENSE.txt' });
    assert.deepEqual(alpha?.frameworks, ['UIKit']);
    assert.deepEqual(alpha?.layout.sourceFiles, DEFAULT_SOURCE_FILES);

    const beta = manifest.packages.get('Beta');
    assert.equal(beta?.kind, 'external');
    assert.equal(beta?.version, 'v3');
    assert.deepEqual(beta?.layout.publicHeaders, ['Include/*.h']);
    assert.deepEqual(beta?.hooks, { postInstall: 'echo done' });

    const shared = manifest.packages.get('Shared');
    assert.equal(shared?.kind, 'path');
    assert.equal(shared?.version, '0.0.0');
    assert.deepEqual(shared?.source, { type: 'path', path: '../Shared' });
  });

  it('rejects malformed manifests with the offending entry named', () => {
    const cases: Array<[string, RegExp]> = [
      ['targets: {}', /'platform' is required/],
      ['platform: android\ntargets: {}', /'platform' must be one of ios, macos, tvos, watchos/],
      [
        'platform: ios\ntargets: {}\npackages:\n  X:\n    git: https://example.com/x.git\n    path: ../X',
        /package 'X': has multiple sources \(git, path\)/
      ],
      [
        'platform: ios\ntargets: {}\npackages:\n  X:\n    git: https://example.com/x.git\n    tag: v1\n    branch: main',
        /package 'X': choose at most one of tag, branch or commit/
      ],
      [
        'platform: ios\ntargets: {}\npackages:\n  X:\n    source: { git: https://example.com/x.git }',
        /package 'X': 'version' is required for a registry package/
      ],
      ['platform: ios\ntargets: {}\npackages:\n  X:\n    path: ../X\n    head: true', /'head' does not apply to a path package/],
      ['platform: ios\ntargets:\n  App:\n    packages: [Nope]', /target 'App': references unknown package 'Nope'/],
      ['platform: [ios', /not valid YAML/],
      ['platform: ios\ntargets: {}\npackages:\n  Headers:\n    path: ../H', /package 'Headers': 'Headers' is reserved for generated sandbox files/],
      [
        "platform: ios\ntargets: {}\npackages:\n  target support files:\n    path: ../T",
        /'target support files' is reserved for generated sandbox files/
      ],
      ["platform: ios\ntargets: {}\npackages:\n  '..':\n    path: ../Up", /package '\.\.': '\.\.' is not a directory name/],
      ['platform: ios\ntargets:\n  ../App:\n    packages: []', /target '\.\.\/App': name cannot contain path separators or NUL/],
      ['platform: ios\ntargets: {}\npackages:\n  a/b:\n    path: ../AB', /package 'a\/b': name cannot contain path separators or NUL/]
    ];

    for (const [content, message] of cases) {
      assert.throws(() => parse(content), (error: unknown) => {
        assert.ok(error instanceof ResolutionError, `expected a ResolutionError for:\n${content}`);
        assert.match(error.message, message);
        return true;
      });
    }
  });
});
