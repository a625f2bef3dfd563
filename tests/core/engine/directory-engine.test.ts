import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'path';
import { pathToFileURL } from 'url';

import type { ConfigurationSetRequest, Dependency, ResolutionParams } from '../../../src/types/index.js';
import {
  DirectoryResolverEngine,
  directoryRepositories,
  expandScopes,
  matchesExclusion
} from '../../../src/core/engine/directory-engine.js';
import { silentLogger } from '../../../src/utils/logger.js';
import {
  coordinate,
  dependency,
  entry,
  makeTempDir,
  removeDir,
  resolutionParams,
  writeFileDeep
} from '../../test-helpers.js';

let root: string;

async function publish(organization: string, name: string, version: string, moduleYml = ''): Promise<void> {
  await writeFileDeep(join(root, organization, name, version, 'module.yml'), moduleYml);
}

function params(overrides: Partial<ResolutionParams> = {}): ResolutionParams {
  return resolutionParams({
    mainRepositories: [{ kind: 'directory', id: 'local', root }],
    ...overrides
  });
}

function request(dependencies: Dependency[], overrides: Partial<ResolutionParams> = {}, configurations = ['compile']): ConfigurationSetRequest {
  return {
    params: params(overrides),
    configurations,
    dependencies: dependencies.map(dep => entry('compile', dep))
  };
}

const engine = new DirectoryResolverEngine();

before(async () => {
  root = await makeTempDir('repo');

  await publish('com.acme', 'app-core', '1.0.0', [
    'dependencies:',
    '  - organization: com.acme',
    '    name: util',
    '    version: ^1.0.0',
    '  - organization: com.acme',
    '    name: test-kit',
    '    version: 1.0.0',
    '    scope: test',
    '  - organization: com.acme',
    '    name: extras',
    '    version: 1.0.0',
    '    optional: true',
    ''
  ].join('\n'));
  await publish('com.acme', 'util', '1.0.0');
  await publish('com.acme', 'util', '1.2.0');
  await publish('com.acme', 'widget', '1.0.0', [
    'dependencies:',
    '  - organization: com.acme',
    '    name: util',
    '    version: 1.0.0',
    ''
  ].join('\n'));
  await publish('com.acme', 'gadget', '1.0.0', [
    'dependencies:',
    '  - organization: com.acme',
    '    name: util',
    '    version: ^1.2.0',
    ''
  ].join('\n'));
  await publish('com.acme', 'docs', '2.0.0', [
    'artifacts:',
    '  - file: docs-2.0.0.zip',
    '    type: zip',
    '  - file: docs-2.0.0-sources.jar',
    '    classifier: sources',
    ''
  ].join('\n'));
  await publish('org.platform-lang', 'platform-library', '1.8.0');
  await publish('com.fork', 'platform-reflect', '3.0.0');
});

after(async () => {
  await removeDir(root);
});

describe('DirectoryResolverEngine', () => {
  it('resolves transitive compile dependencies to the highest matching version', async () => {
    const outcome = await engine.resolve(request([dependency('com.acme', 'app-core', '1.0.0')]), silentLogger);

    assert.equal(outcome.ok, true);
    if (!outcome.ok) return;
    assert.deepEqual(
      outcome.data.modules.map(m => [`${m.module.name}:${m.version}`, m.repositoryId, m.dependencies]),
      [
        ['app-core:1.0.0', 'local', ['com.acme:util']],
        ['util:1.2.0', 'local', []]
      ]
    );
    assert.deepEqual(outcome.data.modules[1].artifacts, [
      {
        url: pathToFileURL(join(root, 'com.acme', 'util', '1.2.0', 'util-1.2.0.jar')).href,
        type: 'jar',
        extension: 'jar',
        classifier: '',
        changing: false,
        optional: false
      }
    ]);
  });

  it('reads declared artifacts and derives their extension', async () => {
    const outcome = await engine.resolve(request([dependency('com.acme', 'docs', '2.0.0')]), silentLogger);

    assert.equal(outcome.ok, true);
    if (!outcome.ok) return;
    assert.deepEqual(
      outcome.data.modules[0].artifacts.map(a => [a.type, a.extension, a.classifier]),
      [['zip', 'zip', ''], ['jar', 'jar', 'sources']]
    );
  });

  it('iterates until the selected versions are stable', async () => {
    const outcome = await engine.resolve(
      request([dependency('com.acme', 'util', '^1.0.0'), dependency('com.acme', 'widget', '1.0.0')]),
      silentLogger
    );

    assert.equal(outcome.ok, true);
    if (!outcome.ok) return;
    assert.deepEqual(outcome.data.modules.map(m => `${m.module.name}:${m.version}`), ['util:1.0.0', 'widget:1.0.0']);
  });

  it('gives up after the maximum number of iterations', async () => {
    const outcome = await engine.resolve(
      request([dependency('com.acme', 'util', '^1.0.0'), dependency('com.acme', 'widget', '1.0.0')], { maxIterations: 1 }),
      silentLogger
    );
    assert.deepEqual(outcome, { ok: false, error: { type: 'maximum-iterations-reached', iterations: 1 } });
  });

  it('reports constraints no version satisfies as conflicts', async () => {
    const outcome = await engine.resolve(
      request([dependency('com.acme', 'widget', '1.0.0'), dependency('com.acme', 'gadget', '1.0.0')]),
      silentLogger
    );
    assert.deepEqual(outcome, {
      ok: false,
      error: {
        type: 'conflicts',
        description: 'com.acme:util (1.0.0 from com.acme:widget:1.0.0, ^1.2.0 from com.acme:gadget:1.0.0)'
      }
    });
  });

  it('reports missing modules with the path that led to them', async () => {
    const outcome = await engine.resolve(request([dependency('com.acme', 'ghost', '1.0.0')]), silentLogger);
    assert.deepEqual(outcome, {
      ok: false,
      error: {
        type: 'metadata-download-errors',
        errors: [
          {
            module: coordinate('com.acme', 'ghost'),
            version: '1.0.0',
            messages: ['not found: com.acme:ghost:1.0.0 (searched local)'],
            path: []
          }
        ]
      }
    });
  });

  it('honors exclusions on the requesting dependency', async () => {
    const outcome = await engine.resolve(
      request([dependency('com.acme', 'app-core', '1.0.0', { exclusions: [{ organization: 'com.acme', name: 'util' }] })]),
      silentLogger
    );
    assert.equal(outcome.ok, true);
    if (!outcome.ok) return;
    assert.deepEqual(outcome.data.modules.map(m => [m.module.name, m.dependencies]), [['app-core', []]]);
  });

  it('does not follow non-transitive dependencies', async () => {
    const outcome = await engine.resolve(
      request([dependency('com.acme', 'app-core', '1.0.0', { transitive: false })]),
      silentLogger
    );
    assert.equal(outcome.ok, true);
    if (!outcome.ok) return;
    assert.deepEqual(outcome.data.modules.map(m => m.module.name), ['app-core']);
  });

  it('prefers modules of the same build over repositories', async () => {
    const project = {
      module: coordinate('com.acme', 'util'),
      version: '1.2.0',
      dependencies: [],
      configurations: []
    };
    const outcome = await engine.resolve(
      request([dependency('com.acme', 'util', '1.2.0')], {
        internalRepositories: [{ kind: 'inter-project', id: 'inter-project', projects: [project] }]
      }),
      silentLogger
    );
    assert.equal(outcome.ok, true);
    if (!outcome.ok) return;
    assert.deepEqual(
      outcome.data.modules.map(m => [m.module.name, m.repositoryId, m.artifacts.length]),
      [['util', 'inter-project', 0]]
    );
  });

  it('falls back to explicit locations for modules no repository has', async () => {
    const outcome = await engine.resolve(
      request([dependency('com.acme', 'legacy', '2.0')], {
        fallbackDependencies: [
          { module: coordinate('com.acme', 'legacy'), version: '2.0', url: 'file:///opt/legacy/legacy-2.0.jar', changing: true }
        ]
      }),
      silentLogger
    );
    assert.equal(outcome.ok, true);
    if (!outcome.ok) return;
    assert.deepEqual(outcome.data.modules[0].repositoryId, 'fallback');
    assert.deepEqual(outcome.data.modules[0].artifacts, [
      { url: 'file:///opt/legacy/legacy-2.0.jar', type: 'jar', extension: 'jar', classifier: '', changing: true, optional: false }
    ]);
  });

  it('adds the platform library to sets containing compile', async () => {
    const withCompile = await engine.resolve(request([], { autoPlatformLibrary: true }, ['compile', 'test']), silentLogger);
    assert.equal(withCompile.ok, true);
    if (withCompile.ok) {
      assert.deepEqual(
        withCompile.data.rootDependencies.map(
          ({ configuration, dependency: d }) => `${configuration} ${d.module.organization}:${d.module.name}:${d.version}`
        ),
        ['compile org.platform-lang:platform-library:1.8.0']
      );
      assert.deepEqual(withCompile.data.modules.map(m => m.module.name), ['platform-library']);
    }

    const withoutCompile = await engine.resolve(request([], { autoPlatformLibrary: true }, ['provided']), silentLogger);
    assert.deepEqual(withoutCompile, { ok: true, data: { rootDependencies: [], modules: [] } });
  });

  it('rewrites default platform modules when another platform is forced', async () => {
    const outcome = await engine.resolve(
      request([dependency('org.platform-lang', 'platform-reflect', '1.8.0')], {
        forcedPlatformOrganization: true,
        platform: { organization: 'com.fork', version: '3.0.0', binaryVersion: '3.0' }
      }),
      silentLogger
    );
    assert.equal(outcome.ok, true);
    if (!outcome.ok) return;
    assert.deepEqual(outcome.data.modules.map(m => `${m.module.organization}:${m.module.name}:${m.version}`), [
      'com.fork:platform-reflect:3.0.0'
    ]);
    assert.deepEqual(
      outcome.data.rootDependencies.map(({ configuration, dependency: d }) => `${configuration} ${d.module.organization}:${d.version}`),
      ['compile com.fork:3.0.0']
    );
  });
});

describe('engine helpers', () => {
  it('expands a dependency configuration into repository scopes', () => {
    const scopes = expandScopes('default(compile)', new Map([['default', ['runtime']], ['runtime', ['compile']]]));
    assert.deepEqual(Array.from(scopes).sort(), ['compile', 'default', 'runtime']);
    assert.deepEqual(Array.from(expandScopes('test', new Map())), ['test']);
  });

  it('matches exclusions with wildcards', () => {
    const module = { organization: 'com.acme', name: 'util' };
    assert.equal(matchesExclusion(module, { organization: 'com.acme', name: '*' }), true);
    assert.equal(matchesExclusion(module, { organization: '*', name: 'util' }), true);
    assert.equal(matchesExclusion(module, { organization: 'com.other', name: '*' }), false);
  });

  it('uses local repositories only', () => {
    const usable = directoryRepositories(
      [
        { kind: 'maven', id: 'central', root: 'https://repo1.maven.org/maven2/' },
        { kind: 'maven', id: 'm2', root: 'file:///srv/m2/' },
        { kind: 'directory', id: 'local', root: '/srv/repo' },
        { kind: 'pattern', id: 'ivy', pattern: 'file:///srv/ivy/[module]', withChecksums: true, withSignatures: false, withArtifacts: true }
      ],
      silentLogger
    );
    assert.deepEqual(usable.map(r => [r.id, r.root]), [['m2', '/srv/m2/'], ['local', '/srv/repo']]);
  });
});
