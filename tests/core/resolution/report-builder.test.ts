import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import type { ArtifactMap, FileError, Result, UpdateParams } from '../../../src/types/index.js';
import { buildUpdateReport, reachableModules } from '../../../src/core/resolution/report-builder.js';
import { collectArtifacts } from '../../../src/core/resolution/artifacts.js';
import { silentLogger } from '../../../src/utils/logger.js';
import { artifact, dependency, entry, resolvedModule } from '../../test-helpers.js';

const coreJar = 'file:///repo/core-1.0.0.jar';
const coreSources = 'file:///repo/core-1.0.0-sources.jar';
const utilJar = 'file:///repo/util-2.0.0.jar';
const checkJar = 'file:///repo/check-3.0.0.jar';

const core = resolvedModule('com.acme', 'core', '1.0.0', {
  dependencies: ['com.acme:util'],
  artifacts: [artifact(coreJar), artifact(coreSources, { classifier: 'sources' })]
});
const util = resolvedModule('com.acme', 'util', '2.0.0', { artifacts: [artifact(utilJar)] });
const check = resolvedModule('com.acme', 'check', '3.0.0', { artifacts: [artifact(checkJar)] });

const graph = {
  rootDependencies: [entry('compile', dependency('com.acme', 'core', '1.0.0')), entry('test', dependency('com.acme', 'check', '3.0.0'))],
  modules: [core, util, check]
};

function baseParams(artifacts: ArtifactMap): UpdateParams {
  return {
    dependencies: [
      entry('compile', dependency('com.acme', 'core', '1.0.0')),
      entry('test', dependency('com.acme', 'check', '3.0.0'))
    ],
    configs: new Map([
      ['compile', new Set(['compile'])],
      ['test', new Set(['test', 'compile'])],
      ['provided', new Set(['provided'])]
    ]),
    resolutions: [{ configurations: ['compile', 'test'], graph }],
    artifacts,
    classifiers: null,
    platformJarOverrides: { organization: 'org.platform-lang', version: '1.8.0', jars: {} },
    cacheDir: '/cache'
  };
}

const fetched = (file: string): Result<string, FileError> => ({ ok: true, data: file });

describe('reachableModules', () => {
  it('follows dependencies from the given roots in graph order', () => {
    assert.deepEqual(
      reachableModules(graph, ['com.acme:core']).map(m => m.module.name),
      ['core', 'util']
    );
  });
});

describe('collectArtifacts', () => {
  it('selects default artifacts, or the listed classifiers', () => {
    assert.deepEqual(collectArtifacts([graph], null).map(a => a.url), [coreJar, utilJar, checkJar]);
    assert.deepEqual(collectArtifacts([graph], ['sources']).map(a => a.url), [coreSources]);
  });

  it('adds classifiers a root dependency asks for', () => {
    const withSources = {
      ...graph,
      rootDependencies: [entry('compile', dependency('com.acme', 'core', '1.0.0', { attributes: { type: 'jar', classifier: 'sources' } }))]
    };
    assert.deepEqual(collectArtifacts([withSources], null).map(a => a.url), [coreJar, coreSources, utilJar, checkJar]);
  });
});

describe('buildUpdateReport', () => {
  it('reports each configuration from its extends closure', () => {
    const report = buildUpdateReport(
      baseParams(new Map([
        [coreJar, fetched('/cache/core.jar')],
        [utilJar, { ok: false, error: { type: 'not-found', file: utilJar, permanent: true } }],
        [checkJar, fetched('/cache/check.jar')]
      ])),
      silentLogger
    );

    assert.deepEqual(
      report.configurations.map(c => [c.configuration, c.modules.map(m => m.module.name)]),
      [
        ['compile', ['core', 'util']],
        ['test', ['core', 'util', 'check']],
        ['provided', []]
      ]
    );
    assert.deepEqual(report.stats, { modules: 3, artifacts: 3, failedArtifacts: 1 });
    assert.equal(report.cacheDir, '/cache');

    const [compile] = report.configurations;
    assert.deepEqual(compile.modules[0].artifacts, [
      { status: 'fetched', artifact: artifact(coreJar), file: '/cache/core.jar' }
    ]);
    assert.deepEqual(compile.modules[1].artifacts, [
      { status: 'failed', artifact: artifact(utilJar), error: { type: 'not-found', file: utilJar, permanent: true } }
    ]);
    assert.deepEqual(compile.modules[0].module, {
      organization: 'com.acme',
      name: 'core',
      revision: '1.0.0',
      extraAttributes: {}
    });
  });

  it('includes roots the engine added or rewrote', () => {
    const libraryJar = 'file:///repo/platform-library-1.8.0.jar';
    const library = resolvedModule('org.platform-lang', 'platform-library', '1.8.0', {
      artifacts: [artifact(libraryJar)]
    });
    const params: UpdateParams = {
      ...baseParams(new Map([[libraryJar, fetched('/cache/platform-library.jar')]])),
      resolutions: [
        {
          configurations: ['compile', 'test'],
          graph: {
            rootDependencies: [
              ...graph.rootDependencies,
              entry('compile', dependency('org.platform-lang', 'platform-library', '1.8.0'))
            ],
            modules: [core, util, check, library]
          }
        }
      ]
    };

    const report = buildUpdateReport(params, silentLogger);

    assert.deepEqual(
      report.configurations.map(c => [c.configuration, c.modules.map(m => m.module.name)]),
      [
        ['compile', ['core', 'util', 'platform-library']],
        ['test', ['core', 'util', 'check', 'platform-library']],
        ['provided', []]
      ]
    );
    assert.deepEqual(report.stats, { modules: 4, artifacts: 4, failedArtifacts: 3 });
  });

  it('marks artifacts without a fetch outcome as not found', () => {
    const report = buildUpdateReport(baseParams(new Map()), silentLogger);
    const [compile] = report.configurations;
    assert.deepEqual(compile.modules[0].artifacts[0], {
      status: 'failed',
      artifact: artifact(coreJar),
      error: { type: 'not-found', file: coreJar, permanent: false }
    });
  });

  it('uses the build tool jars for its own platform library', () => {
    const libraryJar = 'file:///repo/platform-library-1.8.0.jar';
    const library = resolvedModule('org.platform-lang', 'platform-library', '1.8.0', {
      artifacts: [artifact(libraryJar)]
    });
    const params: UpdateParams = {
      ...baseParams(new Map()),
      dependencies: [entry('compile', dependency('org.platform-lang', 'platform-library', '1.8.0'))],
      configs: new Map([['compile', new Set(['compile'])]]),
      resolutions: [{ configurations: ['compile'], graph: { rootDependencies: [], modules: [library] } }],
      platformJarOverrides: {
        organization: 'org.platform-lang',
        version: '1.8.0',
        jars: { 'platform-library': '/opt/tool/lib/platform-library.jar' }
      }
    };

    const report = buildUpdateReport(params, silentLogger);
    assert.deepEqual(report.configurations[0].modules[0].artifacts, [
      { status: 'fetched', artifact: artifact(libraryJar), file: '/opt/tool/lib/platform-library.jar' }
    ]);
    assert.equal(report.stats.failedArtifacts, 0);
  });
});
