import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import type { DeclaredDependency, ModuleSettings } from '../../../src/types/index.js';
import {
  binaryVersionOf,
  crossVersionedName,
  mergeExclusions,
  normalizeDependencies,
  normalizeInputs,
  parseConfigurationMapping,
  selectPlatform,
  unwrapDescriptor
} from '../../../src/core/resolution/normalizer.js';
import { createResolutionConfiguration, createResolutionDefaults } from '../../../src/core/config.js';
import { getDepweaveDirectories } from '../../../src/core/directory.js';
import { UnsupportedDescriptorError } from '../../../src/utils/errors.js';

const settings: ModuleSettings = {
  module: { organization: 'com.acme', name: 'app', revision: '0.1.0' },
  dependencies: [],
  configurations: []
};

const defaults = createResolutionDefaults(getDepweaveDirectories('/home/tester'));
const platform = { organization: 'org.platform-lang', version: '2.13.12', binaryVersion: '2.13' };

describe('unwrapDescriptor', () => {
  it('accepts native descriptors and foreign inline settings', () => {
    assert.equal(unwrapDescriptor({ kind: 'native', settings }), settings);
    assert.equal(
      unwrapDescriptor({ kind: 'foreign', moduleSettings: { kind: 'inline', settings } }),
      settings
    );
  });

  it('rejects file-backed foreign settings', () => {
    assert.throws(
      () => unwrapDescriptor({ kind: 'foreign', moduleSettings: { kind: 'pom-file', path: '/w/pom.xml' } }),
      (error: unknown) =>
        error instanceof UnsupportedDescriptorError &&
        error.message === 'Unrecognized module descriptor: pom-file settings (/w/pom.xml)'
    );
  });
});

describe('platform selection', () => {
  it('keeps the first two components as binary version', () => {
    assert.equal(binaryVersionOf('2.13.12'), '2.13');
    assert.equal(binaryVersionOf('3'), '3');
  });

  it('falls back to the defaults', () => {
    assert.deepEqual(selectPlatform(settings, {}, defaults), {
      organization: 'org.platform-lang',
      version: '1.8.0',
      binaryVersion: '1.8',
      forced: false
    });
  });

  it('marks a non-default organization as forced', () => {
    assert.deepEqual(
      selectPlatform(settings, { platformOrganization: 'com.fork', platformVersion: '3.1.4' }, defaults),
      { organization: 'com.fork', version: '3.1.4', binaryVersion: '3.1', forced: true }
    );
  });

  it('uses platform info from the module settings', () => {
    const withInfo: ModuleSettings = {
      ...settings,
      platformInfo: { organization: 'org.platform-lang', fullVersion: '2.12.18', binaryVersion: '2.12' }
    };
    assert.deepEqual(selectPlatform(withInfo, {}, defaults), {
      organization: 'org.platform-lang',
      version: '2.12.18',
      binaryVersion: '2.12',
      forced: false
    });
  });
});

describe('crossVersionedName', () => {
  const dep: DeclaredDependency = { organization: 'com.acme', name: 'json', revision: '1.0.0' };

  it('appends the binary or full platform version', () => {
    assert.equal(crossVersionedName({ ...dep, crossVersion: 'binary' }, platform), 'json_2.13');
    assert.equal(crossVersionedName({ ...dep, crossVersion: 'full' }, platform), 'json_2.13.12');
    assert.equal(crossVersionedName(dep, platform), 'json');
  });
});

describe('parseConfigurationMapping', () => {
  it('expands mappings into (from, to) pairs', () => {
    assert.deepEqual(parseConfigurationMapping(undefined), [['compile', 'default(compile)']]);
    assert.deepEqual(parseConfigurationMapping('test'), [['test', 'default(compile)']]);
    assert.deepEqual(parseConfigurationMapping('test->default'), [['test', 'default']]);
    assert.deepEqual(parseConfigurationMapping('compile,test->runtime'), [
      ['compile', 'runtime'],
      ['test', 'runtime']
    ]);
    assert.deepEqual(parseConfigurationMapping('compile;test->test'), [
      ['compile', 'default(compile)'],
      ['test', 'test']
    ]);
  });
});

describe('exclusions and dependencies', () => {
  it('merges exclusions as a set union', () => {
    assert.deepEqual(
      mergeExclusions(
        [{ organization: 'com.acme', name: 'log' }],
        [{ organization: 'com.acme', name: 'log' }, { organization: 'org.legacy', name: '*' }]
      ),
      [
        { organization: 'com.acme', name: 'log' },
        { organization: 'org.legacy', name: '*' }
      ]
    );
  });

  it('creates one entry per configuration pair with global exclusions merged', () => {
    const entries = normalizeDependencies(
      [
        {
          organization: 'com.acme',
          name: 'json',
          revision: '1.0.0',
          configurations: 'compile;test->test',
          crossVersion: 'binary',
          exclusions: [{ organization: 'com.acme', name: 'log' }],
          classifier: 'sources'
        }
      ],
      platform,
      [{ organization: 'org.legacy', name: '*' }]
    );

    assert.equal(entries.length, 2);
    assert.deepEqual(
      entries.map(e => [e.configuration, e.dependency.configuration]),
      [['compile', 'default(compile)'], ['test', 'test']]
    );
    const [first] = entries;
    assert.equal(first.dependency.module.name, 'json_2.13');
    assert.deepEqual(first.dependency.exclusions, [
      { organization: 'com.acme', name: 'log' },
      { organization: 'org.legacy', name: '*' }
    ]);
    assert.deepEqual(first.dependency.attributes, { type: 'jar', classifier: 'sources' });
    assert.equal(first.dependency.transitive, true);
    assert.equal(first.dependency.optional, false);
  });
});

describe('normalizeInputs', () => {
  const resolvers = [
    { kind: 'maven' as const, name: 'typesafe', root: 'https://repo.typesafe.com/releases/' },
    { kind: 'maven' as const, name: 'central', root: 'https://repo1.maven.org/maven2/' }
  ];

  it('returns null classifiers unless classifiers are configured', () => {
    const plain = normalizeInputs({ kind: 'native', settings }, createResolutionConfiguration(), defaults);
    assert.equal(plain.classifiers, null);

    const withClassifiers = normalizeInputs(
      { kind: 'native', settings },
      createResolutionConfiguration({ hasClassifiers: true, classifiers: ['sources'] }),
      defaults
    );
    assert.deepEqual(withClassifiers.classifiers, ['sources']);
  });

  it('moves slow resolvers last only when reordering is on', () => {
    const reordered = normalizeInputs(
      { kind: 'native', settings },
      createResolutionConfiguration({ resolvers }),
      defaults
    );
    assert.deepEqual(reordered.resolvers.map(r => r.name), ['central', 'typesafe']);

    const kept = normalizeInputs(
      { kind: 'native', settings },
      createResolutionConfiguration({ resolvers, reorderResolvers: false }),
      defaults
    );
    assert.deepEqual(kept.resolvers.map(r => r.name), ['typesafe', 'central']);
  });

  it('deduplicates global exclusions', () => {
    const inputs = normalizeInputs(
      { kind: 'native', settings },
      createResolutionConfiguration({
        excludeDependencies: [
          { organization: 'org.legacy', name: '*' },
          { organization: 'org.legacy', name: '*' }
        ]
      }),
      defaults
    );
    assert.deepEqual(inputs.exclusions, [{ organization: 'org.legacy', name: '*' }]);
  });
});
