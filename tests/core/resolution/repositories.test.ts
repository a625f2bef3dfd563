import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import type { Authentication, Resolver } from '../../../src/types/index.js';
import {
  assembleRepositories,
  globalPluginRepositories,
  reorderResolvers,
  toRepository,
  withAuthenticationByHost
} from '../../../src/core/resolution/repositories.js';
import { FAST_REPOSITORY_PREFIXES, SLOW_REPOSITORY_PREFIXES } from '../../../src/constants/index.js';
import { silentLogger } from '../../../src/utils/logger.js';
import { recordingLogger } from '../../test-helpers.js';

const policy = { fastPrefixes: FAST_REPOSITORY_PREFIXES, slowPrefixes: SLOW_REPOSITORY_PREFIXES };
const credentials: Authentication = { user: 'builder', password: 'test-secret' };

const typesafe: Resolver = { kind: 'maven', name: 'typesafe', root: 'https://repo.typesafe.com/releases' };
const central: Resolver = { kind: 'maven', name: 'central', root: 'https://repo1.maven.org/maven2' };
const local: Resolver = { kind: 'directory', name: 'local', path: '/srv/repo' };

describe('reorderResolvers', () => {
  it('moves slow repositories behind the rest when a fast one exists', () => {
    assert.deepEqual(
      reorderResolvers([typesafe, local, central], policy).map(r => r.name),
      ['local', 'central', 'typesafe']
    );
  });

  it('keeps the order when there is no fast repository', () => {
    assert.deepEqual(reorderResolvers([typesafe, local], policy).map(r => r.name), ['typesafe', 'local']);
  });
});

describe('toRepository', () => {
  it('normalizes maven roots and attaches credentials by id', () => {
    assert.deepEqual(toRepository(central, { central: credentials }, silentLogger), {
      kind: 'maven',
      id: 'central',
      root: 'https://repo1.maven.org/maven2/',
      authentication: credentials
    });
  });

  it('maps file URLs to directory repositories', () => {
    assert.deepEqual(
      toRepository({ kind: 'url', name: 'disk', url: 'file:///srv/artifacts' }, {}, silentLogger),
      { kind: 'directory', id: 'disk', root: '/srv/artifacts' }
    );
  });

  it('drops resolvers it cannot use and says why', () => {
    const logger = recordingLogger();
    assert.equal(toRepository({ kind: 'url', name: 'ftp', url: 'ftp://mirror.example.com/' }, {}, logger), null);
    assert.equal(toRepository({ kind: 'url', name: 'broken', url: 'not a url' }, {}, logger), null);
    assert.deepEqual(logger.records.map(r => r.message), [
      "Ignoring resolver 'ftp': unsupported protocol ftp:",
      "Ignoring resolver 'broken': invalid URL not a url"
    ]);
  });
});

describe('authentication by host', () => {
  it('fills in credentials from the repository host', () => {
    const repository = toRepository(
      { kind: 'maven', name: 'corp', root: 'https://repo.example.com/m2' },
      {},
      silentLogger
    );
    assert.ok(repository);
    assert.deepEqual(withAuthenticationByHost(repository, { 'repo.example.com': credentials }), {
      kind: 'maven',
      id: 'corp',
      root: 'https://repo.example.com/m2/',
      authentication: credentials
    });
  });

  it('keeps credentials found by id', () => {
    const byId: Authentication = { user: 'by-id', password: 'test-secret' };
    const repository = toRepository(
      { kind: 'maven', name: 'corp', root: 'https://repo.example.com/m2' },
      { corp: byId },
      silentLogger
    );
    assert.ok(repository);
    const result = withAuthenticationByHost(repository, { 'repo.example.com': credentials });
    assert.equal(result.kind === 'maven' ? result.authentication : undefined, byId);
  });
});

describe('assembleRepositories', () => {
  it('skips duplicate ids and appends plugin and inter-project repositories', () => {
    const { main, internal } = assembleRepositories(
      {
        resolvers: [central, { ...central, root: 'https://mirror.example.com/' }, local],
        authenticationByRepositoryId: {},
        authenticationByHost: {},
        toolBinaryVersion: '1.0',
        globalBase: '/home/tester/.depweave/global',
        interProjectDependencies: []
      },
      silentLogger
    );

    assert.deepEqual(main.map(r => `${r.kind}:${r.id}`), ['maven:central', 'directory:local']);
    assert.deepEqual(internal.map(r => `${r.kind}:${r.id}`), [
      'pattern:global-plugins-0',
      'pattern:global-plugins-1',
      'inter-project:inter-project'
    ]);
  });

  it('points plugin patterns at the global base without fetching artifacts', () => {
    const [first] = globalPluginRepositories('1.0', '/home/tester/.depweave/global');
    assert.equal(first.kind, 'pattern');
    if (first.kind === 'pattern') {
      assert.ok(first.pattern.startsWith('file:///home/tester/.depweave/global/1.0/plugins/target/resolution-cache/'));
      assert.equal(first.withArtifacts, false);
      assert.equal(first.withChecksums, false);
    }
  });
});
