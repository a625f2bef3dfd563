import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import type { ResolutionError, ResolutionParams, ResolvedGraph, Result } from '../../../src/types/index.js';
import { createPipelineContext, transition } from '../../../src/core/resolution/context.js';
import { runResolutionPipeline } from '../../../src/core/resolution/pipeline.js';
import { combineResolutionErrors } from '../../../src/core/resolution/phases/resolve.js';
import { defaultReportBuilder } from '../../../src/core/resolution/report-builder.js';
import { silentLogger } from '../../../src/utils/logger.js';
import {
  RecordingEngine,
  RecordingFetcher,
  coordinate,
  dependency,
  entry,
  metadataError,
  recordingLogger,
  resolutionParams,
  resolvedModule
} from '../../test-helpers.js';

const core = resolvedModule('com.acme', 'core', '1.0.0');
const check = resolvedModule('com.acme', 'check', '2.0.0');

const params: ResolutionParams = resolutionParams({
  dependencies: [
    entry('compile', dependency('com.acme', 'core', '1.0.0')),
    entry('test', dependency('com.acme', 'check', '2.0.0'))
  ],
  configGraphs: [['compile'], ['test']]
});

const configs = new Map([
  ['compile', new Set(['compile'])],
  ['test', new Set(['test'])]
]);

function context(engine: RecordingEngine, fetcher: RecordingFetcher, overrides: Partial<ResolutionParams> = {}) {
  return createPipelineContext({
    params: { ...params, ...overrides },
    configs,
    platformJarOverrides: { organization: 'org.platform-lang', version: '1.8.0', jars: {} },
    collaborators: { engine, fetcher, reportBuilder: defaultReportBuilder },
    logger: silentLogger
  });
}

type EngineResult = Result<ResolvedGraph, ResolutionError>;

const compileResult: EngineResult = { ok: true, data: { rootDependencies: [], modules: [core] } };
const testResult: EngineResult = { ok: true, data: { rootDependencies: [], modules: [check] } };

const answers = new Map<string, EngineResult>([
  ['compile', compileResult],
  ['test', testResult]
]);

describe('runResolutionPipeline', () => {
  it('resolves every set, fetches once and reports', async () => {
    const engine = new RecordingEngine(answers);
    const fetcher = new RecordingFetcher();
    const ctx = context(engine, fetcher);

    const outcome = await runResolutionPipeline(ctx);

    assert.equal(outcome.ok, true);
    assert.deepEqual(ctx.history, ['start', 'resolving', 'fetching', 'assembling', 'done']);
    assert.deepEqual(engine.requests.map(r => r.dependencies.map(d => d.dependency.module.name)), [['core'], ['check']]);
    assert.equal(fetcher.calls.length, 1);
    assert.equal(fetcher.calls[0].graphs.length, 2);
    if (outcome.ok) {
      assert.deepEqual(outcome.data.stats, { modules: 2, artifacts: 2, failedArtifacts: 0 });
    }
  });

  it('never fetches when a configuration set fails to resolve', async () => {
    const engine = new RecordingEngine(new Map<string, EngineResult>([
      ['compile', compileResult],
      ['test', { ok: false, error: metadataError('com.acme', 'check', '2.0.0') }]
    ]));
    const fetcher = new RecordingFetcher();
    const ctx = context(engine, fetcher);

    const outcome = await runResolutionPipeline(ctx);

    assert.deepEqual(outcome, { ok: false, error: metadataError('com.acme', 'check', '2.0.0') });
    assert.equal(fetcher.calls.length, 0);
    assert.equal(engine.requests.length, 2);
    assert.deepEqual(ctx.history, ['start', 'resolving', 'failed']);
  });

  it('reports a throwing engine as an unknown exception', async () => {
    const crash = new Error('engine crashed');
    const ctx = context(new RecordingEngine(new Map([['test', crash]])), new RecordingFetcher());

    const outcome = await runResolutionPipeline(ctx);

    assert.deepEqual(outcome, { ok: false, error: { type: 'unknown-exception', cause: crash } });
    if (!outcome.ok && outcome.error.type === 'unknown-exception') {
      assert.equal(outcome.error.cause, crash);
    }
  });

  it('keeps going when some artifacts fail', async () => {
    const fetcher = new RecordingFetcher(new Set([check.artifacts[0].url]));
    const outcome = await runResolutionPipeline(context(new RecordingEngine(answers), fetcher));

    assert.equal(outcome.ok, true);
    if (outcome.ok) {
      assert.deepEqual(outcome.data.stats, { modules: 2, artifacts: 2, failedArtifacts: 1 });
      const [compile, test] = outcome.data.configurations;
      assert.equal(compile.modules[0].artifacts[0].status, 'fetched');
      assert.equal(test.modules[0].artifacts[0].status, 'failed');
    }
  });

  it('turns a throwing fetcher into per-artifact download errors', async () => {
    const logger = recordingLogger();
    const ctx = {
      ...context(new RecordingEngine(answers), new RecordingFetcher(new Set(), new Error('disk full'))),
      logger
    };

    const outcome = await runResolutionPipeline(ctx);

    assert.equal(outcome.ok, true);
    if (outcome.ok) {
      assert.equal(outcome.data.stats.failedArtifacts, 2);
      const failure = outcome.data.configurations[0].modules[0].artifacts[0];
      assert.deepEqual(failure.status === 'failed' ? failure.error : undefined, {
        type: 'download-error',
        reason: 'disk full'
      });
    }
    assert.deepEqual(
      logger.records.filter(r => r.level === 'error').map(r => r.message),
      ['Artifact fetcher failed: disk full']
    );
  });

  it('bounds concurrent engine calls by the parallelism setting', async () => {
    const engine = new RecordingEngine(new Map(), 10);
    await runResolutionPipeline(
      context(engine, new RecordingFetcher(), { configGraphs: [['a'], ['b'], ['c'], ['d']], parallelDownloads: 1 })
    );
    assert.equal(engine.requests.length, 4);
    assert.equal(engine.maxInFlight, 1);
  });
});

describe('pipeline state machine', () => {
  it('rejects transitions that skip a phase', () => {
    const ctx = context(new RecordingEngine(answers), new RecordingFetcher());
    assert.throws(() => transition(ctx, 'done'), /Illegal pipeline transition: start -> done/);
    transition(ctx, 'resolving');
    assert.throws(() => transition(ctx, 'assembling'), /Illegal pipeline transition: resolving -> assembling/);
  });
});

describe('combineResolutionErrors', () => {
  it('merges metadata failures, deduplicated by module and version', () => {
    const combined = combineResolutionErrors([
      metadataError('com.acme', 'a', '1.0.0'),
      metadataError('com.acme', 'b', '1.0.0'),
      metadataError('com.acme', 'a', '1.0.0')
    ]);
    assert.equal(combined.type, 'metadata-download-errors');
    if (combined.type === 'metadata-download-errors') {
      assert.deepEqual(combined.errors.map(e => e.module), [coordinate('com.acme', 'a'), coordinate('com.acme', 'b')]);
    }
  });

  it('lets any other failure win over metadata failures', () => {
    const conflicts: ResolutionError = { type: 'conflicts', description: 'com.acme:util' };
    assert.equal(combineResolutionErrors([metadataError('com.acme', 'a', '1.0.0'), conflicts]), conflicts);
  });
});
