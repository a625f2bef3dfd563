import type {
  Logger,
  PlatformJarOverrides,
  ResolutionParams
} from '../../types/index.js';
import type { ArtifactFetcher } from '../ports/artifact-fetcher.js';
import type { ReportBuilder } from '../ports/report-builder.js';
import type { ResolverEngine } from '../ports/resolver-engine.js';

export type PipelineState = 'start' | 'resolving' | 'fetching' | 'assembling' | 'done' | 'failed';

const TRANSITIONS: Record<PipelineState, ReadonlyArray<PipelineState>> = {
  start: ['resolving'],
  resolving: ['fetching', 'failed'],
  fetching: ['assembling'],
  assembling: ['done'],
  done: [],
  failed: []
};

export interface ResolutionCollaborators {
  engine: ResolverEngine;
  fetcher: ArtifactFetcher;
  reportBuilder: ReportBuilder;
}

/**
 * State for one run of the resolution pipeline
 */
export interface ResolutionPipelineContext {
  readonly params: ResolutionParams;
  /** Configuration -> transitive extends closure */
  readonly configs: ReadonlyMap<string, ReadonlySet<string>>;
  readonly platformJarOverrides: PlatformJarOverrides;
  readonly collaborators: ResolutionCollaborators;
  readonly logger: Logger;
  state: PipelineState;
  /** Every state the pipeline went through, in order */
  readonly history: PipelineState[];
}

export function createPipelineContext(
  init: Omit<ResolutionPipelineContext, 'state' | 'history'>
): ResolutionPipelineContext {
  return { ...init, state: 'start', history: ['start'] };
}

export function transition(ctx: ResolutionPipelineContext, next: PipelineState): void {
  if (!TRANSITIONS[ctx.state].includes(next)) {
    throw new Error(`Illegal pipeline transition: ${ctx.state} -> ${next}`);
  }
  ctx.logger.debug(`Resolution pipeline: ${ctx.state} -> ${next}`);
  ctx.state = next;
  ctx.history.push(next);
}
