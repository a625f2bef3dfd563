/**
 * Core Ports
 *
 * Re-exports all port interfaces and default implementations.
 * These ports define the boundary between the resolution core
 * and external concerns (engines, UI, I/O).
 */

export type { OutputPort, UnifiedSpinner } from './output.js';
export type { ResolverEngine } from './resolver-engine.js';
export type { ArtifactFetcher } from './artifact-fetcher.js';
export type { ReportBuilder } from './report-builder.js';
export { consoleOutput } from './console-output.js';
export { resolveOutput } from './resolve.js';
