export { DependencyResolution } from './dependency-resolution.js';
export type { DependencyResolutionOptions, PreparedRequest } from './dependency-resolution.js';
export { runResolutionPipeline } from './pipeline.js';
export { formatUnresolvedWarningLines, unresolvedWarningOrThrow } from './failure-translator.js';
export { configExtends, configurationClosures, configurationGraphs } from './config-graph.js';
export { defaultReportBuilder } from './report-builder.js';
