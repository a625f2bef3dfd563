export { DirectoryResolverEngine } from './directory-engine.js';
export { FileSystemArtifactFetcher } from './file-fetcher.js';
export { DirectoryRepository } from './directory-repository.js';
export { ModuleVersionSolver } from './version-solver.js';
