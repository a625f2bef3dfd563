/**
 * Artifact Fetcher Port
 *
 * Fetches the artifacts of resolved graphs into the cache. Per-artifact
 * failures are part of the returned map, never thrown.
 */

import type { ArtifactMap, ArtifactsParams, Logger } from '../../types/index.js';

export interface ArtifactFetcher {
  fetch(params: ArtifactsParams, logger: Logger): Promise<ArtifactMap>;
}
