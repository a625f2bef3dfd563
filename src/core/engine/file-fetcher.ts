/**
 * File system artifact fetcher
 *
 * Copies artifacts behind file: URLs into the artifact cache, honoring the
 * cache policies in order and verifying checksum sidecars next to the
 * source file. Each artifact ends up either as a cached path or a FileError.
 */

import { createHash } from 'crypto';
import { promises as fs } from 'fs';
import { join } from 'path';
import { fileURLToPath } from 'url';
import type {
  Artifact,
  ArtifactMap,
  ArtifactsParams,
  CachePolicy,
  FileError,
  Logger,
  Result
} from '../../types/index.js';
import { err, ok } from '../../types/index.js';
import { runWithConcurrency } from '../../utils/concurrency-pool.js';
import { copyFile, exists, getModifiedTime, isFile, readTextFile } from '../../utils/fs.js';
import type { ArtifactFetcher } from '../ports/artifact-fetcher.js';
import { collectArtifacts } from '../resolution/artifacts.js';

const CHECKSUM_SIDECARS: Readonly<Record<string, { algorithm: string; suffix: string }>> = {
  'SHA-1': { algorithm: 'sha1', suffix: '.sha1' },
  'SHA-256': { algorithm: 'sha256', suffix: '.sha256' },
  MD5: { algorithm: 'md5', suffix: '.md5' }
};

type FetchOutcome = Result<string, FileError>;

interface ArtifactFetch {
  artifact: Artifact;
  /** Local source file, null when the URL is not a file: URL */
  source: string | null;
  cachePath: string;
}

/**
 * Location of an artifact inside the cache: <cacheDir>/<scheme>/<host>/<path>
 */
export function cachePathFor(cacheDir: string, url: string): string {
  const parsed = new URL(url);
  const segments = [
    parsed.protocol.replace(/:$/, ''),
    parsed.host,
    ...decodeURIComponent(parsed.pathname).split('/')
  ].filter(segment => segment.length > 0 && segment !== '.' && segment !== '..');
  return join(cacheDir, ...segments);
}

function sourcePathOf(url: string): string | null {
  return url.startsWith('file:') ? fileURLToPath(url) : null;
}

export class FileSystemArtifactFetcher implements ArtifactFetcher {
  private readonly now: () => number;

  constructor(options: { now?: () => number } = {}) {
    this.now = options.now ?? Date.now;
  }

  async fetch(params: ArtifactsParams, logger: Logger): Promise<ArtifactMap> {
    const artifacts = collectArtifacts(params.graphs, params.classifiers);
    logger.debug(`Fetching ${artifacts.length} artifact(s) into ${params.cacheDir}`);

    const tasks = artifacts.map(artifact => () =>
      this.fetchOne(
        { artifact, source: sourcePathOf(artifact.url), cachePath: cachePathFor(params.cacheDir, artifact.url) },
        params,
        logger
      )
    );
    const { results } = await runWithConcurrency(tasks, params.parallelDownloads);

    const fetched = new Map<string, FetchOutcome>();
    results.forEach((outcome, index) => {
      const { url } = artifacts[index];
      fetched.set(
        url,
        outcome.status === 'fulfilled' ? outcome.value : err({ type: 'download-error', reason: outcome.error.message })
      );
    });
    return fetched;
  }

  private async fetchOne(fetch: ArtifactFetch, params: ArtifactsParams, logger: Logger): Promise<FetchOutcome> {
    let last: FetchOutcome = err({ type: 'not-found', file: fetch.artifact.url, permanent: false });

    for (const policy of params.cachePolicies) {
      last = await this.applyPolicy(policy, fetch, params, logger);
      if (last.ok) {
        logger.debug(`${fetch.artifact.url} -> ${last.data} (${policy})`);
        return last;
      }
    }
    return last;
  }

  private isStale(modified: number, ttlMs: number | null): boolean {
    return ttlMs !== null && this.now() - modified > ttlMs;
  }

  private async applyPolicy(
    policy: CachePolicy,
    fetch: ArtifactFetch,
    params: ArtifactsParams,
    logger: Logger
  ): Promise<FetchOutcome> {
    const { artifact, cachePath } = fetch;
    const modified = await getModifiedTime(cachePath);
    const cached = modified !== null;
    const fresh = modified !== null && !this.isStale(modified, params.ttlMs);
    const notCached: FetchOutcome = err({ type: 'not-found', file: artifact.url, permanent: false });
    const download = () => this.download(fetch, params.checksums, logger);

    switch (policy) {
      case 'local-only':
        return cached ? ok(cachePath) : notCached;
      case 'local-update-changing':
        if (!cached) return notCached;
        return artifact.changing && !fresh ? download() : ok(cachePath);
      case 'local-update':
        if (!cached) return notCached;
        return fresh ? ok(cachePath) : download();
      case 'update-changing':
        if (artifact.changing) return fresh ? ok(cachePath) : download();
        return cached ? ok(cachePath) : download();
      case 'update':
        return fresh ? ok(cachePath) : download();
      case 'fetch-missing':
        return cached ? ok(cachePath) : download();
      case 'force-download':
        return download();
    }
  }

  private async download(fetch: ArtifactFetch, checksums: ReadonlyArray<string>, logger: Logger): Promise<FetchOutcome> {
    const { artifact, source, cachePath } = fetch;
    if (source === null) {
      return err({ type: 'download-error', reason: `unsupported URL scheme: ${artifact.url}` });
    }
    if (!(await isFile(source))) {
      return err({ type: 'not-found', file: artifact.url, permanent: true });
    }

    const mismatch = await verifyChecksums(source, checksums);
    if (mismatch) {
      return err({ type: 'download-error', reason: `${mismatch} checksum mismatch for ${artifact.url}` });
    }

    await copyFile(source, cachePath);
    logger.debug(`Copied ${source} to cache`);
    return ok(cachePath);
  }
}

/**
 * Check the first checksum sidecar found, in preference order.
 * Returns the name of the failing checksum, or null.
 */
export async function verifyChecksums(file: string, checksums: ReadonlyArray<string>): Promise<string | null> {
  for (const name of checksums) {
    const sidecar = CHECKSUM_SIDECARS[name];
    if (!sidecar || !(await exists(file + sidecar.suffix))) continue;

    const expected = (await readTextFile(file + sidecar.suffix)).trim().split(/\s+/)[0]?.toLowerCase() ?? '';
    const actual = createHash(sidecar.algorithm).update(await fs.readFile(file)).digest('hex');
    return expected === actual ? null : name;
  }
  return null;
}
