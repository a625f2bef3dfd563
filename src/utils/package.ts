import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

// src/utils when run from sources, dist/src/utils when built
const PACKAGE_JSON_CANDIDATES = ['../../package.json', '../../../package.json'];

function readVersion(relative: string): string | null {
  try {
    const raw: unknown = JSON.parse(
      readFileSync(fileURLToPath(new URL(relative, import.meta.url)), 'utf8')
    );
    if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
      return raw.version;
    }
  } catch {
    // not at this level
  }
  return null;
}

export function getVersion(): string {
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    const version = readVersion(candidate);
    if (version) return version;
  }
  return '0.0.0';
}
