import { existsSync, readFileSync } from 'fs';
import { fileURLToPath } from 'url';

// src/utils when run from sources, dist/src/utils once built
const PACKAGE_JSON_CANDIDATES = ['../../package.json', '../../../package.json'];

function readVersion(path: string): string | undefined {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf8'));
  if (typeof parsed === 'object' && parsed !== null && 'name' in parsed && parsed.name === 'sandkit') {
    return 'version' in parsed && typeof parsed.version === 'string' ? parsed.version : undefined;
  }
  return undefined;
}

/**
 * Version of the running sandkit, from its package.json
 */
export function getVersion(): string {
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    const path = fileURLToPath(new URL(candidate, import.meta.url));
    const version = existsSync(path) ? readVersion(path) : undefined;
    if (version) {
      return version;
    }
  }
  return '0.0.0';
}
