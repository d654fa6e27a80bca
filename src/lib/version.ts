import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

export const FALLBACK_VERSION = 'unknown';

const MAX_PARENT_DIRS = 10;

function readPackageVersion(candidate: string): string | null {
  try {
    const json: unknown = JSON.parse(fs.readFileSync(candidate, 'utf8'));
    if (json && typeof json === 'object' && 'version' in json && typeof json.version === 'string') {
      const version = json.version.trim();
      return version.length > 0 ? version : null;
    }
    return null;
  } catch {
    return null;
  }
}

/**
 * Walks up from the calling module to the nearest package.json with a version.
 * GITLAB_GATEWAY_VERSION overrides the lookup.
 */
export function resolvePackageVersion(importMetaUrl?: string, env: NodeJS.ProcessEnv = process.env): string {
  const injected = env.GITLAB_GATEWAY_VERSION?.trim() ?? '';
  if (injected.length > 0) {
    return injected;
  }

  let dir = process.cwd();
  if (importMetaUrl?.startsWith('file:')) {
    dir = path.dirname(fileURLToPath(importMetaUrl));
  }
  for (let i = 0; i < MAX_PARENT_DIRS; i += 1) {
    const version = readPackageVersion(path.join(dir, 'package.json'));
    if (version) {
      return version;
    }

    const parent = path.dirname(dir);
    if (parent === dir) {
      break;
    }
    dir = parent;
  }

  return FALLBACK_VERSION;
}

export function getCliVersion(): string {
  return resolvePackageVersion(import.meta.url);
}
