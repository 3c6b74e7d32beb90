import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

const FALLBACK_VERSION = '0.0.0';

/**
 * Package version, read once from package.json.
 *
 * Both `src/utils` and `dist/utils` sit two levels below the package root.
 */
let cachedVersion: string = '';

export function getVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  try {
    const pkgPath = join(dirname(fileURLToPath(import.meta.url)), '../../package.json');
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    cachedVersion =
      typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
        ? pkg.version
        : FALLBACK_VERSION;
  } catch {
    // package.json is not shipped alongside some bundled builds
    cachedVersion = FALLBACK_VERSION;
  }

  return cachedVersion;
}

export const VERSION: string = getVersion();
