import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

function readPackageVersion(relativePath: string): string | undefined {
  const pkgPath = new URL(relativePath, import.meta.url);
  const pkg: unknown = JSON.parse(readFileSync(fileURLToPath(pkgPath), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return undefined;
}

/**
 * Service version (single source of truth)
 *
 * Reads from package.json by default, with optional env override.
 * Resolves relative to this file so both `src/version.ts` (tests) and
 * `dist/src/version.js` (production) find the root package.json.
 */
export const SERVICE_VERSION =
  process.env.SERVICE_VERSION ??
  ((): string => {
    try {
      return readPackageVersion('../package.json') ?? '0.0.0';
    } catch {
      // dist/src/version.js sits one level deeper
      try {
        return readPackageVersion('../../package.json') ?? '0.0.0';
      } catch {
        return '0.0.0';
      }
    }
  })();
