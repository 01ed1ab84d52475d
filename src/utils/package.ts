/**
 * Package metadata for --version.
 */

import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

/**
 * Walk up from this file to the directory holding package.json. The depth
 * differs between src/ under tsx and dist/src/ after a build.
 */
function findPackageJson(): string | null {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (let i = 0; i < 6; i++) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return null;
}

export function getVersion(): string {
  const packageJson = findPackageJson();
  if (!packageJson) {
    return '0.0.0';
  }
  const parsed: unknown = JSON.parse(readFileSync(packageJson, 'utf-8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}
