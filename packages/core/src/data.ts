import { existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

/** Absolute path of a file under packages/core/data, from sources or from dist. */
export function resolveDataFile(name: string): string {
  const thisDir = dirname(fileURLToPath(import.meta.url));
  const srcPath = resolve(thisDir, '..', 'data', name);
  if (existsSync(srcPath)) return srcPath;
  // dist/core/src -> packages/core/data
  return resolve(thisDir, '..', '..', '..', 'packages', 'core', 'data', name);
}
