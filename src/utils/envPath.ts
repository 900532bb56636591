import { dirname, resolve } from 'path';

/**
 * Path of the project's `.env` for a module one directory below the root
 * (`src/`, `db/`). Compiled modules sit one level deeper, under `dist/`.
 */
export function resolveEnvPath(moduleFile: string): string {
  const root = moduleFile.endsWith('.ts')
    ? resolve(dirname(moduleFile), '..')
    : resolve(dirname(moduleFile), '..', '..');
  return resolve(root, '.env');
}
