import fg from 'fast-glob';
import type { LifetimeLintConfig } from './types.js';

export const SCANNED_EXTENSIONS = ['js', 'mjs', 'cjs'] as const;

const ALWAYS_IGNORED = ['**/node_modules/**', '**/.git/**'];

/**
 * Every JavaScript file under the root, sorted by path. `.gitignore` is not
 * consulted, so git-ignored build output is scanned; `ignore.files` skips paths.
 */
export async function scanFiles(
  projectRoot: string,
  config: LifetimeLintConfig
): Promise<string[]> {
  const files = await fg(`**/*.{${SCANNED_EXTENSIONS.join(',')}}`, {
    cwd: projectRoot,
    absolute: true,
    onlyFiles: true,
    ignore: [...ALWAYS_IGNORED, ...(config.ignore?.files ?? [])],
  });

  return files.sort();
}
