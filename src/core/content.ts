import fs from 'node:fs/promises';
import { contentPath } from '../lib/paths.js';
import type { ContentLoader } from './composer.js';

/**
 * Reads `<contentDir>/<id><extension>` for every id. Missing files are left out
 * of the map, so the composer can report exactly which module has no content.
 */
export async function readModuleContents(
  contentDir: string,
  moduleIds: readonly string[],
  extension = '.md',
): Promise<Map<string, string>> {
  const contents = new Map<string, string>();
  await Promise.all(
    moduleIds.map(async (id) => {
      try {
        contents.set(id, await fs.readFile(contentPath(contentDir, id, extension), 'utf-8'));
      } catch (err) {
        if ((err as NodeJS.ErrnoException).code !== 'ENOENT') throw err;
      }
    }),
  );
  return contents;
}

export function mapLoader(contents: ReadonlyMap<string, string>): ContentLoader {
  return (moduleId) => contents.get(moduleId);
}
