import fs from 'node:fs/promises';
import path from 'node:path';
import { getProjectRoot } from '../core/project.js';
import { DEFAULT_CONFIG, writeDefaultConfig } from '../core/config.js';
import { configPath, contentPath, rcompDir, resolveFromRoot } from '../lib/paths.js';
import { info, success } from '../lib/output.js';
import { starterContent, starterManifest } from '../bundled/starter.js';

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function writeIfMissing(filePath: string, content: string): Promise<boolean> {
  if (await exists(filePath)) return false;
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, 'utf-8');
  return true;
}

export async function initCommand(options: { json?: boolean }): Promise<void> {
  const projectRoot = await getProjectRoot();
  const written: string[] = [];

  // 1. Directory structure
  await fs.mkdir(rcompDir(projectRoot), { recursive: true });
  await fs.mkdir(resolveFromRoot(projectRoot, DEFAULT_CONFIG.sessionsDir), { recursive: true });

  // 2. Default config (skip if exists)
  const cfgPath = configPath(projectRoot);
  if (await exists(cfgPath)) {
    if (!options.json) info('config.yaml already exists, skipping');
  } else {
    await writeDefaultConfig(projectRoot);
    written.push(cfgPath);
    if (!options.json) info('Wrote default config.yaml');
  }

  // 3. Starter manifest and module content
  const manifestPath = resolveFromRoot(projectRoot, DEFAULT_CONFIG.manifest);
  if (await writeIfMissing(manifestPath, starterManifest)) {
    written.push(manifestPath);
    if (!options.json) info(`Wrote starter manifest: ${DEFAULT_CONFIG.manifest}`);

    const contentDir = resolveFromRoot(projectRoot, DEFAULT_CONFIG.contentDir);
    for (const [id, content] of Object.entries(starterContent)) {
      const filePath = contentPath(contentDir, id, DEFAULT_CONFIG.contentExtension);
      if (await writeIfMissing(filePath, content)) written.push(filePath);
    }
  }

  if (options.json) {
    console.log(JSON.stringify({ success: true, projectRoot, written }));
  } else {
    success(`rcomp initialized in ${projectRoot}`);
  }
}
