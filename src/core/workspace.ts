import { loadConfig } from './config.js';
import { loadRegistry } from './manifest.js';
import { getProjectRoot } from './project.js';
import { resolveFromRoot } from '../lib/paths.js';
import type { ModuleRegistry } from './registry.js';
import type { Config } from '../types/config.js';

export interface Workspace {
  projectRoot: string;
  config: Config;
  registry: ModuleRegistry;
}

export async function openWorkspace(cwd?: string): Promise<Workspace> {
  const projectRoot = await getProjectRoot(cwd);
  const config = await loadConfig(projectRoot);
  const registry = await loadRegistry(resolveFromRoot(projectRoot, config.manifest));
  return { projectRoot, config, registry };
}
