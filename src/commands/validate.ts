import { openWorkspace } from '../core/workspace.js';
import { resolveFromRoot } from '../lib/paths.js';
import { output, success } from '../lib/output.js';

export interface ValidateOptions {
  json?: boolean;
}

/** Loads and seals the manifest; any registry error propagates with its exit code. */
export async function validateCommand(options: ValidateOptions): Promise<void> {
  const { projectRoot, config, registry } = await openWorkspace();
  const manifest = resolveFromRoot(projectRoot, config.manifest);
  const goals = registry.goalNames().length;

  if (options.json) {
    output({ valid: true, manifest, modules: registry.size, goals }, true);
    return;
  }
  success(`Manifest ${manifest} is valid: ${registry.size} module(s), ${goals} goal(s)`);
}
