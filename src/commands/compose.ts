import fs from 'node:fs/promises';
import { openWorkspace } from '../core/workspace.js';
import { planFromFile } from '../core/resolver.js';
import { compose } from '../core/composer.js';
import { mapLoader, readModuleContents } from '../core/content.js';
import { resolveFromRoot } from '../lib/paths.js';
import { InvalidPlanError, RcompError } from '../lib/errors.js';
import { output, success, warn } from '../lib/output.js';

export interface ComposeOptions {
  plan: string;
  output?: string;
  json?: boolean;
}

async function readPlanFile(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new RcompError(`Plan file not found: ${filePath}`, 'INVALID_ARGS');
    }
    throw err;
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new InvalidPlanError(`not valid JSON: ${filePath}`);
  }
}

export async function composeCommand(options: ComposeOptions): Promise<void> {
  const { projectRoot, config, registry } = await openWorkspace();
  const plan = planFromFile(registry, await readPlanFile(options.plan));

  const contentDir = resolveFromRoot(projectRoot, config.contentDir);
  const contents = await readModuleContents(
    contentDir,
    plan.orderedModules.map((m) => m.id),
    config.contentExtension,
  );

  const { artifact, manifest } = compose(plan, mapLoader(contents), {
    separator: config.separator,
    tolerance: config.composeTolerance,
  });

  if (options.output) {
    await fs.writeFile(options.output, artifact, 'utf-8');
  }

  if (options.json) {
    output(options.output ? manifest : { ...manifest, artifact }, true);
    return;
  }

  for (const warning of manifest.warnings) warn(warning);

  if (options.output) {
    success(
      `Wrote ${manifest.modules.length} module(s) to ${options.output} (${manifest.measuredTokens} measured / ${manifest.declaredTokens} declared tokens)`,
    );
  } else {
    process.stdout.write(artifact.endsWith('\n') ? artifact : artifact + '\n');
  }
}
