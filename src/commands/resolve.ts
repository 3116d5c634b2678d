import fs from 'node:fs/promises';
import { openWorkspace } from '../core/workspace.js';
import { planToFile, resolve } from '../core/resolver.js';
import { parseCount, parseList } from '../lib/args.js';
import { formatCategory, formatTable, output, success, warn, type Column } from '../lib/output.js';
import type { SelectionCriteria } from '../types/plan.js';

export interface ResolveOptions {
  explicit?: string[];
  goal?: string[];
  budget?: string;
  maxModules?: string;
  output?: string;
  json?: boolean;
}

export function buildCriteria(options: ResolveOptions, defaultBudget?: number): SelectionCriteria {
  return {
    explicitIds: parseList(options.explicit),
    goalTags: parseList(options.goal),
    tokenBudget: parseCount(options.budget, '--budget') ?? defaultBudget,
    maxModules: parseCount(options.maxModules, '--max-modules'),
  };
}

export async function resolveCommand(options: ResolveOptions): Promise<void> {
  const { config, registry } = await openWorkspace();
  const plan = resolve(registry, buildCriteria(options, config.defaultBudget));
  const planFile = planToFile(plan);

  if (options.output) {
    await fs.writeFile(options.output, JSON.stringify(planFile, null, 2) + '\n', 'utf-8');
  }

  if (options.json) {
    output(planFile, true);
    return;
  }

  for (const warning of plan.warnings) warn(warning);

  const columns: Column[] = [
    { header: '#', key: 'position' },
    { header: 'Module', key: 'id' },
    { header: 'Category', key: 'category' },
    { header: 'Tokens', key: 'tokens' },
  ];
  const rows = plan.orderedModules.map((m, i) => ({
    position: i + 1,
    id: m.id,
    category: formatCategory(m.category),
    tokens: m.tokenEstimate,
  }));

  console.log(formatTable(rows, columns));
  console.log(`\nTotal tokens: ${plan.totalTokens}`);
  if (options.output) {
    success(`Wrote plan to ${options.output}`);
  }
}
