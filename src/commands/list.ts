import { openWorkspace } from '../core/workspace.js';
import { RcompError } from '../lib/errors.js';
import { formatCategory, formatTable, output, type Column } from '../lib/output.js';
import type { Module } from '../types/module.js';

export interface ListOptions {
  tag?: string;
  json?: boolean;
}

export async function listCommand(type: string, options: ListOptions): Promise<void> {
  if (type === 'modules') {
    await listModulesCommand(options);
  } else if (type === 'goals') {
    await listGoalsCommand(options);
  } else {
    throw new RcompError(`Unknown list type: ${type}. Available: modules, goals`, 'INVALID_ARGS');
  }
}

async function listModulesCommand(options: ListOptions): Promise<void> {
  const { registry } = await openWorkspace();

  const modules: Module[] = options.tag ? [...registry.lookupByTag(options.tag)] : registry.list();

  if (options.json) {
    output({ modules }, true);
    return;
  }

  if (modules.length === 0) {
    console.log(options.tag ? `No modules tagged "${options.tag}".` : 'No modules in the manifest.');
    return;
  }

  const columns: Column[] = [
    { header: 'ID', key: 'id' },
    { header: 'Title', key: 'title', width: 32 },
    { header: 'Category', key: 'category', width: 11, format: (v) => String(v) },
    { header: 'Tokens', key: 'tokenEstimate' },
    { header: 'Depends on', key: 'dependencies', format: (v) => (Array.isArray(v) ? v.join(', ') : '') },
    { header: 'Tags', key: 'tags', format: (v) => (Array.isArray(v) ? v.join(', ') : '') },
  ];

  const rows = modules.map((m) => ({
    id: m.id,
    title: m.title,
    category: formatCategory(m.category),
    tokenEstimate: m.tokenEstimate,
    dependencies: m.dependencies,
    tags: m.tags,
  }));

  console.log(formatTable(rows, columns));
}

async function listGoalsCommand(options: ListOptions): Promise<void> {
  const { registry } = await openWorkspace();

  const goals = registry.goalNames().map((goal) => ({
    goal,
    modules: registry.lookupByGoal(goal).map((m) => m.id),
  }));

  if (options.json) {
    output({ goals }, true);
    return;
  }

  if (goals.length === 0) {
    console.log('No goals defined in the manifest.');
    return;
  }

  const columns: Column[] = [
    { header: 'Goal', key: 'goal' },
    { header: 'Modules', key: 'modules', format: (v) => (Array.isArray(v) ? v.join(', ') : '') },
  ];

  console.log(formatTable(goals, columns));
}
