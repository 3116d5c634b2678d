import fs from 'node:fs/promises';
import YAML from 'yaml';
import { ModuleRegistry } from './registry.js';
import { EXIT_INVALID_REGISTRY, InvalidModuleError, ManifestNotFoundError, RcompError } from '../lib/errors.js';
import {
  MODULE_CATEGORIES,
  type ModuleCategory,
  type ModuleDefinition,
  type ModuleManifest,
} from '../types/module.js';

function isCategory(value: unknown): value is ModuleCategory {
  return MODULE_CATEGORIES.some((c) => c === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown, id: string, field: string): string[] | undefined {
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || value.some((v) => typeof v !== 'string')) {
    throw new InvalidModuleError(id, `${field} must be a list of strings`);
  }
  return value.map(String);
}

function parseModuleEntry(entry: unknown, index: number): ModuleDefinition {
  if (!isRecord(entry)) {
    throw new InvalidModuleError(`modules[${index}]`, 'expected a mapping');
  }
  const id = typeof entry.id === 'string' ? entry.id : '';
  if (!id) throw new InvalidModuleError(`modules[${index}]`, 'missing "id"');

  const { category, tokenEstimate, title, checklistItems } = entry;
  if (!isCategory(category)) {
    throw new InvalidModuleError(
      id,
      `unknown category "${String(category)}". Must be one of: ${MODULE_CATEGORIES.join(', ')}`,
    );
  }
  if (typeof tokenEstimate !== 'number') {
    throw new InvalidModuleError(id, 'missing numeric "tokenEstimate"');
  }
  if (title !== undefined && typeof title !== 'string') {
    throw new InvalidModuleError(id, '"title" must be a string');
  }
  if (checklistItems !== undefined && typeof checklistItems !== 'number') {
    throw new InvalidModuleError(id, '"checklistItems" must be a number');
  }

  return {
    id,
    title,
    category,
    tokenEstimate,
    dependencies: stringList(entry.dependencies, id, 'dependencies'),
    tags: stringList(entry.tags, id, 'tags'),
    checklistItems,
  };
}

/** Validates the shape of a parsed manifest document. */
export function parseManifest(data: unknown): ModuleManifest {
  const entries: unknown = isRecord(data) ? data.modules : undefined;
  if (!isRecord(data) || !Array.isArray(entries)) {
    throw new RcompError('Invalid module manifest: missing "modules" list', 'INVALID_MANIFEST', EXIT_INVALID_REGISTRY);
  }
  const modules = entries.map((entry: unknown, i) => parseModuleEntry(entry, i));

  const rawGoals = data.goals;
  let goals: Record<string, string[]> | undefined;
  if (rawGoals !== undefined && rawGoals !== null) {
    if (!isRecord(rawGoals)) {
      throw new RcompError('Invalid module manifest: "goals" must map goal tags to module id lists', 'INVALID_MANIFEST', EXIT_INVALID_REGISTRY);
    }
    goals = {};
    for (const [goal, ids] of Object.entries(rawGoals)) {
      goals[goal] = stringList(ids, `goal:${goal}`, 'goal modules') ?? [];
    }
  }

  return goals ? { modules, goals } : { modules };
}

/**
 * Registers every module and goal, then seals. Any failure aborts before the
 * registry is sealed, so callers never see a partially valid registry.
 */
export function buildRegistry(manifest: ModuleManifest): ModuleRegistry {
  const registry = new ModuleRegistry();
  for (const def of manifest.modules) registry.register(def);
  for (const [goal, ids] of Object.entries(manifest.goals ?? {})) {
    registry.defineGoal(goal, ids);
  }
  registry.seal();
  return registry;
}

/** Reads a YAML or JSON manifest file. */
export async function readManifestFile(filePath: string): Promise<ModuleManifest> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new ManifestNotFoundError(filePath);
    }
    throw err;
  }
  const parsed: unknown = filePath.endsWith('.json') ? JSON.parse(raw) : YAML.parse(raw);
  return parseManifest(parsed);
}

export async function loadRegistry(filePath: string): Promise<ModuleRegistry> {
  return buildRegistry(await readManifestFile(filePath));
}
