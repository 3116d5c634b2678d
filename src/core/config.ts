import fs from 'node:fs/promises';
import YAML from 'yaml';
import type { Config } from '../types/config.js';
import { configPath } from '../lib/paths.js';
import { RcompError } from '../lib/errors.js';
import { DEFAULT_SEPARATOR, DEFAULT_TOLERANCE } from './composer.js';

export const DEFAULT_CONFIG: Config = {
  manifest: 'modules/manifest.yaml',
  contentDir: 'modules',
  contentExtension: '.md',
  separator: DEFAULT_SEPARATOR,
  composeTolerance: DEFAULT_TOLERANCE,
  sessionsDir: '.rcomp/sessions',
};

export async function loadConfig(projectRoot: string): Promise<Config> {
  const cfgPath = configPath(projectRoot);
  let raw: string;
  try {
    raw = await fs.readFile(cfgPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return { ...DEFAULT_CONFIG };
    }
    throw err;
  }
  const parsed: unknown = YAML.parse(raw);
  return mergeConfig(DEFAULT_CONFIG, parsed ?? {});
}

function invalid(key: string, expected: string): RcompError {
  return new RcompError(`Invalid config: "${key}" must be ${expected}`, 'INVALID_CONFIG');
}

export function mergeConfig(defaults: Config, overrides: unknown): Config {
  if (typeof overrides !== 'object' || overrides === null || Array.isArray(overrides)) {
    throw new RcompError('Invalid config: expected a mapping at the top level', 'INVALID_CONFIG');
  }
  const merged: Config = { ...defaults };
  const entries = Object.entries(overrides);

  for (const [key, value] of entries) {
    switch (key) {
      case 'manifest':
      case 'contentDir':
      case 'contentExtension':
      case 'separator':
      case 'sessionsDir':
        if (typeof value !== 'string') throw invalid(key, 'a string');
        merged[key] = value;
        break;
      case 'composeTolerance':
        if (typeof value !== 'number' || value < 0) throw invalid(key, 'a non-negative number');
        merged.composeTolerance = value;
        break;
      case 'defaultBudget':
        if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
          throw invalid(key, 'a positive integer');
        }
        merged.defaultBudget = value;
        break;
      default:
        throw new RcompError(`Invalid config: unknown key "${key}"`, 'INVALID_CONFIG');
    }
  }
  return merged;
}

export async function writeDefaultConfig(projectRoot: string): Promise<void> {
  const cfgPath = configPath(projectRoot);
  const content = YAML.stringify(DEFAULT_CONFIG, { indent: 2 });
  await fs.writeFile(cfgPath, content, 'utf-8');
}
