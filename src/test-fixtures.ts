import { ModuleRegistry } from './core/registry.js';
import type { ModuleDefinition } from './types/module.js';
import type { Finding, ReviewSession } from './types/session.js';

export function makeModuleDef(overrides?: Partial<ModuleDefinition>): ModuleDefinition {
  return {
    id: 'injection',
    category: 'specialized',
    tokenEstimate: 1000,
    ...overrides,
  };
}

/** Registers the definitions in order and seals. */
export function makeRegistry(defs: ModuleDefinition[], goals: Record<string, string[]> = {}): ModuleRegistry {
  const registry = new ModuleRegistry();
  for (const def of defs) registry.register(def);
  for (const [goal, ids] of Object.entries(goals)) registry.defineGoal(goal, ids);
  registry.seal();
  return registry;
}

/** Registry from the budget walkthrough: A core, B specialized on A, C checklist. */
export function makeAbcRegistry(): ModuleRegistry {
  return makeRegistry([
    { id: 'A', category: 'core', tokenEstimate: 1000 },
    { id: 'B', category: 'specialized', tokenEstimate: 2000, dependencies: ['A'] },
    { id: 'C', category: 'checklist', tokenEstimate: 500 },
  ]);
}

export function makeFinding(overrides?: Partial<Finding>): Finding {
  return {
    moduleId: 'injection',
    severity: 'P2',
    category: 'sql-injection',
    description: 'Query built by string concatenation',
    ...overrides,
  };
}

export function makeSession(overrides?: Partial<ReviewSession>): ReviewSession {
  return {
    id: 'rs-test1234',
    status: 'Created',
    findings: [],
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}
