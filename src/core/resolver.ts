import {
  BudgetInfeasibleError,
  InvalidPlanError,
  RegistryNotSealedError,
  UnknownModuleError,
} from '../lib/errors.js';
import { CATEGORY_PRIORITY, type Module } from '../types/module.js';
import type { ExecutionPlan, PlanFile, SelectionCriteria } from '../types/plan.js';
import type { ModuleRegistry } from './registry.js';

type Comparator = (a: Module, b: Module) => number;

function byPriorityThenRegistration(registry: ModuleRegistry): Comparator {
  return (a, b) =>
    CATEGORY_PRIORITY[a.category] - CATEGORY_PRIORITY[b.category] ||
    registry.registrationIndex(a.id) - registry.registrationIndex(b.id);
}

function sumTokens(modules: Iterable<Module>): number {
  let total = 0;
  for (const m of modules) total += m.tokenEstimate;
  return total;
}

function validateLimit(name: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
    throw new InvalidPlanError(`${name} must be a non-negative integer, got ${value}`);
  }
}

function collectSeeds(
  registry: ModuleRegistry,
  criteria: SelectionCriteria,
  warnings: string[],
): Set<string> {
  const explicitIds = [...new Set(criteria.explicitIds ?? [])];
  const unknown = explicitIds.filter((id) => !registry.has(id));
  if (unknown.length > 0) throw new UnknownModuleError(unknown);

  const seeds = new Set(explicitIds);
  const goalTags = [...new Set(criteria.goalTags ?? [])].sort();
  for (const goal of goalTags) {
    const matches = registry.lookupByGoal(goal);
    if (matches.length === 0) {
      warnings.push(`Goal "${goal}" matched no modules`);
    }
    for (const module of matches) seeds.add(module.id);
  }
  return seeds;
}

/** Seeds plus every transitive dependency. */
function dependencyClosure(registry: ModuleRegistry, roots: Iterable<string>): Set<string> {
  const closure = new Set<string>();
  const visit = (id: string): void => {
    if (closure.has(id)) return;
    closure.add(id);
    for (const dep of registry.require(id).dependencies) visit(dep);
  };
  for (const id of roots) visit(id);
  return closure;
}

/**
 * Kahn's algorithm over the selected modules. Among modules whose dependencies
 * are all placed, the next one is chosen by category priority and then by
 * registration order, so the result is independent of input order.
 */
function topologicalOrder(registry: ModuleRegistry, ids: Set<string>): Module[] {
  const compare = byPriorityThenRegistration(registry);
  const pending = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const id of ids) {
    const deps = registry.require(id).dependencies.filter((dep) => ids.has(dep));
    pending.set(id, deps.length);
    for (const dep of deps) {
      dependents.set(dep, [...(dependents.get(dep) ?? []), id]);
    }
  }

  const ready = [...ids].filter((id) => pending.get(id) === 0).map((id) => registry.require(id));
  const ordered: Module[] = [];

  while (ready.length > 0) {
    ready.sort(compare);
    const next = ready.shift();
    if (!next) break;
    ordered.push(next);
    for (const dependent of dependents.get(next.id) ?? []) {
      const remaining = (pending.get(dependent) ?? 0) - 1;
      pending.set(dependent, remaining);
      if (remaining === 0) ready.push(registry.require(dependent));
    }
  }

  return ordered;
}

function isDependencyOfRetained(id: string, retained: Module[]): boolean {
  return retained.some((m) => m.dependencies.includes(id));
}

/** Modules the cap applies to: neither required by core nor a dependency of another retained module. */
function optionalModules(retained: Module[], floor: ReadonlySet<string>): Module[] {
  return retained.filter((m) => !floor.has(m.id) && !isDependencyOfRetained(m.id, retained));
}

function describe(module: Module): string {
  return `${module.id} (${module.category}, ${module.tokenEstimate} tokens)`;
}

/**
 * Turns selection criteria into an ordered, dependency-complete plan that fits
 * the optional token budget and module cap.
 *
 * Core modules and everything they depend on are never dropped. Optional
 * modules are dropped one at a time, checklist first, then tech_stack, then
 * specialized, most recently registered first within a category. The module
 * cap counts only optional modules, never core modules or dependencies of
 * retained modules.
 *
 * @throws UnknownModuleError when an explicit id is not registered.
 * @throws BudgetInfeasibleError when the non-droppable modules exceed the budget.
 */
export function resolve(registry: ModuleRegistry, criteria: SelectionCriteria): ExecutionPlan {
  if (!registry.isSealed) throw new RegistryNotSealedError();
  validateLimit('tokenBudget', criteria.tokenBudget);
  validateLimit('maxModules', criteria.maxModules);

  const warnings: string[] = [];
  const seeds = collectSeeds(registry, criteria, warnings);
  const closure = dependencyClosure(registry, seeds);
  const ordered = topologicalOrder(registry, closure);

  const coreIds = ordered.filter((m) => m.category === 'core').map((m) => m.id);
  const floor = dependencyClosure(registry, coreIds);
  const floorModules = ordered.filter((m) => floor.has(m.id));
  const floorTokens = sumTokens(floorModules);

  const { tokenBudget, maxModules } = criteria;
  if (tokenBudget !== undefined && floorTokens > tokenBudget) {
    throw new BudgetInfeasibleError(floorTokens, tokenBudget, floorModules.map((m) => m.id));
  }

  let retained = ordered;
  let totalTokens = sumTokens(retained);
  const dropped: Module[] = [];

  const violation = (): string | undefined => {
    if (tokenBudget !== undefined && totalTokens > tokenBudget) {
      return `token budget ${tokenBudget} exceeded`;
    }
    if (maxModules !== undefined && optionalModules(retained, floor).length > maxModules) {
      return `module cap ${maxModules} exceeded`;
    }
    return undefined;
  };

  const drop = (module: Module, reason: string): void => {
    retained = retained.filter((m) => m.id !== module.id);
    totalTokens -= module.tokenEstimate;
    dropped.push(module);
    warnings.push(`Dropped ${describe(module)}: ${reason}`);
  };

  const dropOrphanedDependencies = (module: Module): void => {
    for (const depId of module.dependencies) {
      const dep = retained.find((m) => m.id === depId);
      if (!dep || dep.category === 'core' || seeds.has(dep.id) || floor.has(dep.id)) continue;
      if (isDependencyOfRetained(dep.id, retained)) continue;
      drop(dep, `only required by dropped module ${module.id}`);
      dropOrphanedDependencies(dep);
    }
  };

  const lowestPriorityFirst = byPriorityThenRegistration(registry);

  for (let reason = violation(); reason; reason = violation()) {
    const candidates = optionalModules(retained, floor);
    if (candidates.length === 0) break;

    candidates.sort((a, b) => lowestPriorityFirst(b, a));
    const victim = candidates[0];
    drop(victim, reason);
    dropOrphanedDependencies(victim);
  }

  return {
    orderedModules: retained,
    totalTokens,
    droppedModules: dropped,
    warnings,
  };
}

export function planToFile(plan: ExecutionPlan): PlanFile {
  return {
    orderedModules: plan.orderedModules.map((m) => m.id),
    totalTokens: plan.totalTokens,
    droppedModules: plan.droppedModules.map((m) => m.id),
    warnings: [...plan.warnings],
  };
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

/**
 * Rehydrates a serialized plan against a registry. The stored total is
 * recomputed from the registry's current token estimates.
 */
export function planFromFile(registry: ModuleRegistry, data: unknown): ExecutionPlan {
  if (!data || typeof data !== 'object' || !('orderedModules' in data) || !isStringArray(data.orderedModules)) {
    throw new InvalidPlanError('expected an object with an "orderedModules" list of module ids');
  }
  const droppedIds = 'droppedModules' in data && isStringArray(data.droppedModules) ? data.droppedModules : [];
  const warnings = 'warnings' in data && isStringArray(data.warnings) ? data.warnings : [];

  const unknown = [...data.orderedModules, ...droppedIds].filter((id) => !registry.has(id));
  if (unknown.length > 0) throw new UnknownModuleError([...new Set(unknown)]);

  const orderedModules = data.orderedModules.map((id) => registry.require(id));
  const placed = new Set<string>();
  for (const module of orderedModules) {
    const missing = module.dependencies.find((dep) => !placed.has(dep));
    if (missing !== undefined) {
      throw new InvalidPlanError(`${module.id} appears before its dependency ${missing}`);
    }
    placed.add(module.id);
  }

  return {
    orderedModules,
    totalTokens: sumTokens(orderedModules),
    droppedModules: droppedIds.map((id) => registry.require(id)),
    warnings: [...warnings],
  };
}
