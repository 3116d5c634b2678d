import {
  CyclicDependencyError,
  DuplicateIdError,
  InvalidDependencyError,
  InvalidModuleError,
  RegistrySealedError,
  UnknownModuleError,
} from '../lib/errors.js';
import { MODULE_CATEGORIES, type Module, type ModuleDefinition } from '../types/module.js';

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function dedupe(values: readonly string[] | undefined): string[] {
  return [...new Set(values ?? [])];
}

function validateDefinition(def: ModuleDefinition): void {
  if (typeof def.id !== 'string' || def.id.trim() === '') {
    throw new InvalidModuleError('', 'id must be a non-empty string');
  }
  if (!MODULE_CATEGORIES.includes(def.category)) {
    throw new InvalidModuleError(
      def.id,
      `unknown category "${String(def.category)}". Must be one of: ${MODULE_CATEGORIES.join(', ')}`,
    );
  }
  if (!isPositiveInteger(def.tokenEstimate)) {
    throw new InvalidModuleError(def.id, `tokenEstimate must be a positive integer, got ${String(def.tokenEstimate)}`);
  }
  if (def.checklistItems !== undefined && !isPositiveInteger(def.checklistItems)) {
    throw new InvalidModuleError(def.id, `checklistItems must be a positive integer, got ${String(def.checklistItems)}`);
  }
  for (const list of [def.dependencies, def.tags]) {
    if (list !== undefined && (!Array.isArray(list) || list.some((v) => typeof v !== 'string' || v === ''))) {
      throw new InvalidModuleError(def.id, 'dependencies and tags must be lists of non-empty strings');
    }
  }
}

/**
 * Holds module metadata in registration order.
 *
 * Modules may reference dependencies that are registered later; all references
 * are checked by {@link ModuleRegistry.seal}, which also rejects cycles. A sealed
 * registry is immutable and can be shared between concurrent resolutions.
 */
export class ModuleRegistry {
  private readonly modules = new Map<string, Module>();
  private readonly order: string[] = [];
  private readonly goals = new Map<string, string[]>();
  private sealed = false;

  register(def: ModuleDefinition): Module {
    if (this.sealed) throw new RegistrySealedError(def.id);
    validateDefinition(def);
    if (this.modules.has(def.id)) throw new DuplicateIdError(def.id);

    const dependencies = dedupe(def.dependencies);
    if (dependencies.includes(def.id)) {
      throw new InvalidDependencyError(def.id, [def.id]);
    }

    const module: Module = Object.freeze({
      id: def.id,
      title: def.title ?? def.id,
      category: def.category,
      tokenEstimate: def.tokenEstimate,
      dependencies: Object.freeze(dependencies),
      tags: Object.freeze(dedupe(def.tags)),
      ...(def.checklistItems !== undefined ? { checklistItems: def.checklistItems } : {}),
    });

    this.modules.set(module.id, module);
    this.order.push(module.id);
    return module;
  }

  /** Maps a review goal to a fixed list of module ids. Ids are checked at seal. */
  defineGoal(goal: string, moduleIds: string[]): void {
    if (this.sealed) throw new RegistrySealedError(`goal:${goal}`);
    const existing = this.goals.get(goal) ?? [];
    this.goals.set(goal, dedupe([...existing, ...moduleIds]));
  }

  seal(): void {
    if (this.sealed) return;

    for (const id of this.order) {
      const missing = this.moduleAt(id).dependencies.filter((dep) => !this.modules.has(dep));
      if (missing.length > 0) throw new InvalidDependencyError(id, missing);
    }
    for (const [goal, ids] of this.goals) {
      const missing = ids.filter((dep) => !this.modules.has(dep));
      if (missing.length > 0) throw new InvalidDependencyError(`goal:${goal}`, missing);
    }

    const cycle = this.findCycle();
    if (cycle) throw new CyclicDependencyError(cycle);

    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  get size(): number {
    return this.order.length;
  }

  has(id: string): boolean {
    return this.modules.has(id);
  }

  get(id: string): Module | undefined {
    return this.modules.get(id);
  }

  require(id: string): Module {
    const module = this.modules.get(id);
    if (!module) throw new UnknownModuleError([id]);
    return module;
  }

  /** Position of the module in registration order, or -1. */
  registrationIndex(id: string): number {
    return this.order.indexOf(id);
  }

  list(): Module[] {
    return this.order.map((id) => this.moduleAt(id));
  }

  goalNames(): string[] {
    return [...this.goals.keys()];
  }

  lookupByTag(tag: string): Iterable<Module> {
    return {
      [Symbol.iterator]: () => this.iterateWhere((m) => m.tags.includes(tag)),
    };
  }

  /** Goal-mapped modules first, then modules tagged with the goal, without repeats. */
  lookupByGoal(goal: string): Module[] {
    const seen = new Set<string>();
    const result: Module[] = [];
    for (const id of this.goals.get(goal) ?? []) {
      const module = this.modules.get(id);
      if (module && !seen.has(id)) {
        seen.add(id);
        result.push(module);
      }
    }
    for (const module of this.lookupByTag(goal)) {
      if (!seen.has(module.id)) {
        seen.add(module.id);
        result.push(module);
      }
    }
    return result;
  }

  private *iterateWhere(predicate: (module: Module) => boolean): Generator<Module> {
    for (const id of this.order) {
      const module = this.moduleAt(id);
      if (predicate(module)) yield module;
    }
  }

  private moduleAt(id: string): Module {
    const module = this.modules.get(id);
    if (!module) throw new UnknownModuleError([id]);
    return module;
  }

  private findCycle(): string[] | null {
    const visited = new Set<string>();
    const onStack = new Set<string>();
    const path: string[] = [];

    const visit = (id: string): string[] | null => {
      if (onStack.has(id)) {
        return [...path.slice(path.indexOf(id)), id];
      }
      if (visited.has(id)) return null;

      visited.add(id);
      onStack.add(id);
      path.push(id);

      for (const dep of this.moduleAt(id).dependencies) {
        const cycle = visit(dep);
        if (cycle) return cycle;
      }

      path.pop();
      onStack.delete(id);
      return null;
    };

    for (const id of this.order) {
      const cycle = visit(id);
      if (cycle) return cycle;
    }
    return null;
  }
}
