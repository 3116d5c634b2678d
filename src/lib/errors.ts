export class RcompError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly exitCode: number = 1,
  ) {
    super(message);
    this.name = 'RcompError';
  }
}

export const EXIT_BUDGET_INFEASIBLE = 2;
export const EXIT_INVALID_REGISTRY = 3;
export const EXIT_UNKNOWN_MODULE = 4;

export class DuplicateIdError extends RcompError {
  constructor(public readonly moduleId: string) {
    super(`Duplicate module id: ${moduleId}`, 'DUPLICATE_ID', EXIT_INVALID_REGISTRY);
    this.name = 'DuplicateIdError';
  }
}

export class InvalidModuleError extends RcompError {
  constructor(public readonly moduleId: string, reason: string) {
    super(`Invalid module ${moduleId || '<empty id>'}: ${reason}`, 'INVALID_MODULE', EXIT_INVALID_REGISTRY);
    this.name = 'InvalidModuleError';
  }
}

export class InvalidDependencyError extends RcompError {
  constructor(
    public readonly moduleId: string,
    public readonly missingIds: string[],
  ) {
    const message = missingIds.includes(moduleId)
      ? `Module ${moduleId} cannot depend on itself`
      : `Module ${moduleId} depends on unknown module(s): ${missingIds.join(', ')}`;
    super(message, 'INVALID_DEPENDENCY', EXIT_INVALID_REGISTRY);
    this.name = 'InvalidDependencyError';
  }
}

export class CyclicDependencyError extends RcompError {
  /** Ordered ids forming the cycle; the first id is repeated at the end. */
  constructor(public readonly cycle: string[]) {
    super(`Cyclic dependency detected: ${cycle.join(' -> ')}`, 'CYCLIC_DEPENDENCY', EXIT_INVALID_REGISTRY);
    this.name = 'CyclicDependencyError';
  }
}

export class RegistrySealedError extends RcompError {
  constructor(moduleId: string) {
    super(`Registry is sealed; cannot register ${moduleId}`, 'REGISTRY_SEALED');
    this.name = 'RegistrySealedError';
  }
}

export class RegistryNotSealedError extends RcompError {
  constructor() {
    super('Registry must be sealed before resolving or scoring', 'REGISTRY_NOT_SEALED');
    this.name = 'RegistryNotSealedError';
  }
}

export class UnknownModuleError extends RcompError {
  constructor(public readonly moduleIds: string[]) {
    super(
      `Unknown module${moduleIds.length === 1 ? '' : 's'}: ${moduleIds.join(', ')}`,
      'UNKNOWN_MODULE',
      EXIT_UNKNOWN_MODULE,
    );
    this.name = 'UnknownModuleError';
  }
}

export class BudgetInfeasibleError extends RcompError {
  constructor(
    public readonly minimumTokens: number,
    public readonly tokenBudget: number,
    public readonly requiredIds: string[],
  ) {
    super(
      `Token budget ${tokenBudget} is below the minimum feasible total of ${minimumTokens} (required: ${requiredIds.join(', ')})`,
      'BUDGET_INFEASIBLE',
      EXIT_BUDGET_INFEASIBLE,
    );
    this.name = 'BudgetInfeasibleError';
  }
}

export class SessionClosedError extends RcompError {
  constructor(public readonly sessionId: string) {
    super(`Review session ${sessionId} is already finalized`, 'SESSION_CLOSED');
    this.name = 'SessionClosedError';
  }
}

export class InvalidFindingError extends RcompError {
  constructor(reason: string) {
    super(`Invalid finding: ${reason}`, 'INVALID_FINDING');
    this.name = 'InvalidFindingError';
  }
}

export class InvalidPlanError extends RcompError {
  constructor(reason: string) {
    super(`Invalid plan: ${reason}`, 'INVALID_PLAN');
    this.name = 'InvalidPlanError';
  }
}

export class ContentNotFoundError extends RcompError {
  constructor(public readonly moduleId: string) {
    super(`No content found for module: ${moduleId}`, 'CONTENT_NOT_FOUND');
    this.name = 'ContentNotFoundError';
  }
}

export class ManifestNotFoundError extends RcompError {
  constructor(filePath: string) {
    super(
      `Module manifest not found: ${filePath}. Run 'rcomp init' or set "manifest" in .rcomp/config.yaml.`,
      'MANIFEST_NOT_FOUND',
    );
    this.name = 'ManifestNotFoundError';
  }
}

export class SessionNotFoundError extends RcompError {
  constructor(filePath: string) {
    super(`Review session file not found: ${filePath}`, 'SESSION_NOT_FOUND');
    this.name = 'SessionNotFoundError';
  }
}

export class SessionLockError extends RcompError {
  constructor(filePath: string) {
    super(
      `Could not acquire lock on ${filePath}. Another rcomp process may be writing this session.`,
      'SESSION_LOCK',
    );
    this.name = 'SessionLockError';
  }
}
