export { ModuleRegistry } from './core/registry.js';
export { resolve, planToFile, planFromFile } from './core/resolver.js';
export {
  compose,
  estimateTokens,
  DEFAULT_SEPARATOR,
  DEFAULT_TOLERANCE,
  type ComposeOptions,
  type ContentLoader,
  type Tokenizer,
} from './core/composer.js';
export { createSession, recordFinding, finalize, parseLocation, isSeverity } from './core/session.js';
export { computeScore, formatReport, riskLevelFor } from './core/scorer.js';
export { buildRegistry, loadRegistry, parseManifest, readManifestFile } from './core/manifest.js';
export { readModuleContents, mapLoader } from './core/content.js';
export { readSession, writeSession, updateSession } from './core/session-store.js';
export { loadConfig, DEFAULT_CONFIG } from './core/config.js';
export * from './lib/errors.js';
export * from './types/module.js';
export * from './types/plan.js';
export * from './types/session.js';
export * from './types/config.js';
