import { ContentNotFoundError } from '../lib/errors.js';
import type { ComposeResult, ComposedModule, ExecutionPlan } from '../types/plan.js';

/** Supplies raw module content by id; `undefined` means the content is missing. */
export type ContentLoader = (moduleId: string) => string | undefined;

export type Tokenizer = (text: string) => number;

export const DEFAULT_SEPARATOR = '\n\n';
export const DEFAULT_TOLERANCE = 0.1;

/** Rough token count: one token per four characters. */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export interface ComposeOptions {
  separator?: string;
  /** Fraction by which measured tokens may exceed the declared total before warning. */
  tolerance?: number;
  tokenizer?: Tokenizer;
}

export function compose(
  plan: ExecutionPlan,
  loader: ContentLoader,
  options: ComposeOptions = {},
): ComposeResult {
  const separator = options.separator ?? DEFAULT_SEPARATOR;
  const tolerance = options.tolerance ?? DEFAULT_TOLERANCE;
  const tokenizer = options.tokenizer ?? estimateTokens;

  const blobs: string[] = [];
  const modules: ComposedModule[] = [];

  for (const module of plan.orderedModules) {
    const content = loader(module.id);
    if (content === undefined) throw new ContentNotFoundError(module.id);
    blobs.push(content);
    modules.push({
      id: module.id,
      tokenEstimate: module.tokenEstimate,
      measuredTokens: tokenizer(content),
    });
  }

  const artifact = blobs.join(separator);
  const measuredTokens = tokenizer(artifact);
  const warnings = [...plan.warnings];

  const limit = plan.totalTokens * (1 + tolerance);
  if (measuredTokens > limit) {
    const overBy = plan.totalTokens === 0
      ? 'n/a'
      : `${Math.round(((measuredTokens - plan.totalTokens) / plan.totalTokens) * 100)}%`;
    warnings.push(
      `Composed artifact measures ${measuredTokens} tokens, above the declared ${plan.totalTokens} by ${overBy} (tolerance ${Math.round(tolerance * 100)}%)`,
    );
  }

  return {
    artifact,
    manifest: {
      modules,
      declaredTokens: plan.totalTokens,
      measuredTokens,
      warnings,
    },
  };
}
