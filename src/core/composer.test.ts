import { describe, test, expect } from 'vitest';
import { compose, estimateTokens } from './composer.js';
import { resolve } from './resolver.js';
import { ContentNotFoundError } from '../lib/errors.js';
import { makeRegistry } from '../test-fixtures.js';
import type { ExecutionPlan } from '../types/plan.js';

describe('estimateTokens', () => {
  test('given text, should count one token per four characters, rounding up', () => {
    expect(estimateTokens('')).toBe(0);
    expect(estimateTokens('abcd')).toBe(1);
    expect(estimateTokens('abcde')).toBe(2);
  });
});

describe('compose', () => {
  const registry = makeRegistry([
    { id: 'base', category: 'core', tokenEstimate: 3 },
    { id: 'xss', category: 'specialized', tokenEstimate: 3, dependencies: ['base'] },
  ]);
  const plan: ExecutionPlan = resolve(registry, { explicitIds: ['xss'] });

  const contents = new Map([
    ['base', '# Base\n'],
    ['xss', '# XSS\n'],
  ]);
  const loader = (id: string) => contents.get(id);

  test('given a plan, should concatenate content in plan order with a blank line', () => {
    const { artifact, manifest } = compose(plan, loader);

    expect(artifact).toBe('# Base\n\n\n# XSS\n');
    expect(manifest.modules).toEqual([
      { id: 'base', tokenEstimate: 3, measuredTokens: 2 },
      { id: 'xss', tokenEstimate: 3, measuredTokens: 2 },
    ]);
    expect(manifest.declaredTokens).toBe(6);
    expect(manifest.measuredTokens).toBe(4);
    expect(manifest.warnings).toEqual([]);
  });

  test('given a custom separator, should use it verbatim', () => {
    const { artifact } = compose(plan, loader, { separator: '\n---\n' });

    expect(artifact).toBe('# Base\n\n---\n# XSS\n');
  });

  test('given content far above the declared total, should warn without failing', () => {
    const big = new Map([
      ['base', 'x'.repeat(40)],
      ['xss', 'y'.repeat(40)],
    ]);

    const { manifest } = compose(plan, (id) => big.get(id), { separator: '' });

    expect(manifest.measuredTokens).toBe(20);
    expect(manifest.warnings).toEqual([
      'Composed artifact measures 20 tokens, above the declared 6 by 233% (tolerance 10%)',
    ]);
  });

  test('given content within the tolerance, should not warn', () => {
    const tokenizer = (text: string) => (text.length > 0 ? 32 : 0);
    const loose: ExecutionPlan = { ...plan, totalTokens: 30 };

    const { manifest } = compose(loose, loader, { tokenizer });

    expect(manifest.measuredTokens).toBe(32);
    expect(manifest.warnings).toEqual([]);
  });

  test('given plan warnings, should carry them into the manifest', () => {
    const withWarnings: ExecutionPlan = { ...plan, warnings: ['Dropped C (checklist, 500 tokens): token budget 3000 exceeded'] };

    const { manifest } = compose(withWarnings, loader);

    expect(manifest.warnings).toEqual(['Dropped C (checklist, 500 tokens): token budget 3000 exceeded']);
  });

  test('given missing content, should throw ContentNotFoundError', () => {
    expect(() => compose(plan, (id) => (id === 'base' ? 'text' : undefined))).toThrow(ContentNotFoundError);
  });

  test('given an empty plan, should produce an empty artifact', () => {
    const empty: ExecutionPlan = { orderedModules: [], totalTokens: 0, droppedModules: [], warnings: [] };

    const { artifact, manifest } = compose(empty, loader);

    expect(artifact).toBe('');
    expect(manifest.measuredTokens).toBe(0);
    expect(manifest.warnings).toEqual([]);
  });
});
