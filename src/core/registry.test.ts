import { describe, test, expect } from 'vitest';
import { ModuleRegistry } from './registry.js';
import {
  CyclicDependencyError,
  DuplicateIdError,
  InvalidDependencyError,
  InvalidModuleError,
  RegistrySealedError,
  UnknownModuleError,
} from '../lib/errors.js';
import { makeModuleDef, makeRegistry } from '../test-fixtures.js';

describe('ModuleRegistry.register', () => {
  test('given a definition, should store a frozen module with defaults', () => {
    const registry = new ModuleRegistry();

    const actual = registry.register(makeModuleDef({ id: 'xss', tags: ['web', 'web'] }));

    expect(actual).toEqual({
      id: 'xss',
      title: 'xss',
      category: 'specialized',
      tokenEstimate: 1000,
      dependencies: [],
      tags: ['web'],
    });
    expect(Object.isFrozen(actual)).toBe(true);
    expect(registry.get('xss')).toBe(actual);
  });

  test('given a duplicate id, should throw DuplicateIdError', () => {
    const registry = new ModuleRegistry();
    registry.register(makeModuleDef({ id: 'xss' }));

    expect(() => registry.register(makeModuleDef({ id: 'xss' }))).toThrow(DuplicateIdError);
  });

  test('given a self-dependency, should throw InvalidDependencyError', () => {
    const registry = new ModuleRegistry();

    expect(() => registry.register(makeModuleDef({ id: 'xss', dependencies: ['xss'] }))).toThrow(
      'Module xss cannot depend on itself',
    );
  });

  test('given a non-positive token estimate, should throw InvalidModuleError', () => {
    const registry = new ModuleRegistry();

    expect(() => registry.register(makeModuleDef({ tokenEstimate: 0 }))).toThrow(InvalidModuleError);
    expect(() => registry.register(makeModuleDef({ tokenEstimate: 12.5 }))).toThrow(InvalidModuleError);
  });

  test('given a forward reference, should accept it until seal', () => {
    const registry = new ModuleRegistry();
    registry.register(makeModuleDef({ id: 'b', dependencies: ['a'] }));
    registry.register(makeModuleDef({ id: 'a', category: 'core' }));

    expect(() => registry.seal()).not.toThrow();
    expect(registry.isSealed).toBe(true);
  });

  test('given a sealed registry, should throw RegistrySealedError', () => {
    const registry = makeRegistry([makeModuleDef({ id: 'a' })]);

    expect(() => registry.register(makeModuleDef({ id: 'b' }))).toThrow(RegistrySealedError);
  });
});

describe('ModuleRegistry.seal', () => {
  test('given A and B depending on each other, should report the cycle [A, B, A]', () => {
    const registry = new ModuleRegistry();
    registry.register(makeModuleDef({ id: 'A', dependencies: ['B'] }));
    registry.register(makeModuleDef({ id: 'B', dependencies: ['A'] }));

    let caught: unknown;
    try {
      registry.seal();
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(CyclicDependencyError);
    expect(caught instanceof CyclicDependencyError && caught.cycle).toEqual(['A', 'B', 'A']);
    expect(registry.isSealed).toBe(false);
  });

  test('given a longer cycle behind an acyclic prefix, should report only the cycle', () => {
    const registry = new ModuleRegistry();
    registry.register(makeModuleDef({ id: 'root', dependencies: ['x'] }));
    registry.register(makeModuleDef({ id: 'x', dependencies: ['y'] }));
    registry.register(makeModuleDef({ id: 'y', dependencies: ['z'] }));
    registry.register(makeModuleDef({ id: 'z', dependencies: ['x'] }));

    expect(() => registry.seal()).toThrow('Cyclic dependency detected: x -> y -> z -> x');
  });

  test('given an unknown dependency, should throw InvalidDependencyError naming it', () => {
    const registry = new ModuleRegistry();
    registry.register(makeModuleDef({ id: 'a', dependencies: ['missing', 'gone'] }));

    let caught: unknown;
    try {
      registry.seal();
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(InvalidDependencyError);
    expect(caught instanceof InvalidDependencyError && caught.missingIds).toEqual(['missing', 'gone']);
    expect(registry.isSealed).toBe(false);
  });

  test('given a goal naming an unknown module, should throw InvalidDependencyError', () => {
    const registry = new ModuleRegistry();
    registry.register(makeModuleDef({ id: 'a' }));
    registry.defineGoal('security-audit', ['a', 'nope']);

    expect(() => registry.seal()).toThrow('Module goal:security-audit depends on unknown module(s): nope');
  });

  test('given a diamond, should seal', () => {
    const registry = makeRegistry([
      makeModuleDef({ id: 'base', category: 'core' }),
      makeModuleDef({ id: 'left', dependencies: ['base'] }),
      makeModuleDef({ id: 'right', dependencies: ['base'] }),
      makeModuleDef({ id: 'top', dependencies: ['left', 'right'] }),
    ]);

    expect(registry.size).toBe(4);
  });
});

describe('ModuleRegistry lookups', () => {
  const registry = makeRegistry(
    [
      makeModuleDef({ id: 'core', category: 'core', tags: ['security', 'performance'] }),
      makeModuleDef({ id: 'xss', tags: ['security'] }),
      makeModuleDef({ id: 'caching', tags: ['performance'] }),
      makeModuleDef({ id: 'csrf', tags: ['security'] }),
    ],
    { 'security-audit': ['csrf', 'xss'] },
  );

  test('lookupByTag returns matches in registration order', () => {
    const actual = [...registry.lookupByTag('security')].map((m) => m.id);

    expect(actual).toEqual(['core', 'xss', 'csrf']);
  });

  test('lookupByTag can be iterated more than once', () => {
    const matches = registry.lookupByTag('performance');

    expect([...matches].map((m) => m.id)).toEqual(['core', 'caching']);
    expect([...matches].map((m) => m.id)).toEqual(['core', 'caching']);
  });

  test('lookupByTag with no match is empty', () => {
    expect([...registry.lookupByTag('mobile')]).toEqual([]);
  });

  test('lookupByGoal lists mapped modules first, then tagged modules', () => {
    const actual = registry.lookupByGoal('security-audit').map((m) => m.id);

    expect(actual).toEqual(['csrf', 'xss']);
  });

  test('lookupByGoal falls back to tags for unmapped goals', () => {
    expect(registry.lookupByGoal('performance').map((m) => m.id)).toEqual(['core', 'caching']);
  });

  test('require throws UnknownModuleError for unknown ids', () => {
    expect(() => registry.require('nope')).toThrow(UnknownModuleError);
  });

  test('registrationIndex follows insertion order', () => {
    expect(registry.registrationIndex('caching')).toBe(2);
    expect(registry.registrationIndex('nope')).toBe(-1);
  });
});
