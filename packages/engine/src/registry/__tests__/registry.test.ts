/**
 * Tests for the component registry
 */

import { describe, it, expect } from 'vitest';
import { syncNode } from '../../modes/types.js';
import { createComponentRegistry } from '../builtins.js';
import {
  ComponentRegistry,
  DuplicateTypeError,
  RegistryFrozenError,
  TypeRegistry,
  UnknownTypeError,
  isUnknownTypeError,
} from '../registry.js';

describe('TypeRegistry', () => {
  it('resolves registered entries', () => {
    const registry = new TypeRegistry<number>('number');
    registry.register('one', 1).register('two', 2);

    expect(registry.resolve('two')).toBe(2);
    expect(registry.has('one')).toBe(true);
    expect(registry.names()).toEqual(['one', 'two']);
    expect(registry.size).toBe(2);
  });

  it('never replaces an existing registration', () => {
    const registry = new TypeRegistry<number>('node');
    registry.register('x', 1);

    expect(() => registry.register('x', 2)).toThrow(DuplicateTypeError);
    expect(() => registry.register('x', 2)).toThrow('A node type named "x" is already registered');
    expect(registry.resolve('x')).toBe(1);
  });

  it('rejects empty names', () => {
    expect(() => new TypeRegistry<number>('node').register('  ', 1)).toThrow(TypeError);
  });

  it('lists known names for unknown lookups', () => {
    const registry = new TypeRegistry<number>('guard');
    expect(() => registry.resolve('x')).toThrow('Unknown guard type "x" (none registered)');

    registry.register('field', 1).register('group', 2);
    let error: unknown;
    try {
      registry.resolve('x');
    } catch (e) {
      error = e;
    }
    expect(isUnknownTypeError(error)).toBe(true);
    expect(error).toMatchObject({
      message: 'Unknown guard type "x" (registered: field, group)',
      namespace: 'guard',
      typeName: 'x',
      known: ['field', 'group'],
    });
  });

  it('takes read-only snapshots', () => {
    const registry = new TypeRegistry<number>('node');
    registry.register('a', 1);
    const snapshot = registry.snapshot();
    registry.register('b', 2);

    expect(snapshot.names()).toEqual(['a']);
    expect(() => snapshot.resolve('b')).toThrow(UnknownTypeError);
    expect(snapshot).toBeInstanceOf(TypeRegistry);
    if (snapshot instanceof TypeRegistry) {
      expect(() => snapshot.register('c', 3)).toThrow(RegistryFrozenError);
    }
  });
});

describe('createComponentRegistry', () => {
  it('registers the built-ins', () => {
    const registry = createComponentRegistry();

    expect(registry.guards.names()).toEqual(['field', 'group', 'always']);
    expect(registry.mergeStrategies.names()).toEqual(['last-write-wins', 'fail-on-conflict']);
    expect(registry.triggers.names()).toEqual(['loop-guard', 'logging']);
    expect(registry.plugins.names()).toEqual(['execution-stats']);
    expect(registry.nodes.size).toBe(0);
  });

  it('can start empty', () => {
    const registry = createComponentRegistry({ builtins: false });
    expect(registry.guards.size).toBe(0);
    expect(registry.mergeStrategies.size).toBe(0);
  });

  it('creates independent registries', () => {
    const first = createComponentRegistry();
    const second = createComponentRegistry();
    first.nodes.register('only-here', syncNode(() => ({})));

    expect(first.nodes.has('only-here')).toBe(true);
    expect(second.nodes.has('only-here')).toBe(false);
  });

  it('snapshots every namespace', () => {
    const registry = new ComponentRegistry();
    registry.nodes.register('before', syncNode(() => ({})));
    const snapshot = registry.snapshot();
    registry.nodes.register('after', syncNode(() => ({})));

    expect(snapshot.nodes.names()).toEqual(['before']);
    expect(Object.isFrozen(snapshot)).toBe(true);
  });
});
