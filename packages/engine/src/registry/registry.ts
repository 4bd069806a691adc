/**
 * Component Registry
 *
 * Name-keyed factories for node types, guards, hooks and merge strategies.
 * Registries are explicit instances passed to the engine; runs read from an
 * immutable snapshot taken when the run is created.
 *
 * @module @stepgraph/engine/registry
 */

import type { NodeFactory } from '../modes/types.js';
import type { GuardFactory } from '../router/guards.js';
import type { MergeStrategy } from '../state/merge.js';
import type { PluginFactory, TriggerFactory } from '../hooks/types.js';

// =============================================================================
// Errors
// =============================================================================

export class DuplicateTypeError extends Error {
  readonly name = 'DuplicateTypeError';
  readonly isDuplicateType = true;

  constructor(
    public readonly namespace: string,
    public readonly typeName: string
  ) {
    super(`A ${namespace} type named "${typeName}" is already registered`);
  }
}

export class UnknownTypeError extends Error {
  readonly name = 'UnknownTypeError';
  readonly isUnknownType = true;

  constructor(
    public readonly namespace: string,
    public readonly typeName: string,
    public readonly known: string[]
  ) {
    super(
      `Unknown ${namespace} type "${typeName}"` +
        (known.length > 0 ? ` (registered: ${known.join(', ')})` : ` (none registered)`)
    );
  }
}

export class RegistryFrozenError extends Error {
  readonly name = 'RegistryFrozenError';

  constructor(public readonly namespace: string) {
    super(`The ${namespace} registry snapshot is read-only`);
  }
}

export function isUnknownTypeError(error: unknown): error is UnknownTypeError {
  return error instanceof UnknownTypeError;
}

// =============================================================================
// Type Registry
// =============================================================================

export interface ReadonlyTypeRegistry<T> {
  readonly namespace: string;
  readonly size: number;
  resolve(typeName: string): T;
  has(typeName: string): boolean;
  names(): string[];
}

export class TypeRegistry<T> implements ReadonlyTypeRegistry<T> {
  private readonly entries: Map<string, T>;
  private readonly frozen: boolean;

  constructor(
    readonly namespace: string,
    entries?: Iterable<[string, T]>,
    frozen = false
  ) {
    this.entries = new Map(entries);
    this.frozen = frozen;
  }

  /**
   * Register a factory. Existing registrations are never replaced.
   */
  register(typeName: string, factory: T): this {
    if (this.frozen) {
      throw new RegistryFrozenError(this.namespace);
    }
    if (typeName.trim() === '') {
      throw new TypeError(`A ${this.namespace} type name must not be empty`);
    }
    if (this.entries.has(typeName)) {
      throw new DuplicateTypeError(this.namespace, typeName);
    }
    this.entries.set(typeName, factory);
    return this;
  }

  resolve(typeName: string): T {
    const factory = this.entries.get(typeName);
    if (factory === undefined) {
      throw new UnknownTypeError(this.namespace, typeName, this.names());
    }
    return factory;
  }

  has(typeName: string): boolean {
    return this.entries.has(typeName);
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Read-only copy; later registrations on this registry do not show up in it
   */
  snapshot(): ReadonlyTypeRegistry<T> {
    return new TypeRegistry(this.namespace, this.entries, true);
  }
}

// =============================================================================
// Component Registry
// =============================================================================

export interface RegistrySnapshot {
  readonly nodes: ReadonlyTypeRegistry<NodeFactory>;
  readonly guards: ReadonlyTypeRegistry<GuardFactory>;
  readonly triggers: ReadonlyTypeRegistry<TriggerFactory>;
  readonly plugins: ReadonlyTypeRegistry<PluginFactory>;
  readonly mergeStrategies: ReadonlyTypeRegistry<MergeStrategy>;
}

export class ComponentRegistry implements RegistrySnapshot {
  readonly nodes = new TypeRegistry<NodeFactory>('node');
  readonly guards = new TypeRegistry<GuardFactory>('guard');
  readonly triggers = new TypeRegistry<TriggerFactory>('trigger');
  readonly plugins = new TypeRegistry<PluginFactory>('plugin');
  readonly mergeStrategies = new TypeRegistry<MergeStrategy>('merge strategy');

  snapshot(): RegistrySnapshot {
    return Object.freeze({
      nodes: this.nodes.snapshot(),
      guards: this.guards.snapshot(),
      triggers: this.triggers.snapshot(),
      plugins: this.plugins.snapshot(),
      mergeStrategies: this.mergeStrategies.snapshot(),
    });
  }
}
