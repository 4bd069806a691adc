/**
 * Graph Model
 *
 * The built, immutable form of a workflow graph plus its structural
 * queries. Built once from a descriptor and shared read-only by every run.
 *
 * @module @stepgraph/engine/graph/model
 */

import { getLogger, type Logger } from '@stepgraph/core';
import type { RegistrySnapshot } from '../registry/registry.js';
import type { GuardPredicate } from '../router/guards.js';
import { providesCapability } from '../modes/types.js';
import type { ExecutionCapability, GraphDescriptor, HookSpec, RetryPolicy } from './schema.js';
import {
  GraphValidationError,
  validateGraphDescriptor,
  type ValidationWarning,
} from './validation.js';

// =============================================================================
// Graph Types
// =============================================================================

export interface GraphNode {
  readonly id: string;
  readonly type: string;
  readonly capability: ExecutionCapability;
  readonly config: Readonly<Record<string, unknown>>;
  readonly terminal: boolean;
  readonly parallel: boolean;
  readonly joinAt?: string;
  readonly mergeStrategy?: string;
  readonly retry?: Readonly<Partial<RetryPolicy>>;
  readonly description?: string;
}

export interface GraphEdge {
  readonly from: string;
  readonly to: string;
  readonly guard?: GuardPredicate;
  /** Registered guard type, when the guard came from a spec */
  readonly guardType?: string;
  readonly label?: string;
  /** Declaration order */
  readonly index: number;
}

export type HookBinding = Readonly<HookSpec>;

export interface GraphModelInit {
  id: string;
  name?: string;
  version?: string;
  entryPoint: string;
  nodes: GraphNode[];
  edges: GraphEdge[];
  triggers?: HookBinding[];
  plugins?: HookBinding[];
  config?: Record<string, unknown>;
  warnings?: ValidationWarning[];
}

export class UnknownNodeError extends Error {
  readonly name = 'UnknownNodeError';
  readonly isUnknownNode = true;

  constructor(
    public readonly nodeId: string,
    public readonly referencedBy?: string
  ) {
    super(
      referencedBy
        ? `Node "${referencedBy}" routed to unknown node "${nodeId}"`
        : `Unknown node "${nodeId}"`
    );
  }
}

// =============================================================================
// Graph Model
// =============================================================================

export class GraphModel {
  readonly id: string;
  readonly name?: string;
  readonly version?: string;
  readonly entryPoint: string;
  readonly triggers: readonly HookBinding[];
  readonly plugins: readonly HookBinding[];
  readonly config: Readonly<Record<string, unknown>>;
  readonly warnings: readonly ValidationWarning[];

  private readonly nodeMap: ReadonlyMap<string, GraphNode>;
  private readonly edgeList: readonly GraphEdge[];
  private readonly outgoingIndex: ReadonlyMap<string, readonly GraphEdge[]>;
  private readonly incomingIndex: ReadonlyMap<string, readonly GraphEdge[]>;

  constructor(init: GraphModelInit) {
    this.id = init.id;
    this.name = init.name;
    this.version = init.version;
    this.entryPoint = init.entryPoint;
    this.triggers = Object.freeze([...(init.triggers ?? [])]);
    this.plugins = Object.freeze([...(init.plugins ?? [])]);
    this.config = Object.freeze({ ...(init.config ?? {}) });
    this.warnings = Object.freeze([...(init.warnings ?? [])]);

    this.nodeMap = new Map(init.nodes.map((node) => [node.id, Object.freeze(node)]));
    this.edgeList = Object.freeze(init.edges.map((edge) => Object.freeze(edge)));

    const outgoing = new Map<string, GraphEdge[]>();
    const incoming = new Map<string, GraphEdge[]>();
    for (const edge of this.edgeList) {
      outgoing.set(edge.from, [...(outgoing.get(edge.from) ?? []), edge]);
      incoming.set(edge.to, [...(incoming.get(edge.to) ?? []), edge]);
    }
    this.outgoingIndex = outgoing;
    this.incomingIndex = incoming;
  }

  get nodes(): ReadonlyMap<string, GraphNode> {
    return this.nodeMap;
  }

  get edges(): readonly GraphEdge[] {
    return this.edgeList;
  }

  get size(): number {
    return this.nodeMap.size;
  }

  hasNode(id: string): boolean {
    return this.nodeMap.has(id);
  }

  getNode(id: string): GraphNode | undefined {
    return this.nodeMap.get(id);
  }

  requireNode(id: string, referencedBy?: string): GraphNode {
    const node = this.nodeMap.get(id);
    if (!node) {
      throw new UnknownNodeError(id, referencedBy);
    }
    return node;
  }

  /**
   * Outgoing edges in declaration order
   */
  outgoing(id: string): readonly GraphEdge[] {
    return this.outgoingIndex.get(id) ?? [];
  }

  incoming(id: string): readonly GraphEdge[] {
    return this.incomingIndex.get(id) ?? [];
  }

  /**
   * Distinct successor IDs in edge order, ignoring guards
   */
  successors(id: string): string[] {
    return [...new Set(this.outgoing(id).map((edge) => edge.to))];
  }

  /**
   * Every node reachable from `id` (inclusive), ignoring guards
   */
  reachableFrom(id: string): Set<string> {
    const visited = new Set<string>([id]);
    const queue = [id];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      for (const next of this.successors(current)) {
        if (!visited.has(next)) {
          visited.add(next);
          queue.push(next);
        }
      }
    }
    return visited;
  }

  /**
   * Whether any cycle exists (loops are legal; this is informational)
   */
  isCyclic(): boolean {
    const visiting = new Set<string>();
    const done = new Set<string>();

    const visit = (id: string): boolean => {
      if (visiting.has(id)) return true;
      if (done.has(id)) return false;
      visiting.add(id);
      const cyclic = this.successors(id).some(visit);
      visiting.delete(id);
      done.add(id);
      return cyclic;
    };

    return [...this.nodeMap.keys()].some(visit);
  }

  terminalNodes(): string[] {
    return [...this.nodeMap.values()].filter((node) => node.terminal).map((node) => node.id);
  }
}

// =============================================================================
// Build
// =============================================================================

export interface BuildGraphOptions {
  registry: RegistrySnapshot;
  /** Treat validation warnings as errors */
  strict?: boolean;
  logger?: Logger;
}

/**
 * Validate a descriptor and resolve it against the registry.
 *
 * @throws GraphValidationError on structural problems
 * @throws UnknownTypeError when a node, guard, hook or merge strategy type is not registered
 */
export function buildGraph(descriptor: GraphDescriptor, options: BuildGraphOptions): GraphModel {
  const { registry } = options;
  const logger = options.logger ?? getLogger('graph');

  const validation = validateGraphDescriptor(descriptor, { strict: options.strict });
  const parsed = validation.descriptor;
  if (!validation.valid || !parsed) {
    throw GraphValidationError.aggregate(descriptor.id, validation.errors);
  }

  const errors: GraphValidationError[] = [];

  const nodes = parsed.nodes.map((node): GraphNode => {
    const type = node.type ?? 'terminal';
    let capability: ExecutionCapability = node.capability ?? 'both';

    if (!node.terminal) {
      const factory = registry.nodes.resolve(type);
      capability = node.capability ?? factory.capability;
      if (!providesCapability(factory.capability, capability)) {
        errors.push(
          new GraphValidationError(
            `Node "${node.id}" declares ${capability} but type "${type}" provides ${factory.capability}`,
            'CAPABILITY_MISMATCH',
            { nodeId: node.id }
          )
        );
      }
    }

    if (node.mergeStrategy !== undefined) {
      registry.mergeStrategies.resolve(node.mergeStrategy);
    }

    return {
      id: node.id,
      type,
      capability,
      config: Object.freeze(structuredClone(node.config)),
      terminal: node.terminal,
      parallel: node.parallel,
      joinAt: node.joinAt,
      mergeStrategy: node.mergeStrategy,
      retry: node.retry,
      description: node.description,
    };
  });

  const edges = parsed.edges.map((edge, index): GraphEdge => {
    const base = { from: edge.from, to: edge.to, label: edge.label, index };
    if (edge.guard === undefined) {
      return base;
    }
    if (!('type' in edge.guard)) {
      return { ...base, guard: edge.guard };
    }

    const factory = registry.guards.resolve(edge.guard.type);
    try {
      return { ...base, guard: factory(edge.guard.config), guardType: edge.guard.type };
    } catch (error) {
      errors.push(
        new GraphValidationError(
          `Edge ${edge.from}->${edge.to}: invalid ${edge.guard.type} guard: ${error instanceof Error ? error.message : String(error)}`,
          'INVALID_GUARD',
          { edge: `${edge.from}->${edge.to}` }
        )
      );
      return base;
    }
  });

  for (const hook of parsed.triggers) {
    registry.triggers.resolve(hook.type);
  }
  for (const hook of parsed.plugins) {
    registry.plugins.resolve(hook.type);
  }

  if (errors.length > 0) {
    throw GraphValidationError.aggregate(parsed.id, errors);
  }

  for (const warning of validation.warnings) {
    logger.warn('Graph validation warning', {
      graphId: parsed.id,
      code: warning.code,
      detail: warning.message,
    });
  }

  return new GraphModel({
    id: parsed.id,
    name: parsed.name,
    version: parsed.version,
    entryPoint: parsed.entryPoint,
    nodes,
    edges,
    triggers: parsed.triggers,
    plugins: parsed.plugins,
    config: parsed.config,
    warnings: validation.warnings,
  });
}
