/**
 * Graph Validation
 *
 * Structural checks on a graph descriptor: schema, unique node IDs, entry
 * point and edge references, join targets and reachability. Checks that
 * need the component registry (node types, guards, hooks) run in buildGraph.
 *
 * @module @stepgraph/engine/graph/validation
 */

import { GraphDescriptorSchema, type ParsedGraphDescriptor } from './schema.js';

// =============================================================================
// Validation Error Types
// =============================================================================

/**
 * Non-fatal findings; fatal when strict validation is requested
 */
export type WarningCode =
  | 'UNREACHABLE_NODE'
  | 'UNREACHABLE_EDGE'
  | 'DEAD_END'
  | 'TERMINAL_HAS_EDGES'
  | 'PARALLEL_WITHOUT_FANOUT';

export type ValidationErrorCode =
  | 'SCHEMA_INVALID'
  | 'DUPLICATE_NODE_ID'
  | 'MISSING_ENTRY_POINT'
  | 'INVALID_EDGE_REF'
  | 'MISSING_NODE_TYPE'
  | 'INVALID_JOIN_REF'
  | 'INVALID_GUARD'
  | 'CAPABILITY_MISMATCH'
  | 'MULTIPLE_ERRORS'
  | WarningCode;

export interface ValidationErrorDetails {
  /** Node where the problem was found */
  nodeId?: string;
  /** Edge as "from->to" */
  edge?: string;
  /** Referenced ID that doesn't exist */
  missingRef?: string;
  /** Schema path, for SCHEMA_INVALID */
  path?: string;
  /** Individual errors, for MULTIPLE_ERRORS */
  errors?: GraphValidationError[];
}

export class GraphValidationError extends Error {
  readonly name = 'GraphValidationError';
  readonly isValidationError = true;

  constructor(
    message: string,
    public readonly code: ValidationErrorCode,
    public readonly details?: ValidationErrorDetails
  ) {
    super(message);
  }

  /**
   * Combine several errors into the one thrown by buildGraph
   */
  static aggregate(graphId: string, errors: GraphValidationError[]): GraphValidationError {
    if (errors.length === 1) {
      return errors[0];
    }
    const summary = errors.map((e) => `[${e.code}] ${e.message}`).join('; ');
    return new GraphValidationError(
      `Graph "${graphId}" has ${errors.length} errors: ${summary}`,
      'MULTIPLE_ERRORS',
      { errors }
    );
  }
}

export function isGraphValidationError(error: unknown): error is GraphValidationError {
  return error instanceof GraphValidationError;
}

export interface ValidationWarning {
  code: WarningCode;
  message: string;
  nodeId?: string;
  edge?: string;
}

export interface GraphValidationResult {
  valid: boolean;
  errors: GraphValidationError[];
  warnings: ValidationWarning[];
  /** Descriptor with schema defaults applied (when the schema passed) */
  descriptor?: ParsedGraphDescriptor;
}

export interface ValidationOptions {
  /** Treat warnings as errors */
  strict?: boolean;
}

// =============================================================================
// Validation
// =============================================================================

export function validateGraphDescriptor(input: unknown, options: ValidationOptions = {}): GraphValidationResult {
  const parsed = GraphDescriptorSchema.safeParse(input);
  if (!parsed.success) {
    return {
      valid: false,
      errors: parsed.error.issues.map(
        (issue) =>
          new GraphValidationError(
            `${issue.path.join('.') || '(root)'}: ${issue.message}`,
            'SCHEMA_INVALID',
            { path: issue.path.join('.') }
          )
      ),
      warnings: [],
    };
  }

  const descriptor = parsed.data;
  const errors: GraphValidationError[] = [];
  const warnings: ValidationWarning[] = [];
  const nodeIds = new Set<string>();

  for (const node of descriptor.nodes) {
    if (nodeIds.has(node.id)) {
      errors.push(new GraphValidationError(`Duplicate node ID: ${node.id}`, 'DUPLICATE_NODE_ID', { nodeId: node.id }));
    }
    nodeIds.add(node.id);

    if (!node.terminal && !node.type) {
      errors.push(
        new GraphValidationError(`Node "${node.id}" has no type`, 'MISSING_NODE_TYPE', { nodeId: node.id })
      );
    }
  }

  if (!nodeIds.has(descriptor.entryPoint)) {
    errors.push(
      new GraphValidationError(`Entry point "${descriptor.entryPoint}" is not a node`, 'MISSING_ENTRY_POINT', {
        missingRef: descriptor.entryPoint,
      })
    );
  }

  for (const edge of descriptor.edges) {
    for (const ref of [edge.from, edge.to]) {
      if (!nodeIds.has(ref)) {
        errors.push(
          new GraphValidationError(`Edge ${edge.from}->${edge.to} references unknown node "${ref}"`, 'INVALID_EDGE_REF', {
            edge: `${edge.from}->${edge.to}`,
            missingRef: ref,
          })
        );
      }
    }
  }

  for (const node of descriptor.nodes) {
    if (node.joinAt !== undefined && !nodeIds.has(node.joinAt)) {
      errors.push(
        new GraphValidationError(`Node "${node.id}" joins at unknown node "${node.joinAt}"`, 'INVALID_JOIN_REF', {
          nodeId: node.id,
          missingRef: node.joinAt,
        })
      );
    }
  }

  if (errors.length === 0) {
    warnings.push(...findStructuralWarnings(descriptor));
  }

  if (options.strict) {
    for (const warning of warnings) {
      errors.push(
        new GraphValidationError(warning.message, warning.code, { nodeId: warning.nodeId, edge: warning.edge })
      );
    }
  }

  return { valid: errors.length === 0, errors, warnings, descriptor };
}

/**
 * Reachability and shape findings for an otherwise valid descriptor
 */
function findStructuralWarnings(descriptor: ParsedGraphDescriptor): ValidationWarning[] {
  const warnings: ValidationWarning[] = [];
  const outgoing = new Map<string, string[]>();
  for (const edge of descriptor.edges) {
    const targets = outgoing.get(edge.from) ?? [];
    targets.push(edge.to);
    outgoing.set(edge.from, targets);
  }

  // BFS from the entry point, ignoring guards
  const reachable = new Set<string>([descriptor.entryPoint]);
  const queue = [descriptor.entryPoint];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const next of outgoing.get(current) ?? []) {
      if (!reachable.has(next)) {
        reachable.add(next);
        queue.push(next);
      }
    }
  }

  for (const node of descriptor.nodes) {
    const targets = outgoing.get(node.id) ?? [];

    if (!reachable.has(node.id)) {
      warnings.push({
        code: 'UNREACHABLE_NODE',
        message: `Node "${node.id}" is not reachable from "${descriptor.entryPoint}"`,
        nodeId: node.id,
      });
    }
    if (node.terminal && targets.length > 0) {
      warnings.push({
        code: 'TERMINAL_HAS_EDGES',
        message: `Terminal node "${node.id}" has outgoing edges that are never followed`,
        nodeId: node.id,
      });
    }
    if (!node.terminal && targets.length === 0) {
      warnings.push({
        code: 'DEAD_END',
        message: `Node "${node.id}" is not terminal and has no outgoing edges`,
        nodeId: node.id,
      });
    }
    if (node.parallel && new Set(targets).size < 2) {
      warnings.push({
        code: 'PARALLEL_WITHOUT_FANOUT',
        message: `Parallel node "${node.id}" has fewer than two successors`,
        nodeId: node.id,
      });
    }
  }

  for (const edge of descriptor.edges) {
    if (!reachable.has(edge.from)) {
      warnings.push({
        code: 'UNREACHABLE_EDGE',
        message: `Edge ${edge.from}->${edge.to} can never be taken`,
        edge: `${edge.from}->${edge.to}`,
      });
    }
  }

  return warnings;
}
