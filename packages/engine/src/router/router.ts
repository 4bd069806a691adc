/**
 * Router
 *
 * Resolves the successors of a node by evaluating its outgoing edges, in
 * declaration order, against the live state. Every eligible edge is taken,
 * so the result is an ordered set of node IDs.
 *
 * @module @stepgraph/engine/router
 */

import type { GraphEdge, GraphModel } from '../graph/model.js';
import type { StateValues } from '../state/diff.js';

export interface EdgeEvaluation {
  to: string;
  eligible: boolean;
  /** Guard description, when the edge is guarded */
  guard?: string;
}

export class NoEligibleEdgeError extends Error {
  readonly name = 'NoEligibleEdgeError';
  readonly isNoEligibleEdge = true;

  constructor(
    public readonly nodeId: string,
    /** State the guards were evaluated against */
    public readonly state: Readonly<StateValues>,
    public readonly evaluations: EdgeEvaluation[]
  ) {
    super(
      evaluations.length === 0
        ? `Node "${nodeId}" is not terminal and has no outgoing edges`
        : `No eligible edge from node "${nodeId}" (evaluated ${evaluations.length} edge(s))`
    );
  }
}

export class GuardEvaluationError extends Error {
  readonly name = 'GuardEvaluationError';
  readonly isGuardEvaluation = true;

  constructor(
    public readonly from: string,
    public readonly to: string,
    cause: unknown
  ) {
    super(
      `Guard on edge ${from}->${to} threw: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
  }
}

export class Router {
  constructor(private readonly graph: GraphModel) {}

  /**
   * Successor IDs for `nodeId`, in edge-declaration order without duplicates.
   *
   * @throws NoEligibleEdgeError when a non-terminal node has no eligible edge
   * @throws GuardEvaluationError when a guard throws
   */
  resolveNext(nodeId: string, values: Readonly<StateValues>): string[] {
    const node = this.graph.requireNode(nodeId);
    const evaluations = this.evaluateEdges(nodeId, values);

    const next: string[] = [];
    for (const evaluation of evaluations) {
      if (evaluation.eligible && !next.includes(evaluation.to)) {
        next.push(evaluation.to);
      }
    }

    if (next.length === 0 && !node.terminal) {
      throw new NoEligibleEdgeError(nodeId, values, evaluations);
    }
    return next;
  }

  /**
   * Evaluate every outgoing edge of `nodeId`
   */
  evaluateEdges(nodeId: string, values: Readonly<StateValues>): EdgeEvaluation[] {
    return this.graph.outgoing(nodeId).map((edge) => ({
      to: edge.to,
      eligible: this.isEligible(edge, values),
      guard: edge.guard ? edge.guard.description ?? edge.guardType ?? 'custom' : undefined,
    }));
  }

  private isEligible(edge: GraphEdge, values: Readonly<StateValues>): boolean {
    if (!edge.guard) {
      return true;
    }
    try {
      return edge.guard.evaluate(values) === true;
    } catch (error) {
      throw new GuardEvaluationError(edge.from, edge.to, error);
    }
  }
}
