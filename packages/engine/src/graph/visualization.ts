/**
 * Graph Visualization
 *
 * Exports a graph's structure as plain data for external renderers, and as
 * a Mermaid flowchart.
 *
 * @module @stepgraph/engine/graph/visualization
 */

import type { ExecutionCapability } from './schema.js';
import type { GraphModel } from './model.js';

export interface VisualNode {
  id: string;
  type: string;
  capability: ExecutionCapability;
  entry: boolean;
  terminal: boolean;
  parallel: boolean;
  joinAt?: string;
  description?: string;
}

export interface VisualEdge {
  from: string;
  to: string;
  guarded: boolean;
  /** Edge label, else the guard's description */
  label?: string;
}

export interface GraphVisualization {
  id: string;
  name?: string;
  entryPoint: string;
  nodes: VisualNode[];
  edges: VisualEdge[];
}

export function exportVisualization(graph: GraphModel): GraphVisualization {
  return {
    id: graph.id,
    name: graph.name,
    entryPoint: graph.entryPoint,
    nodes: [...graph.nodes.values()].map((node) => ({
      id: node.id,
      type: node.type,
      capability: node.capability,
      entry: node.id === graph.entryPoint,
      terminal: node.terminal,
      parallel: node.parallel,
      joinAt: node.joinAt,
      description: node.description,
    })),
    edges: graph.edges.map((edge) => ({
      from: edge.from,
      to: edge.to,
      guarded: edge.guard !== undefined,
      label: edge.label ?? edge.guard?.description,
    })),
  };
}

function mermaidId(id: string): string {
  return id.replace(/[^A-Za-z0-9_]/g, '_');
}

function mermaidText(text: string): string {
  return text.replace(/"/g, '#quot;');
}

/**
 * Render as a Mermaid flowchart: terminal nodes are circles, parallel
 * nodes are hexagons, guarded edges carry their label.
 */
export function toMermaid(graph: GraphModel): string {
  const { nodes, edges } = exportVisualization(graph);
  const lines = ['flowchart TD'];

  for (const node of nodes) {
    const id = mermaidId(node.id);
    const text = mermaidText(node.id);
    if (node.terminal) {
      lines.push(`  ${id}(("${text}"))`);
    } else if (node.parallel) {
      lines.push(`  ${id}{{"${text}"}}`);
    } else {
      lines.push(`  ${id}["${text}"]`);
    }
  }

  for (const edge of edges) {
    const arrow = edge.label ? `-->|"${mermaidText(edge.label)}"|` : '-->';
    lines.push(`  ${mermaidId(edge.from)} ${arrow} ${mermaidId(edge.to)}`);
  }

  return lines.join('\n');
}
