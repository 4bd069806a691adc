/**
 * Tests for graph descriptor validation
 */

import { describe, it, expect } from 'vitest';
import { GraphValidationError, isGraphValidationError, validateGraphDescriptor } from '../validation.js';

describe('validateGraphDescriptor', () => {
  it('accepts a well-formed descriptor and applies defaults', () => {
    const result = validateGraphDescriptor({
      id: 'simple',
      entryPoint: 'start',
      nodes: [{ id: 'start', type: 'noop' }, { id: 'end', terminal: true }],
      edges: [{ from: 'start', to: 'end' }],
    });

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
    expect(result.descriptor?.nodes[0]).toMatchObject({ config: {}, terminal: false, parallel: false });
  });

  it('reports schema problems with their path', () => {
    const result = validateGraphDescriptor({ id: 'bad', entryPoint: 'x', nodes: [] });

    expect(result.valid).toBe(false);
    expect(result.errors[0].code).toBe('SCHEMA_INVALID');
    expect(result.errors[0].details?.path).toBe('nodes');
  });

  it('rejects duplicate node IDs', () => {
    const result = validateGraphDescriptor({
      id: 'dup',
      entryPoint: 'a',
      nodes: [{ id: 'a', type: 'noop' }, { id: 'a', type: 'noop' }],
    });
    expect(result.errors.map((e) => e.code)).toContain('DUPLICATE_NODE_ID');
  });

  it('rejects a missing entry point and dangling edges', () => {
    const result = validateGraphDescriptor({
      id: 'refs',
      entryPoint: 'missing',
      nodes: [{ id: 'a', type: 'noop' }],
      edges: [{ from: 'a', to: 'ghost' }],
    });

    expect(result.errors.map((e) => e.code)).toEqual(['MISSING_ENTRY_POINT', 'INVALID_EDGE_REF']);
    expect(result.errors[1].details).toEqual({ edge: 'a->ghost', missingRef: 'ghost' });
  });

  it('requires a type on non-terminal nodes', () => {
    const result = validateGraphDescriptor({
      id: 'types',
      entryPoint: 'a',
      nodes: [{ id: 'a' }, { id: 'b', terminal: true }],
      edges: [{ from: 'a', to: 'b' }],
    });
    expect(result.errors.map((e) => e.code)).toEqual(['MISSING_NODE_TYPE']);
  });

  it('rejects joins at unknown nodes', () => {
    const result = validateGraphDescriptor({
      id: 'join',
      entryPoint: 'a',
      nodes: [{ id: 'a', type: 'noop', parallel: true, joinAt: 'nowhere' }],
    });
    expect(result.errors.map((e) => e.code)).toEqual(['INVALID_JOIN_REF']);
  });

  it('warns about unreachable nodes, dead ends and unused terminal edges', () => {
    const result = validateGraphDescriptor({
      id: 'warnings',
      entryPoint: 'a',
      nodes: [
        { id: 'a', type: 'noop' },
        { id: 'b', type: 'noop' },
        { id: 'end', terminal: true },
        { id: 'orphan', type: 'noop' },
      ],
      edges: [
        { from: 'a', to: 'b' },
        { from: 'a', to: 'end' },
        { from: 'end', to: 'a' },
        { from: 'orphan', to: 'end' },
      ],
    });

    expect(result.valid).toBe(true);
    expect(result.warnings.map((w) => `${w.code}:${w.nodeId ?? w.edge}`)).toEqual([
      'DEAD_END:b',
      'TERMINAL_HAS_EDGES:end',
      'UNREACHABLE_NODE:orphan',
      'UNREACHABLE_EDGE:orphan->end',
    ]);
  });

  it('warns about parallel nodes without fan-out', () => {
    const result = validateGraphDescriptor({
      id: 'parallel',
      entryPoint: 'a',
      nodes: [{ id: 'a', type: 'noop', parallel: true }, { id: 'end', terminal: true }],
      edges: [{ from: 'a', to: 'end' }],
    });
    expect(result.warnings.map((w) => w.code)).toEqual(['PARALLEL_WITHOUT_FANOUT']);
  });

  it('turns warnings into errors in strict mode', () => {
    const result = validateGraphDescriptor(
      {
        id: 'strict',
        entryPoint: 'a',
        nodes: [{ id: 'a', type: 'noop' }],
      },
      { strict: true }
    );

    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.code)).toEqual(['DEAD_END']);
  });

  it('aggregates several errors into one', () => {
    const single = new GraphValidationError('one', 'DEAD_END');
    expect(GraphValidationError.aggregate('g', [single])).toBe(single);

    const combined = GraphValidationError.aggregate('g', [single, new GraphValidationError('two', 'INVALID_GUARD')]);
    expect(combined.code).toBe('MULTIPLE_ERRORS');
    expect(combined.message).toBe('Graph "g" has 2 errors: [DEAD_END] one; [INVALID_GUARD] two');
    expect(combined.details?.errors).toHaveLength(2);
  });

  it('recognizes graph validation errors', () => {
    expect(isGraphValidationError(new GraphValidationError('one', 'DEAD_END'))).toBe(true);
    expect(isGraphValidationError(new Error('one'))).toBe(false);
    expect(isGraphValidationError('DEAD_END')).toBe(false);
  });
});
