/**
 * Graph Descriptor Schema
 *
 * Zod schemas for the plain-data description of a workflow graph, as
 * produced by a configuration source or written in code.
 *
 * @module @stepgraph/engine/graph/schema
 */

import { z } from 'zod';
import { isGuardPredicate, type GuardPredicate } from '../router/guards.js';

// =============================================================================
// Node Configuration
// =============================================================================

/**
 * Which execution modes a node supports
 */
export const ExecutionCapability = z.enum(['sync', 'async', 'both']);

export type ExecutionCapability = z.infer<typeof ExecutionCapability>;

/**
 * Retry configuration for a node
 */
export const RetryPolicySchema = z.object({
  /** Total attempts including the first one */
  maxAttempts: z.number().int().min(1).max(10).default(1),

  /** Delay before the second attempt in milliseconds */
  initialDelayMs: z.number().int().min(0).max(60000).default(100),

  /** Backoff multiplier for exponential backoff */
  backoffMultiplier: z.number().min(1).max(5).default(2),

  /** Maximum delay between retries in milliseconds */
  maxDelayMs: z.number().int().min(0).max(300000).default(5000),
});

const NodeId = z
  .string()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z_][A-Za-z0-9_.:-]*$/, 'Node IDs start with a letter or underscore');

export const NodeDescriptorSchema = z.object({
  id: NodeId,

  /** Registered node type; optional for terminal nodes */
  type: z.string().min(1).optional(),

  /** Overrides the capability declared by the node type */
  capability: ExecutionCapability.optional(),

  /** Type-specific configuration, handed to the node factory */
  config: z.record(z.unknown()).default({}),

  /** End marker: reaching it ends the path without executing anything */
  terminal: z.boolean().default(false),

  /** Run eligible successors as isolated parallel branches */
  parallel: z.boolean().default(false),

  /** Node where parallel branches stop and their results are merged */
  joinAt: z.string().min(1).optional(),

  /** Registered merge strategy for the join (default: engine setting) */
  mergeStrategy: z.string().min(1).optional(),

  retry: RetryPolicySchema.partial().optional(),

  description: z.string().max(1024).optional(),
});

// =============================================================================
// Edges
// =============================================================================

/**
 * Reference to a registered guard type
 */
export const GuardSpecSchema = z.object({
  type: z.string().min(1),
  config: z.record(z.unknown()).default({}),
});

export const EdgeDescriptorSchema = z.object({
  from: z.string().min(1),
  to: z.string().min(1),
  guard: z
    .union([GuardSpecSchema, z.custom<GuardPredicate>(isGuardPredicate, 'Expected a guard spec or predicate')])
    .optional(),
  label: z.string().max(256).optional(),
});

// =============================================================================
// Hooks
// =============================================================================

export const HookSpecSchema = z.object({
  type: z.string().min(1),
  config: z.record(z.unknown()).default({}),
  /** Failures of a critical hook fail the run */
  critical: z.boolean().default(false),
});

// =============================================================================
// Graph
// =============================================================================

export const GraphDescriptorSchema = z.object({
  id: z.string().min(1).max(128),
  name: z.string().max(256).optional(),
  version: z.string().regex(/^\d+\.\d+\.\d+$/, 'Version must be semver (x.y.z)').optional(),
  entryPoint: z.string().min(1),
  nodes: z.array(NodeDescriptorSchema).min(1),
  edges: z.array(EdgeDescriptorSchema).default([]),
  triggers: z.array(HookSpecSchema).default([]),
  plugins: z.array(HookSpecSchema).default([]),
  /** Free-form graph-level settings, exposed on the model */
  config: z.record(z.unknown()).default({}),
});

/** Descriptor as written by callers (defaults optional) */
export type GraphDescriptor = z.input<typeof GraphDescriptorSchema>;
/** Descriptor after schema defaults are applied */
export type ParsedGraphDescriptor = z.output<typeof GraphDescriptorSchema>;
export type NodeDescriptor = z.input<typeof NodeDescriptorSchema>;
export type EdgeDescriptor = z.input<typeof EdgeDescriptorSchema>;
export type HookSpec = z.output<typeof HookSpecSchema>;
export type GuardSpec = z.output<typeof GuardSpecSchema>;
export type RetryPolicy = z.output<typeof RetryPolicySchema>;
