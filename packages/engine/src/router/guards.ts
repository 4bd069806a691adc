/**
 * Edge Guards
 *
 * Predicates deciding whether an edge is eligible, given the live state.
 * Built-in guard types evaluate field conditions with the comparison
 * operators below; custom guard types are registered by name.
 *
 * @module @stepgraph/engine/router/guards
 */

import { z } from 'zod';
import type { StateValues } from '../state/diff.js';

// =============================================================================
// Guard Contract
// =============================================================================

/**
 * Pure predicate over the state. Must not mutate it.
 */
export interface GuardPredicate {
  evaluate(values: Readonly<StateValues>): boolean;
  /** Human-readable form, used in diagnostics and visualization */
  readonly description?: string;
}

/**
 * Builds a guard from the `config` of an edge's guard spec
 */
export type GuardFactory = (config: Record<string, unknown>) => GuardPredicate;

export function isGuardPredicate(value: unknown): value is GuardPredicate {
  return (
    typeof value === 'object' &&
    value !== null &&
    'evaluate' in value &&
    typeof value.evaluate === 'function'
  );
}

/**
 * Wrap a function as a guard
 */
export function guard(
  evaluate: (values: Readonly<StateValues>) => boolean,
  description?: string
): GuardPredicate {
  return { evaluate, description };
}

// =============================================================================
// Field Conditions
// =============================================================================

export const ConditionOperator = z.enum([
  'eq',       // equals
  'neq',      // not equals
  'gt',       // greater than
  'gte',      // greater than or equal
  'lt',       // less than
  'lte',      // less than or equal
  'in',       // value in array
  'not_in',   // value not in array
  'contains', // string/array contains
  'matches',  // regex match
  'exists',   // field exists and is truthy
]);

export type ConditionOperator = z.infer<typeof ConditionOperator>;

export const FieldCondition = z.object({
  /** Field to evaluate (dot notation for nested, e.g. "review.score") */
  field: z.string().min(1),
  operator: ConditionOperator,
  value: z.unknown(),
});

export type FieldCondition = z.infer<typeof FieldCondition>;

export interface ConditionGroupType {
  logic: 'and' | 'or';
  conditions: (FieldCondition | ConditionGroupType)[];
}

export const ConditionGroup: z.ZodType<ConditionGroupType> = z.lazy(() =>
  z.object({
    logic: z.enum(['and', 'or']),
    conditions: z.array(z.union([FieldCondition, ConditionGroup])).min(1),
  })
);

/**
 * Read a dot-notation path
 */
export function getField(values: Readonly<StateValues>, path: string): unknown {
  let current: unknown = values;
  for (const segment of path.split('.')) {
    if (current === null || typeof current !== 'object') {
      return undefined;
    }
    current = Reflect.get(current, segment);
  }
  return current;
}

function compareOrdered(left: unknown, right: unknown, test: (diff: number) => boolean): boolean {
  if (typeof left === 'number' && typeof right === 'number') {
    return test(left - right);
  }
  if (typeof left === 'string' && typeof right === 'string') {
    return test(left.localeCompare(right));
  }
  return false;
}

export function evaluateCondition(condition: FieldCondition, values: Readonly<StateValues>): boolean {
  const actual = getField(values, condition.field);
  const expected = condition.value;

  switch (condition.operator) {
    case 'eq':
      return actual === expected;
    case 'neq':
      return actual !== expected;
    case 'gt':
      return compareOrdered(actual, expected, (d) => d > 0);
    case 'gte':
      return compareOrdered(actual, expected, (d) => d >= 0);
    case 'lt':
      return compareOrdered(actual, expected, (d) => d < 0);
    case 'lte':
      return compareOrdered(actual, expected, (d) => d <= 0);
    case 'in':
      return Array.isArray(expected) && expected.includes(actual);
    case 'not_in':
      return Array.isArray(expected) && !expected.includes(actual);
    case 'contains':
      if (typeof actual === 'string') return typeof expected === 'string' && actual.includes(expected);
      return Array.isArray(actual) && actual.includes(expected);
    case 'matches':
      return typeof actual === 'string' && typeof expected === 'string' && new RegExp(expected).test(actual);
    case 'exists':
      return Boolean(actual);
  }
}

function isFieldCondition(condition: FieldCondition | ConditionGroupType): condition is FieldCondition {
  return 'field' in condition;
}

export function evaluateConditionGroup(group: ConditionGroupType, values: Readonly<StateValues>): boolean {
  const check = (condition: FieldCondition | ConditionGroupType): boolean =>
    isFieldCondition(condition)
      ? evaluateCondition(condition, values)
      : evaluateConditionGroup(condition, values);

  return group.logic === 'and' ? group.conditions.every(check) : group.conditions.some(check);
}

function describeCondition(condition: FieldCondition | ConditionGroupType): string {
  if (isFieldCondition(condition)) {
    return condition.operator === 'exists'
      ? `${condition.field} exists`
      : `${condition.field} ${condition.operator} ${JSON.stringify(condition.value)}`;
  }
  return `(${condition.conditions.map(describeCondition).join(` ${condition.logic} `)})`;
}

// =============================================================================
// Built-in Guard Types
// =============================================================================

/**
 * `field`: config is a single FieldCondition
 */
export const fieldGuard: GuardFactory = (config) => {
  const condition = FieldCondition.parse(config);
  if (condition.operator === 'matches' && typeof condition.value === 'string') {
    // Surface invalid patterns at build time
    new RegExp(condition.value);
  }
  return guard((values) => evaluateCondition(condition, values), describeCondition(condition));
};

/**
 * `group`: config is a ConditionGroup of conditions joined by and/or
 */
export const groupGuard: GuardFactory = (config) => {
  const group = ConditionGroup.parse(config);
  return guard((values) => evaluateConditionGroup(group, values), describeCondition(group));
};

/**
 * `always`: unconditionally eligible, for labelling edges explicitly
 */
export const alwaysGuard: GuardFactory = () => guard(() => true, 'always');

export const BUILTIN_GUARDS: Readonly<Record<string, GuardFactory>> = {
  field: fieldGuard,
  group: groupGuard,
  always: alwaysGuard,
};
