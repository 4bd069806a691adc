/**
 * Tests for edge guards
 */

import { describe, it, expect } from 'vitest';
import {
  alwaysGuard,
  evaluateCondition,
  evaluateConditionGroup,
  fieldGuard,
  getField,
  groupGuard,
  guard,
  isGuardPredicate,
} from '../guards.js';

describe('getField', () => {
  it('reads dot-notation paths', () => {
    const values = { review: { score: 7, tags: ['a'] } };
    expect(getField(values, 'review.score')).toBe(7);
    expect(getField(values, 'review.tags')).toEqual(['a']);
    expect(getField(values, 'review.missing.deeper')).toBeUndefined();
    expect(getField(values, 'absent')).toBeUndefined();
  });
});

describe('evaluateCondition', () => {
  const values = { count: 3, name: 'beta', tags: ['x', 'y'], flag: false };

  it.each([
    ['eq', 'count', 3, true],
    ['neq', 'count', 3, false],
    ['gt', 'count', 2, true],
    ['gte', 'count', 3, true],
    ['lt', 'count', 3, false],
    ['lte', 'count', 3, true],
    ['gt', 'name', 'alpha', true],
    ['in', 'name', ['alpha', 'beta'], true],
    ['not_in', 'name', ['alpha', 'beta'], false],
    ['contains', 'tags', 'y', true],
    ['contains', 'name', 'et', true],
    ['matches', 'name', '^b', true],
    ['exists', 'flag', undefined, false],
    ['exists', 'count', undefined, true],
  ] as const)('%s on %s with %j is %s', (operator, field, value, expected) => {
    expect(evaluateCondition({ field, operator, value }, values)).toBe(expected);
  });

  it('never orders values of different types', () => {
    expect(evaluateCondition({ field: 'count', operator: 'gt', value: '1' }, values)).toBe(false);
    expect(evaluateCondition({ field: 'missing', operator: 'lt', value: 10 }, values)).toBe(false);
  });

  it('needs an array for in and not_in', () => {
    expect(evaluateCondition({ field: 'name', operator: 'in', value: 'beta' }, values)).toBe(false);
    expect(evaluateCondition({ field: 'name', operator: 'not_in', value: 'beta' }, values)).toBe(false);
  });
});

describe('evaluateConditionGroup', () => {
  it('joins conditions with and/or, nesting groups', () => {
    const group = {
      logic: 'or' as const,
      conditions: [
        { field: 'done', operator: 'eq' as const, value: true },
        {
          logic: 'and' as const,
          conditions: [
            { field: 'count', operator: 'gte' as const, value: 3 },
            { field: 'name', operator: 'eq' as const, value: 'beta' },
          ],
        },
      ],
    };
    expect(evaluateConditionGroup(group, { count: 3, name: 'beta' })).toBe(true);
    expect(evaluateConditionGroup(group, { count: 2, name: 'beta' })).toBe(false);
    expect(evaluateConditionGroup(group, { done: true })).toBe(true);
  });
});

describe('built-in guard types', () => {
  it('field guard describes its condition', () => {
    expect(fieldGuard({ field: 'status', operator: 'eq', value: 'ok' }).description).toBe('status eq "ok"');
    expect(fieldGuard({ field: 'token', operator: 'exists' }).description).toBe('token exists');
  });

  it('field guard rejects malformed configs', () => {
    expect(() => fieldGuard({ field: '', operator: 'eq', value: 1 })).toThrow();
    expect(() => fieldGuard({ field: 'x', operator: 'matches', value: '(' })).toThrow(SyntaxError);
  });

  it('group guard evaluates and describes the group', () => {
    const predicate = groupGuard({
      logic: 'and',
      conditions: [
        { field: 'a', operator: 'eq', value: 1 },
        { field: 'b', operator: 'lt', value: 5 },
      ],
    });
    expect(predicate.description).toBe('(a eq 1 and b lt 5)');
    expect(predicate.evaluate({ a: 1, b: 4 })).toBe(true);
    expect(predicate.evaluate({ a: 1, b: 5 })).toBe(false);
  });

  it('group guard needs at least one condition', () => {
    expect(() => groupGuard({ logic: 'and', conditions: [] })).toThrow();
  });

  it('always guard is always eligible', () => {
    const predicate = alwaysGuard({});
    expect(predicate.evaluate({})).toBe(true);
    expect(predicate.description).toBe('always');
  });
});

describe('guard predicates', () => {
  it('wraps functions', () => {
    const predicate = guard((values) => values.ready === true, 'ready');
    expect(isGuardPredicate(predicate)).toBe(true);
    expect(predicate.evaluate({ ready: true })).toBe(true);
  });

  it('recognises predicate objects', () => {
    expect(isGuardPredicate({ evaluate: () => true })).toBe(true);
    expect(isGuardPredicate({ type: 'field' })).toBe(false);
    expect(isGuardPredicate(null)).toBe(false);
  });
});
