import { AssertionError } from 'node:assert';
import type { z } from 'zod';
import { Condition, conditionListSchema, conditionSchema } from '../apis/v1/condition.js';
import { InvalidConditionError } from '../types/index.js';
import { hasSameState } from './state.js';

export interface Matcher {
  match(actual: unknown): boolean;
  failureMessage(actual: unknown): string;
  negatedFailureMessage(actual: unknown): string;
}

function render(value: unknown): string {
  return JSON.stringify(value, null, 2) ?? String(value);
}

function parseActual<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, actual: unknown, expectation: string): T {
  const result = schema.safeParse(actual);
  if (!result.success) {
    throw new InvalidConditionError(
      `Expected ${expectation}, got ${render(actual)}`,
      result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    );
  }
  return result.data;
}

/**
 * Matches a condition with the same type, status, reason, severity and message
 * as `expected`; the transition time is ignored.
 */
export function matchCondition(expected: Condition): Matcher {
  return {
    match(actual) {
      return hasSameState(parseActual(conditionSchema, actual, 'a condition'), expected);
    },
    failureMessage(actual) {
      return `Expected\n${render(actual)}\nto match condition\n${render(expected)}`;
    },
    negatedFailureMessage(actual) {
      return `Expected\n${render(actual)}\nnot to match condition\n${render(expected)}`;
    },
  };
}

/**
 * Matches a condition list element by element. Order and length both count:
 * the list is not sorted before comparing.
 */
export function matchConditions(expected: readonly Condition[]): Matcher {
  return {
    match(actual) {
      const conditions = parseActual(conditionListSchema, actual, 'a list of conditions');
      if (conditions.length !== expected.length) {
        return false;
      }
      return conditions.every((condition, i) => matchCondition(expected[i]).match(condition));
    },
    failureMessage(actual) {
      return `Expected\n${render(actual)}\nto match conditions\n${render(expected)}`;
    },
    negatedFailureMessage(actual) {
      return `Expected\n${render(actual)}\nnot to match conditions\n${render(expected)}`;
    },
  };
}

export function assertMatch(actual: unknown, matcher: Matcher): void {
  if (!matcher.match(actual)) {
    throw new AssertionError({ message: matcher.failureMessage(actual), actual, operator: 'match' });
  }
}

export function assertNoMatch(actual: unknown, matcher: Matcher): void {
  if (matcher.match(actual)) {
    throw new AssertionError({ message: matcher.negatedFailureMessage(actual), actual, operator: 'notMatch' });
  }
}
