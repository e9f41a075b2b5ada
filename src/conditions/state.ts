import type { Condition } from '../apis/v1/condition.js';

/**
 * Returns true if two conditions describe the same state: equal type, status,
 * reason, severity and message. `lastTransitionTime` is not part of the state.
 * Absent optional fields compare equal to the empty string.
 */
export function hasSameState(a: Condition, b: Condition): boolean {
  return (
    a.type === b.type &&
    a.status === b.status &&
    (a.reason ?? '') === (b.reason ?? '') &&
    (a.severity ?? '') === (b.severity ?? '') &&
    (a.message ?? '') === (b.message ?? '')
  );
}

// Orders conditions by type, the order consumers such as kubectl display.
export function lexicographicLess(a: Condition, b: Condition): boolean {
  return a.type < b.type;
}

export function sortConditions(conditions: readonly Condition[]): Condition[] {
  return [...conditions].sort((a, b) => {
    if (lexicographicLess(a, b)) return -1;
    if (lexicographicLess(b, a)) return 1;
    return 0;
  });
}
