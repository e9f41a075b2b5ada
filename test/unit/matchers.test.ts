import { describe, it } from 'node:test';
import { AssertionError } from 'node:assert';
import assert from 'node:assert/strict';
import type { Condition } from '../../src/apis/v1/condition.js';
import { assertMatch, assertNoMatch, matchCondition, matchConditions } from '../../src/conditions/matchers.js';
import { InvalidConditionError } from '../../src/types/index.js';

const base: Condition = {
  type: 'type',
  status: 'True',
  severity: '',
  lastTransitionTime: '2024-03-01T10:15:30Z',
  reason: 'reason',
  message: 'message',
};

describe('matchCondition', () => {
  const testCases: { name: string; actual: Condition; expected: Condition; expectMatch: boolean }[] = [
    { name: 'with a matching condition', actual: base, expected: { ...base }, expectMatch: true },
    {
      name: 'with a different time',
      actual: base,
      expected: { ...base, lastTransitionTime: undefined },
      expectMatch: true,
    },
    { name: 'with a different type', actual: base, expected: { ...base, type: 'different' }, expectMatch: false },
    { name: 'with a different status', actual: base, expected: { ...base, status: 'False' }, expectMatch: false },
    { name: 'with a different severity', actual: base, expected: { ...base, severity: 'Info' }, expectMatch: false },
    { name: 'with a different reason', actual: base, expected: { ...base, reason: 'different' }, expectMatch: false },
    { name: 'with a different message', actual: base, expected: { ...base, message: 'different' }, expectMatch: false },
  ];

  for (const tc of testCases) {
    it(tc.name, () => {
      if (tc.expectMatch) {
        assertMatch(tc.actual, matchCondition(tc.expected));
      } else {
        assertNoMatch(tc.actual, matchCondition(tc.expected));
      }
    });
  }

  it('should reject a value that is not a condition', () => {
    assert.throws(() => matchCondition(base).match({ type: 'type', status: 'Maybe' }), InvalidConditionError);
    assert.throws(() => matchCondition(base).match('Ready'), InvalidConditionError);
  });

  it('should report the expected condition on failure', () => {
    const actual: Condition = { type: 'Ready', status: 'False' };
    const expected: Condition = { type: 'Ready', status: 'True' };

    assert.throws(() => assertMatch(actual, matchCondition(expected)), (error: unknown) => {
      assert.ok(error instanceof AssertionError);
      assert.equal(
        error.message,
        'Expected\n{\n  "type": "Ready",\n  "status": "False"\n}\nto match condition\n{\n  "type": "Ready",\n  "status": "True"\n}',
      );
      return true;
    });
  });
});

describe('matchConditions', () => {
  const second: Condition = { ...base, type: 'different', reason: 'different', message: 'different' };

  const testCases: { name: string; actual: Condition[]; expected: Condition[]; expectMatch: boolean }[] = [
    { name: 'with empty conditions', actual: [], expected: [], expectMatch: true },
    { name: 'with matching conditions', actual: [base], expected: [{ ...base }], expectMatch: true },
    { name: 'with non-matching conditions', actual: [base, base], expected: [base, second], expectMatch: false },
    { name: 'with a different number of conditions', actual: [base, base], expected: [base], expectMatch: false },
    { name: 'with the same conditions in another order', actual: [base, second], expected: [second, base], expectMatch: false },
    {
      name: 'with different transition times',
      actual: [{ type: 'X', status: 'True', lastTransitionTime: '2024-03-01T10:15:30Z' }],
      expected: [{ type: 'X', status: 'True', lastTransitionTime: '2020-01-01T00:00:00Z' }],
      expectMatch: true,
    },
  ];

  for (const tc of testCases) {
    it(tc.name, () => {
      if (tc.expectMatch) {
        assertMatch(tc.actual, matchConditions(tc.expected));
      } else {
        assertNoMatch(tc.actual, matchConditions(tc.expected));
      }
    });
  }

  it('should accept decoded conditions with a null transition time', () => {
    const decoded: unknown = JSON.parse('[{"type":"Ready","status":"True","lastTransitionTime":null}]');

    assertMatch(decoded, matchConditions([{ type: 'Ready', status: 'True' }]));
    assertNoMatch(decoded, matchConditions([{ type: 'Ready', status: 'False' }]));
  });

  it('should reject a value that is not a list of conditions', () => {
    assert.throws(() => matchConditions([]).match(base), InvalidConditionError);
  });
});
