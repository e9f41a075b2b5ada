import { format } from 'node:util';
import type { Condition, ConditionSeverity } from '../apis/v1/condition.js';

// Messages use printf-style placeholders: %s, %d, %i, %f, %j, %o, %O and %%.

export function trueCondition(type: string): Condition {
  return {
    type,
    status: 'True',
  };
}

export function falseCondition(
  type: string,
  reason: string,
  severity: ConditionSeverity,
  messageFormat: string,
  ...messageArgs: unknown[]
): Condition {
  return {
    type,
    status: 'False',
    reason,
    severity,
    message: format(messageFormat, ...messageArgs),
  };
}

export function unknownCondition(
  type: string,
  reason: string,
  messageFormat: string,
  ...messageArgs: unknown[]
): Condition {
  return {
    type,
    status: 'Unknown',
    reason,
    message: format(messageFormat, ...messageArgs),
  };
}
