import type { Condition, ConditionSeverity } from '../apis/v1/condition.js';
import type { KubernetesResource } from '../types/index.js';
import { logDebug } from '../utils/logger.js';
import { Clock, systemClock, toTransitionTime } from './clock.js';
import { falseCondition, trueCondition, unknownCondition } from './factories.js';
import { AccessorRegistry, defaultAccessorRegistry } from './registry.js';
import { hasSameState, sortConditions } from './state.js';

/**
 * Returns a new list with `condition` upserted by type and sorted.
 *
 * If a condition of the same type exists, `lastTransitionTime` is updated only
 * when its status, reason, severity or message changes; otherwise the existing
 * time is kept. A new type keeps a caller-supplied transition time and is
 * stamped with `now` only when it has none. Neither argument is modified.
 */
export function upsertCondition(conditions: readonly Condition[], condition: Condition, now: Date): Condition[] {
  const existingIndex = conditions.findIndex((c) => c.type === condition.type);

  if (existingIndex === -1) {
    return sortConditions([
      ...conditions,
      { ...condition, lastTransitionTime: condition.lastTransitionTime || toTransitionTime(now) },
    ]);
  }

  const existing = conditions[existingIndex];
  const lastTransitionTime = hasSameState(existing, condition)
    ? existing.lastTransitionTime
    : toTransitionTime(now);

  return sortConditions([
    ...conditions.slice(0, existingIndex),
    { ...condition, lastTransitionTime },
    ...conditions.slice(existingIndex + 1),
  ]);
}

export interface ConditionSetterOptions {
  clock?: Clock;
  registry?: AccessorRegistry;
}

/**
 * Records conditions on resources resolved through an accessor registry.
 * Calls against the same resource must not interleave: each `set` is a plain
 * read, upsert and write of the whole list.
 */
export class ConditionSetter {
  private readonly clock: Clock;
  private readonly registry: AccessorRegistry;

  constructor(options: ConditionSetterOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.registry = options.registry ?? defaultAccessorRegistry;
  }

  set(to: KubernetesResource | null | undefined, condition: Condition | null | undefined): void {
    if (!to || !condition) {
      return;
    }

    const obj = this.registry.resolve(to);
    const conditions = obj.getConditions();
    const previous = conditions.find((c) => c.type === condition.type);
    const updated = upsertCondition(conditions, condition, this.clock.now());

    if (!previous || !hasSameState(previous, condition)) {
      logDebug('Condition transitioned', {
        kind: to.kind,
        namespace: to.metadata?.namespace,
        name: to.metadata?.name,
        type: condition.type,
        status: condition.status,
        reason: condition.reason,
      });
    }

    obj.setConditions(updated);
  }

  markTrue(to: KubernetesResource | null | undefined, type: string): void {
    this.set(to, trueCondition(type));
  }

  markFalse(
    to: KubernetesResource | null | undefined,
    type: string,
    reason: string,
    severity: ConditionSeverity,
    messageFormat: string,
    ...messageArgs: unknown[]
  ): void {
    this.set(to, falseCondition(type, reason, severity, messageFormat, ...messageArgs));
  }

  markUnknown(
    to: KubernetesResource | null | undefined,
    type: string,
    reason: string,
    messageFormat: string,
    ...messageArgs: unknown[]
  ): void {
    this.set(to, unknownCondition(type, reason, messageFormat, ...messageArgs));
  }
}

const defaultSetter = new ConditionSetter();

// Upserts a condition on a resource of a registered kind, using the system clock.
export function set(to: KubernetesResource | null | undefined, condition: Condition | null | undefined): void {
  defaultSetter.set(to, condition);
}

// Sets status True for the condition with the given type.
export function markTrue(to: KubernetesResource | null | undefined, type: string): void {
  defaultSetter.markTrue(to, type);
}

// Sets status False with a formatted message.
export function markFalse(
  to: KubernetesResource | null | undefined,
  type: string,
  reason: string,
  severity: ConditionSeverity,
  messageFormat: string,
  ...messageArgs: unknown[]
): void {
  defaultSetter.markFalse(to, type, reason, severity, messageFormat, ...messageArgs);
}

export function markUnknown(
  to: KubernetesResource | null | undefined,
  type: string,
  reason: string,
  messageFormat: string,
  ...messageArgs: unknown[]
): void {
  defaultSetter.markUnknown(to, type, reason, messageFormat, ...messageArgs);
}
