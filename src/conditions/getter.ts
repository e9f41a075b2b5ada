import type { Condition, ConditionSeverity } from '../apis/v1/condition.js';
import type { KubernetesResource } from '../types/index.js';
import { Clock, systemClock } from './clock.js';
import { defaultAccessorRegistry } from './registry.js';

export function get(from: KubernetesResource, type: string): Condition | undefined {
  return defaultAccessorRegistry.resolve(from).getConditions().find((c) => c.type === type);
}

export function has(from: KubernetesResource, type: string): boolean {
  return get(from, type) !== undefined;
}

export function isTrue(from: KubernetesResource, type: string): boolean {
  return get(from, type)?.status === 'True';
}

export function isFalse(from: KubernetesResource, type: string): boolean {
  return get(from, type)?.status === 'False';
}

// A missing condition counts as unknown.
export function isUnknown(from: KubernetesResource, type: string): boolean {
  const condition = get(from, type);
  return !condition || condition.status === 'Unknown';
}

export function getReason(from: KubernetesResource, type: string): string {
  return get(from, type)?.reason ?? '';
}

export function getMessage(from: KubernetesResource, type: string): string {
  return get(from, type)?.message ?? '';
}

export function getSeverity(from: KubernetesResource, type: string): ConditionSeverity {
  return get(from, type)?.severity ?? '';
}

export function getLastTransitionTime(from: KubernetesResource, type: string): Date | undefined {
  const time = get(from, type)?.lastTransitionTime;
  return time ? new Date(time) : undefined;
}

/**
 * Seconds elapsed since the condition last transitioned, or undefined when it
 * has never been stamped.
 */
export function getConditionAge(condition: Condition, clock: Clock = systemClock): number | undefined {
  if (!condition.lastTransitionTime) {
    return undefined;
  }
  const conditionTime = new Date(condition.lastTransitionTime);
  return (clock.now().getTime() - conditionTime.getTime()) / 1000;
}
