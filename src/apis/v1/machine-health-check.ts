import type { V1LabelSelector } from '@kubernetes/client-node';
import type { KubernetesResource } from '../../types/index.js';
import type { Condition, ConditionStatus } from './condition.js';
import { MACHINE_API_VERSION } from './machine.js';

export const MACHINE_HEALTH_CHECK_KIND = 'MachineHealthCheck';
export const MACHINE_HEALTH_CHECK_PLURAL = 'machinehealthchecks';

// Node condition that marks a machine unhealthy once it has held for `timeout`.
export interface UnhealthyCondition {
  type: string;
  status: ConditionStatus;
  timeout: string;
}

export interface MachineHealthCheckSpec {
  selector: V1LabelSelector;
  unhealthyConditions?: UnhealthyCondition[];
  maxUnhealthy?: number | string;
  nodeStartupTimeout?: string;
}

export interface MachineHealthCheckStatus {
  expectedMachines?: number;
  currentHealthy?: number;
  remediationsAllowed?: number;
  conditions?: Condition[];
}

export interface MachineHealthCheck extends KubernetesResource {
  spec?: MachineHealthCheckSpec;
  status?: MachineHealthCheckStatus;
}

export function isMachineHealthCheck(resource: KubernetesResource): resource is MachineHealthCheck {
  return resource.apiVersion === MACHINE_API_VERSION && resource.kind === MACHINE_HEALTH_CHECK_KIND;
}
