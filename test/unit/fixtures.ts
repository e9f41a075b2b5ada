import type { Condition } from '../../src/apis/v1/condition.js';
import { MACHINE_API_VERSION, Machine } from '../../src/apis/v1/machine.js';
import { MachineHealthCheck } from '../../src/apis/v1/machine-health-check.js';

export const TEST_NAMESPACE = 'openshift-machine-api';

export function newMachine(conditions?: Condition[]): Machine {
  return {
    apiVersion: MACHINE_API_VERSION,
    kind: 'Machine',
    metadata: {
      name: 'worker-a-1',
      namespace: TEST_NAMESPACE,
    },
    spec: {
      providerID: 'test://worker-a-1',
    },
    status: conditions ? { phase: 'Running', conditions } : undefined,
  };
}

export function newMachineHealthCheck(conditions?: Condition[]): MachineHealthCheck {
  return {
    apiVersion: MACHINE_API_VERSION,
    kind: 'MachineHealthCheck',
    metadata: {
      name: 'worker-health',
      namespace: TEST_NAMESPACE,
    },
    spec: {
      selector: { matchLabels: { role: 'worker' } },
      unhealthyConditions: [{ type: 'Ready', status: 'Unknown', timeout: '300s' }],
      maxUnhealthy: '40%',
    },
    status: conditions ? { expectedMachines: 3, currentHealthy: 3, conditions } : undefined,
  };
}
