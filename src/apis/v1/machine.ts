import type { V1ObjectReference } from '@kubernetes/client-node';
import type { KubernetesResource } from '../../types/index.js';
import type { Condition } from './condition.js';

export const MACHINE_GROUP = 'machine.openshift.io';
export const MACHINE_VERSION = 'v1beta1';
export const MACHINE_KIND = 'Machine';
export const MACHINE_PLURAL = 'machines';
export const MACHINE_API_VERSION = `${MACHINE_GROUP}/${MACHINE_VERSION}`;

export type MachinePhase = 'Provisioning' | 'Provisioned' | 'Running' | 'Deleting' | 'Failed';

export interface MachineSpec {
  providerID?: string;
  lifecycleHooks?: {
    preDrain?: { name: string; owner: string }[];
    preTerminate?: { name: string; owner: string }[];
  };
  taints?: { key: string; value?: string; effect: string }[];
}

export interface MachineStatus {
  nodeRef?: V1ObjectReference;
  lastUpdated?: string;
  errorReason?: string;
  errorMessage?: string;
  phase?: MachinePhase;
  conditions?: Condition[];
}

export interface Machine extends KubernetesResource {
  spec?: MachineSpec;
  status?: MachineStatus;
}

export function isMachine(resource: KubernetesResource): resource is Machine {
  return resource.apiVersion === MACHINE_API_VERSION && resource.kind === MACHINE_KIND;
}
