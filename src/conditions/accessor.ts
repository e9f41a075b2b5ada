import type { Condition } from '../apis/v1/condition.js';
import type { Machine } from '../apis/v1/machine.js';
import type { MachineHealthCheck } from '../apis/v1/machine-health-check.js';

// Getter is implemented by objects whose conditions can be read.
export interface Getter {
  getConditions(): Condition[];
}

// Setter is implemented by objects whose conditions can be replaced as a whole.
export interface Setter extends Getter {
  setConditions(conditions: Condition[]): void;
}

export class MachineWrapper implements Setter {
  constructor(private readonly machine: Machine) {}

  getConditions(): Condition[] {
    return [...(this.machine.status?.conditions ?? [])];
  }

  setConditions(conditions: Condition[]): void {
    this.machine.status = { ...this.machine.status, conditions: [...conditions] };
  }
}

export class MachineHealthCheckWrapper implements Setter {
  constructor(private readonly healthCheck: MachineHealthCheck) {}

  getConditions(): Condition[] {
    return [...(this.healthCheck.status?.conditions ?? [])];
  }

  setConditions(conditions: Condition[]): void {
    this.healthCheck.status = { ...this.healthCheck.status, conditions: [...conditions] };
  }
}
