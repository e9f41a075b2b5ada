import type { V1ObjectMeta } from '@kubernetes/client-node';

// Base types for Kubernetes resources
export interface KubernetesResource {
  apiVersion: string;
  kind: string;
  metadata: V1ObjectMeta;
}

// Error types
export class ConditionsError extends Error {
  constructor(
    message: string,
    public readonly reason?: string
  ) {
    super(message);
    this.name = 'ConditionsError';
  }
}

/**
 * Raised when an object whose kind has no registered accessor is handed to
 * the conditions package. Integrators are expected to let this propagate.
 */
export class UnsupportedResourceError extends ConditionsError {
  constructor(
    public readonly apiVersion: string,
    public readonly kind: string
  ) {
    super(`${apiVersion}/${kind} is not supported as a conditions getter`, 'UnsupportedResource');
    this.name = 'UnsupportedResourceError';
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class InvalidConditionError extends ConditionsError {
  constructor(
    message: string,
    public readonly issues: ValidationIssue[]
  ) {
    super(message, 'InvalidCondition');
    this.name = 'InvalidConditionError';
  }
}
