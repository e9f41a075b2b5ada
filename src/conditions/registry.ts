import { MACHINE_API_VERSION, MACHINE_KIND, isMachine } from '../apis/v1/machine.js';
import { MACHINE_HEALTH_CHECK_KIND, isMachineHealthCheck } from '../apis/v1/machine-health-check.js';
import { ConditionsError, KubernetesResource, UnsupportedResourceError } from '../types/index.js';
import { logDebug, logError } from '../utils/logger.js';
import { MachineHealthCheckWrapper, MachineWrapper, Setter } from './accessor.js';

type AccessorFactory = (resource: KubernetesResource) => Setter | undefined;

function registryKey(apiVersion: string, kind: string): string {
  return `${apiVersion}/${kind}`;
}

/**
 * Closed mapping from resource kinds to the accessor that reads and writes
 * their conditions. Kinds are registered once at startup and the registry is
 * then sealed; resolving anything else is a programming error.
 */
export class AccessorRegistry {
  private factories: Map<string, AccessorFactory> = new Map();
  private sealed = false;

  register<T extends KubernetesResource>(
    apiVersion: string,
    kind: string,
    guard: (resource: KubernetesResource) => resource is T,
    wrap: (resource: T) => Setter,
  ): this {
    const key = registryKey(apiVersion, kind);
    if (this.sealed) {
      throw new ConditionsError(`Cannot register '${key}': accessor registry is sealed`, 'RegistrySealed');
    }
    if (this.factories.has(key)) {
      throw new ConditionsError(`Accessor for '${key}' is already registered`, 'DuplicateRegistration');
    }

    this.factories.set(key, (resource) => (guard(resource) ? wrap(resource) : undefined));
    logDebug(`Registered conditions accessor: ${key}`);
    return this;
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  supports(resource: KubernetesResource): boolean {
    return this.factories.has(registryKey(resource.apiVersion, resource.kind));
  }

  resolve(resource: KubernetesResource): Setter {
    const factory = this.factories.get(registryKey(resource.apiVersion, resource.kind));
    const setter = factory?.(resource);
    if (!setter) {
      const error = new UnsupportedResourceError(resource.apiVersion, resource.kind);
      logError('Cannot resolve conditions accessor', error, {
        namespace: resource.metadata?.namespace,
        name: resource.metadata?.name,
      });
      throw error;
    }
    return setter;
  }

  list(): string[] {
    return Array.from(this.factories.keys());
  }
}

export const defaultAccessorRegistry = new AccessorRegistry()
  .register(MACHINE_API_VERSION, MACHINE_KIND, isMachine, (machine) => new MachineWrapper(machine))
  .register(
    MACHINE_API_VERSION,
    MACHINE_HEALTH_CHECK_KIND,
    isMachineHealthCheck,
    (healthCheck) => new MachineHealthCheckWrapper(healthCheck),
  )
  .seal();
