import debug from '../util/debug.js';
import type { Capability } from './capabilities/types.js';
import { ConfigurationError } from './lib/errors.js';

export type ServiceKey<Services> = Extract<keyof Services, string>;

export type Resolver<Services> = {
  resolve<K extends ServiceKey<Services>>(key: K): Services[K];
};

type ServiceRegistration<Services, K extends ServiceKey<Services>> = {
  /** Services the factory resolves. Checked by `validate()` before first use. */
  dependencies?: ReadonlyArray<ServiceKey<Services>>;
  factory: (resolver: Resolver<Services>) => Services[K];
  tags?: readonly string[];
};

type StoredRegistration<Services> = {
  dependencies: ReadonlyArray<ServiceKey<Services>>;
  factory: (resolver: Resolver<Services>) => unknown;
  tags: readonly string[];
};

export const CAPABILITY_TAG = 'mcp.capability';

type CapabilityKey<Services> = {
  [K in ServiceKey<Services>]: Services[K] extends Capability ? K : never;
}[ServiceKey<Services>];

/**
 * Explicit service container. Each service is registered with its factory and
 * the services it depends on; instances are created once, on first resolve.
 * Services tagged with CAPABILITY_TAG are what `capabilities()` returns, in
 * registration order.
 */
export class ServiceContainer<Services> implements Resolver<Services> {
  private readonly registrations = new Map<ServiceKey<Services>, StoredRegistration<Services>>();
  private readonly instances = new Map<ServiceKey<Services>, unknown>();
  private readonly resolving = new Set<ServiceKey<Services>>();

  register<K extends ServiceKey<Services>>(
    key: K,
    registration: ServiceRegistration<Services, K>
  ): this {
    if (this.registrations.has(key)) {
      throw new ConfigurationError(`Service ${key} is already registered.`);
    }
    this.registrations.set(key, {
      dependencies: registration.dependencies ?? [],
      factory: registration.factory,
      tags: registration.tags ?? [],
    });
    debug.container(`Registered service ${key}`);
    return this;
  }

  registerInstance<K extends ServiceKey<Services>>(key: K, instance: Services[K]): this {
    return this.register(key, { factory: () => instance });
  }

  registerCapability<K extends CapabilityKey<Services> & ServiceKey<Services>>(
    key: K,
    registration: Omit<ServiceRegistration<Services, K>, 'tags'>
  ): this {
    return this.register(key, { ...registration, tags: [CAPABILITY_TAG] });
  }

  has(key: ServiceKey<Services>): boolean {
    return this.registrations.has(key);
  }

  resolve<K extends ServiceKey<Services>>(key: K): Services[K] {
    if (this.instances.has(key)) {
      return this.instances.get(key) as Services[K];
    }

    const registration = this.registrations.get(key);
    if (!registration) {
      throw new ConfigurationError(`Service ${key} is not registered.`);
    }
    if (this.resolving.has(key)) {
      throw new ConfigurationError(`Circular dependency while resolving ${key}.`);
    }

    this.resolving.add(key);
    try {
      const instance = registration.factory(this);
      this.instances.set(key, instance);
      return instance as Services[K];
    } finally {
      this.resolving.delete(key);
    }
  }

  /**
   * Check every declared dependency is registered and that no dependency
   * chain loops back on itself.
   */
  validate(): void {
    const problems: string[] = [];

    for (const [key, registration] of this.registrations) {
      for (const dependency of registration.dependencies) {
        if (!this.registrations.has(dependency)) {
          problems.push(`${key} depends on unregistered service ${dependency}`);
        }
      }
    }

    const state = new Map<ServiceKey<Services>, 'visiting' | 'done'>();
    const visit = (key: ServiceKey<Services>, trail: ServiceKey<Services>[]) => {
      const current = state.get(key);
      if (current === 'done') return;
      if (current === 'visiting') {
        const start = trail.indexOf(key);
        problems.push(`dependency cycle ${[...trail.slice(start), key].join(' -> ')}`);
        return;
      }
      state.set(key, 'visiting');
      for (const dependency of this.registrations.get(key)?.dependencies ?? []) {
        if (this.registrations.has(dependency)) visit(dependency, [...trail, key]);
      }
      state.set(key, 'done');
    };
    for (const key of this.registrations.keys()) visit(key, []);

    if (problems.length) {
      throw new ConfigurationError(`Invalid service wiring: ${problems.join('; ')}.`, { problems });
    }
  }

  tagged(tag: string): ServiceKey<Services>[] {
    return [...this.registrations]
      .filter(([, registration]) => registration.tags.includes(tag))
      .map(([key]) => key);
  }

  capabilities(): Capability[] {
    return this.tagged(CAPABILITY_TAG).map(key => {
      const service = this.resolve(key);
      if (!isCapability(service)) {
        throw new ConfigurationError(`Service ${key} is tagged as a capability but exposes none.`);
      }
      return service;
    });
  }
}

const isCapability = (value: unknown): value is Capability => {
  if (!value || typeof value !== 'object') return false;
  const candidate = value as { tools?: unknown; resources?: unknown };
  return typeof candidate.tools === 'function' || typeof candidate.resources === 'function';
};
