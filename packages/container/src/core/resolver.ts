/* Resolver
 *
 * Lifetime dispatch over the registration store, the lifetime caches and the
 * activator. Responsibilities:
 *  - Look up the descriptor for `(identity, key)`, scope-local values first
 *  - Detect cycles with the per-call ResolutionStack
 *  - Singleton: container cache, built once
 *  - Scoped: the given scope's cache; no scope is a ScopeRequiredError
 *  - Transient: built on every call, never cached
 *
 * Resolution is synchronous end to end. The check-construct-store sequence for
 * a Singleton therefore runs without any other resolve interleaving, and a
 * construction that throws leaves every cache untouched.
 */

import { LifetimeViolationError, NotRegisteredError, ScopeRequiredError } from '../errors/errors.js';
import type {
  DependencySpec,
  RegistrationDescriptor,
  RegistrationKey,
  ServiceIdentity,
} from '../types/types.js';
import type { Activator } from './activator.js';
import { describeIdentity, describeKey, describeSlot } from './identity.js';
import type { InstanceCache } from './instance-cache.js';
import type { RegistrationStore } from './registration-store.js';
import type { ResolutionStack } from './resolution-stack.js';
import type { Scope } from './scope.js';

export interface ResolverOptions {
  store: RegistrationStore;
  singletons: InstanceCache;
  activator: Activator;
  validateScopes: boolean;
}

export class Resolver {
  private readonly store: RegistrationStore;
  private readonly singletons: InstanceCache;
  private readonly activator: Activator;
  private readonly validateScopes: boolean;

  constructor(options: ResolverOptions) {
    this.store = options.store;
    this.singletons = options.singletons;
    this.activator = options.activator;
    this.validateScopes = options.validateScopes;
  }

  /**
   * Whether `(identity, key)` would find a descriptor, counting values
   * provided to `scope`.
   */
  canResolve(identity: ServiceIdentity, key: RegistrationKey | undefined, scope?: Scope): boolean {
    return scope?.getLocal(identity, key) !== undefined || this.store.isRegistered(identity, key);
  }

  /**
   * Resolve `(identity, key)`, recursing into declared dependencies with the
   * same stack and scope.
   *
   * @throws {NotRegisteredError} when nothing is registered for the slot
   * @throws {CircularDependencyError} when the slot is already under construction
   * @throws {ScopeRequiredError} for a Scoped registration without a scope
   * @throws {LifetimeViolationError} for a Scoped registration under a Singleton,
   * when scope validation is enabled
   */
  resolve<T>(
    identity: ServiceIdentity<T>,
    key: RegistrationKey | undefined,
    stack: ResolutionStack,
    scope: Scope | undefined
  ): T {
    const frame = stack.push(identity, key);
    try {
      const local = scope?.getLocal(identity, key);
      // Values provided to the scope carry the type their provide() call checked.
      if (local?.strategy.kind === 'value') return local.strategy.value as T;

      const descriptor = this.store.lookup(identity, key);
      if (!descriptor) throw this.notFound(identity, key, stack.chain());
      frame.lifetime = descriptor.lifetime;

      // Instances are stored untyped; the registration APIs tie them to T.
      return this.dispatch(descriptor, stack, scope) as T;
    } finally {
      stack.pop();
    }
  }

  private dispatch(
    descriptor: RegistrationDescriptor,
    stack: ResolutionStack,
    scope: Scope | undefined
  ): unknown {
    const build = (): unknown =>
      this.activator.instantiate(descriptor, (dep) => this.resolveDependency(dep, stack, scope));

    switch (descriptor.lifetime) {
      case 'singleton': {
        if (descriptor.strategy.kind === 'value') return descriptor.strategy.value;
        const hit = this.singletons.get(descriptor);
        if (hit) return hit.instance;
        const value = build();
        this.singletons.set(descriptor, value);
        return value;
      }

      case 'scoped': {
        const label = describeSlot(descriptor.identity, descriptor.key);
        if (!scope) throw new ScopeRequiredError(label, stack.chain());
        if (this.validateScopes) {
          const consumer = stack.findSingletonConsumer();
          if (consumer) {
            throw new LifetimeViolationError(
              describeSlot(consumer.identity, consumer.key),
              label,
              stack.chain()
            );
          }
        }
        if (descriptor.strategy.kind === 'value') return descriptor.strategy.value;
        const hit = scope.cache.get(descriptor);
        if (hit) return hit.instance;
        const value = build();
        scope.cache.set(descriptor, value);
        return value;
      }

      case 'transient':
        return build();
    }
  }

  private resolveDependency(
    dependency: DependencySpec,
    stack: ResolutionStack,
    scope: Scope | undefined
  ): unknown {
    const { identity, key, optional } = dependency;
    if (optional && !this.canResolve(identity, key, scope)) return undefined;
    return this.resolve(identity, key, stack, scope);
  }

  /**
   * Build the NotRegisteredError for a missing slot, listing what is
   * registered.
   */
  notFound(
    identity: ServiceIdentity,
    key: RegistrationKey | undefined,
    chain: string[]
  ): NotRegisteredError {
    const available: string[] = [];
    for (const d of this.store.descriptors()) available.push(describeSlot(d.identity, d.key));
    return new NotRegisteredError(
      describeIdentity(identity),
      key === undefined ? undefined : describeKey(key),
      available,
      chain
    );
  }
}
