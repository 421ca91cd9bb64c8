/* Activator
 *
 * Materializes one registration descriptor into a runtime value. Three paths:
 *  - value-backed descriptors (prebuilt instance, returned as is)
 *  - factory-backed descriptors (called with their resolved dependencies)
 *  - class-backed descriptors (constructor injection)
 *
 * Dependencies are resolved through a callback supplied by the Resolver, so
 * lifetime policy and cycle detection stay out of this module.
 *
 * Factories run synchronously. One returning a Promise is rejected with a
 * FactoryExecutionError; a factory that throws is wrapped in one, with the
 * original error kept as `cause`.
 *
 * Constructors are not wrapped: whatever a class constructor throws reaches
 * the caller unchanged.
 */

import { FactoryExecutionError } from '../errors/errors.js';
import type { DependencySpec, RegistrationDescriptor } from '../types/types.js';
import { describeSlot } from './identity.js';
import { isPromiseLike } from './scope.js';

/** Resolves one declared dependency on behalf of the activator. */
export type DependencyResolver = (dependency: DependencySpec) => unknown;

export type InstantiateHook = (label: string, durationNs: number) => void;

const nowMs = (): number => performance.now();

/** Convert milliseconds to nanoseconds for the instrumentation hook */
const toNs = (ms: number): number => Math.round(ms * 1_000_000);

export class Activator {
  constructor(private readonly hook?: InstantiateHook) {}

  /**
   * Time `execute` and report it to the hook, if one is configured.
   * Reported on every exit path, including a throwing construction.
   */
  private instrument<T>(label: string, execute: () => T): T {
    const hook = this.hook;
    if (!hook) return execute();

    const start = nowMs();
    try {
      return execute();
    } finally {
      hook(label, toNs(nowMs() - start));
    }
  }

  /**
   * Build the value for `descriptor`, resolving each declared dependency in
   * order through `resolveDependency` first.
   *
   * @throws {FactoryExecutionError} when a factory throws or returns a Promise
   */
  instantiate(descriptor: RegistrationDescriptor, resolveDependency: DependencyResolver): unknown {
    const { strategy } = descriptor;
    const label = describeSlot(descriptor.identity, descriptor.key);

    switch (strategy.kind) {
      case 'value':
        return strategy.value;

      case 'factory': {
        const args = strategy.dependencies.map(resolveDependency);
        try {
          return this.instrument(label, () => {
            const result = strategy.factory(...args);
            if (isPromiseLike(result)) {
              throw new FactoryExecutionError(
                label,
                new Error('Factory returned a Promise; resolution is synchronous')
              );
            }
            return result;
          });
        } catch (e) {
          if (e instanceof FactoryExecutionError) throw e;
          throw new FactoryExecutionError(label, e);
        }
      }

      case 'class': {
        const Impl = strategy.implementation;
        // Zero-dependency fast path
        if (strategy.dependencies.length === 0) return this.instrument(label, () => new Impl());

        const args = strategy.dependencies.map(resolveDependency);
        return this.instrument(label, () => new Impl(...args));
      }
    }
  }
}
