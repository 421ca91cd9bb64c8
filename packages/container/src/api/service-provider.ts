import { Container } from '../core/container.js';
import type { Scope } from '../core/scope.js';
import { ContainerAlreadyConfiguredError, ContainerNotConfiguredError } from '../errors/errors.js';
import type { ContainerConfig, RegistrationKey, ServiceIdentity } from '../types/types.js';

/**
 * Process-wide access to one container, for code that cannot take the
 * container as a parameter (framework hooks, legacy entry points).
 *
 * @remarks
 * - Never created implicitly: call {@link ServiceProvider.configure} once at startup
 * - Every accessor fails with `ContainerNotConfiguredError` before that
 * - {@link ServiceProvider.reset} drops the container, for test isolation
 *
 * @example
 * ```typescript
 * ServiceProvider.configure((c) => {
 *   c.addSingleton(LoggerT, ConsoleLogger);
 *   c.addTransient(UserService, [LoggerT]);
 * });
 *
 * const users = getService(UserService);
 * ```
 */
export class ServiceProvider {
  private static current?: Container;

  /**
   * Create the process-wide container and run `setup` against it.
   *
   * @throws {ContainerAlreadyConfiguredError} when already configured
   */
  static configure(setup: (container: Container) => void, config?: ContainerConfig): Container {
    if (this.current) throw new ContainerAlreadyConfiguredError();
    const container = new Container({ name: 'ServiceProvider', ...config });
    setup(container);
    this.current = container;
    return container;
  }

  static get isConfigured(): boolean {
    return this.current !== undefined;
  }

  /**
   * @throws {ContainerNotConfiguredError} before {@link configure}
   */
  static get container(): Container {
    if (!this.current) throw new ContainerNotConfiguredError();
    return this.current;
  }

  /**
   * Forget the configured container. Its Singletons are not disposed; call
   * `container.dispose()` first when they hold resources.
   */
  static reset(): void {
    this.current = undefined;
  }

  static resolve<T>(identity: ServiceIdentity<T>, key?: RegistrationKey): T {
    return this.container.resolve(identity, key);
  }

  static resolveKeyed<T>(identity: ServiceIdentity<T>, key: RegistrationKey): T {
    return this.container.resolveKeyed(identity, key);
  }

  static tryResolve<T>(identity: ServiceIdentity<T>, key?: RegistrationKey): T | undefined {
    return this.container.tryResolve(identity, key);
  }

  static tryResolveKeyed<T>(identity: ServiceIdentity<T>, key: RegistrationKey): T | undefined {
    return this.container.tryResolveKeyed(identity, key);
  }

  static getAll<T>(identity: ServiceIdentity<T>): T[] {
    return this.container.getAll(identity);
  }

  static isRegistered(identity: ServiceIdentity, key?: RegistrationKey): boolean {
    return this.container.isRegistered(identity, key);
  }

  static beginScope(): Scope {
    return this.container.beginScope();
  }

  static endScope(): void | Promise<void> {
    return this.container.endScope();
  }

  static withScope<R>(fn: (scope: Scope) => R): Promise<Awaited<R>> {
    return this.container.withScope(fn);
  }
}

/** Resolve from the process-wide container. */
export function getService<T>(identity: ServiceIdentity<T>): T {
  return ServiceProvider.resolve(identity);
}

export function getKeyedService<T>(identity: ServiceIdentity<T>, key: RegistrationKey): T {
  return ServiceProvider.resolveKeyed(identity, key);
}

export function tryGetService<T>(identity: ServiceIdentity<T>, key?: RegistrationKey): T | undefined {
  return ServiceProvider.tryResolve(identity, key);
}
