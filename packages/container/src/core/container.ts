import {
  ContainerDisposedError,
  InvalidRegistrationError,
  MissingInjectError,
  MissingInjectableError,
  ScopeAlreadyActiveError,
} from '../errors/errors.js';
import { NullLogger, type Logger } from '../logging/logger.js';
import { StaticRegistry } from '../registry/static-registry.js';
import {
  DEFAULT_LIFETIME,
  isLifetime,
  Lifetime,
  type BuildStrategy,
  type ClassProvider,
  type Constructor,
  type ContainerConfig,
  type DependenciesOf,
  type DependencySpec,
  type FactoryProvider,
  type LifetimeType,
  type Provider,
  type RegistrationDescriptor,
  type RegistrationKey,
  type RegistrationOptions,
  type ServiceIdentity,
  type ValueProvider,
} from '../types/types.js';
import { Activator } from './activator.js';
import { describeIdentity, describeSlot, isConstructor, isServiceIdentity } from './identity.js';
import { InstanceCache } from './instance-cache.js';
import { RegistrationStore } from './registration-store.js';
import { ResolutionStack } from './resolution-stack.js';
import { Resolver } from './resolver.js';
import { ScopeContext } from './scope-context.js';
import { disposerFor, runDisposers, Scope, type ScopeHost } from './scope.js';

const EMPTY_DEPS: readonly DependencySpec[] = Object.freeze([]);

function isRegistrationKey(value: unknown): value is RegistrationKey {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'symbol';
}

function isProvider(value: unknown): value is Provider {
  return (
    typeof value === 'object' &&
    value !== null &&
    'provide' in value &&
    ('useClass' in value || 'useValue' in value || 'useFactory' in value)
  );
}

/**
 * Dependency-injection container: registrations, lifetime caches and the
 * active scope of each execution context.
 *
 * @example
 * ```typescript
 * const LoggerT = token<Logger>('Logger');
 *
 * const container = new Container({ name: 'app' });
 * container.addSingleton(LoggerT, ConsoleLogger);
 * container.addTransient(UserService, [LoggerT]);
 *
 * const users = container.resolve(UserService);
 * ```
 */
export class Container implements ScopeHost {
  readonly name: string;

  private readonly logger: Logger;
  private readonly store = new RegistrationStore();
  private readonly singletons = new InstanceCache();
  private readonly scopes = new ScopeContext();
  private readonly resolver: Resolver;
  private disposed = false;

  constructor(config: ContainerConfig = {}) {
    const cfg = Object.freeze({ ...config });
    this.name = cfg.name ?? 'Container';
    this.logger = cfg.logger ?? new NullLogger();
    this.resolver = new Resolver({
      store: this.store,
      singletons: this.singletons,
      activator: new Activator(cfg.onInstantiate),
      validateScopes: cfg.validateScopes ?? false,
    });
  }

  // ----- registration -----

  /**
   * Register a provider object, or a class decorated with `@Injectable()`.
   * Registering the same `(identity, key)` again replaces the earlier
   * registration.
   *
   * @throws {InvalidRegistrationError} for a malformed provider
   * @throws {MissingInjectableError} for an undecorated class
   * @throws {MissingInjectError} for a constructor parameter without `@Inject()`
   */
  register<T, A extends unknown[]>(provider: ClassProvider<T, A>): this;
  register<T>(provider: ValueProvider<T>): this;
  register<T, A extends unknown[]>(provider: FactoryProvider<T, A>): this;
  register(decorated: Constructor): this;
  register(input: Provider | Constructor): this {
    this.registerUnknown(input);
    return this;
  }

  /**
   * Register a Singleton. With one class argument the class is registered
   * to itself.
   *
   * @example
   * ```typescript
   * container.addSingleton(LoggerT, ConsoleLogger);
   * container.addSingleton(Clock);
   * container.addSingleton(CacheT, RedisCache, [SettingsT], { key: 'sessions' });
   * ```
   */
  addSingleton<T, A extends unknown[]>(
    identity: ServiceIdentity<T>,
    implementation: Constructor<T, A>,
    deps?: DependenciesOf<A>,
    options?: RegistrationOptions
  ): this;
  addSingleton<T, A extends unknown[]>(
    implementation: Constructor<T, A>,
    deps?: DependenciesOf<A>,
    options?: RegistrationOptions
  ): this;
  addSingleton(...args: ShorthandArgs): this {
    return this.addClass(Lifetime.Singleton, args);
  }

  /** Register a Scoped service. Same argument forms as {@link addSingleton}. */
  addScoped<T, A extends unknown[]>(
    identity: ServiceIdentity<T>,
    implementation: Constructor<T, A>,
    deps?: DependenciesOf<A>,
    options?: RegistrationOptions
  ): this;
  addScoped<T, A extends unknown[]>(
    implementation: Constructor<T, A>,
    deps?: DependenciesOf<A>,
    options?: RegistrationOptions
  ): this;
  addScoped(...args: ShorthandArgs): this {
    return this.addClass(Lifetime.Scoped, args);
  }

  /** Register a Transient service. Same argument forms as {@link addSingleton}. */
  addTransient<T, A extends unknown[]>(
    identity: ServiceIdentity<T>,
    implementation: Constructor<T, A>,
    deps?: DependenciesOf<A>,
    options?: RegistrationOptions
  ): this;
  addTransient<T, A extends unknown[]>(
    implementation: Constructor<T, A>,
    deps?: DependenciesOf<A>,
    options?: RegistrationOptions
  ): this;
  addTransient(...args: ShorthandArgs): this {
    return this.addClass(Lifetime.Transient, args);
  }

  /** Register a prebuilt value. */
  addInstance<T>(identity: ServiceIdentity<T>, value: T, options: RegistrationOptions = {}): this {
    this.registerUnknown({
      provide: identity,
      key: options.key,
      useValue: value,
      lifetime: Lifetime.Singleton,
    });
    return this;
  }

  /**
   * Register a factory, called with its resolved `deps` in order.
   *
   * @example
   * ```typescript
   * container.addFactory(ConnectionT, (s: Settings) => connect(s.url), [SettingsT], Lifetime.Singleton);
   * ```
   */
  addFactory<T, A extends unknown[]>(
    identity: ServiceIdentity<T>,
    factory: (...args: A) => T,
    deps?: DependenciesOf<A>,
    lifetime: LifetimeType = DEFAULT_LIFETIME,
    options: RegistrationOptions = {}
  ): this {
    this.registerUnknown({ provide: identity, key: options.key, useFactory: factory, deps, lifetime });
    return this;
  }

  // ----- resolution -----

  /**
   * Resolve `(identity, key)` in the active scope of the current execution
   * context, if any.
   *
   * @throws {NotRegisteredError} when nothing is registered for the slot or a dependency
   * @throws {CircularDependencyError} when the graph loops back on itself
   * @throws {ScopeRequiredError} when a Scoped registration is reached without a scope
   * @throws {ContainerDisposedError} after {@link dispose}
   */
  resolve<T>(identity: ServiceIdentity<T>, key?: RegistrationKey): T {
    this.assertNotDisposed();
    return this.resolver.resolve(identity, key, new ResolutionStack(), this.scopes.active);
  }

  resolveKeyed<T>(identity: ServiceIdentity<T>, key: RegistrationKey): T {
    return this.resolve(identity, key);
  }

  /**
   * Like {@link resolve}, but `undefined` when `(identity, key)` itself is not
   * registered. Every other failure propagates, including a missing nested
   * dependency.
   */
  tryResolve<T>(identity: ServiceIdentity<T>, key?: RegistrationKey): T | undefined {
    this.assertNotDisposed();
    return this.tryResolveWithin(identity, key, this.scopes.active);
  }

  tryResolveKeyed<T>(identity: ServiceIdentity<T>, key: RegistrationKey): T | undefined {
    return this.tryResolve(identity, key);
  }

  /**
   * One instance per registration of `identity`, in registration order, each
   * following its own lifetime. Errors propagate.
   */
  getAll<T>(identity: ServiceIdentity<T>): T[] {
    this.assertNotDisposed();
    const scope = this.scopes.active;
    return this.store
      .allFor(identity)
      .map((d) => this.resolver.resolve(identity, d.key, new ResolutionStack(), scope));
  }

  isRegistered(identity: ServiceIdentity, key?: RegistrationKey): boolean {
    return this.store.isRegistered(identity, key);
  }

  /**
   * Registration descriptors, of one identity or of all, for diagnostics.
   */
  getRegistrations(identity?: ServiceIdentity): readonly RegistrationDescriptor[] {
    return identity === undefined ? Array.from(this.store.descriptors()) : this.store.allFor(identity);
  }

  /** @internal Used by {@link Scope.resolve}. */
  resolveWithin<T>(identity: ServiceIdentity<T>, key: RegistrationKey | undefined, scope: Scope): T {
    this.assertNotDisposed();
    return this.resolver.resolve(identity, key, new ResolutionStack(), scope);
  }

  /** @internal Used by {@link Scope.tryResolve}. */
  tryResolveWithin<T>(
    identity: ServiceIdentity<T>,
    key: RegistrationKey | undefined,
    scope: Scope | undefined
  ): T | undefined {
    this.assertNotDisposed();
    if (!this.resolver.canResolve(identity, key, scope)) return undefined;
    return this.resolver.resolve(identity, key, new ResolutionStack(), scope);
  }

  // ----- scopes -----

  /** Active scope of the current execution context. */
  get activeScope(): Scope | undefined {
    return this.scopes.active;
  }

  /**
   * Create a scope and make it active in the current execution context.
   *
   * Outside {@link withScope} and {@link isolate} that context is the root
   * slot, which every async task shares. Use it there only when nothing else
   * runs concurrently; request work belongs in `withScope`, or in `isolate`
   * when the scope is managed by hand.
   *
   * @throws {ScopeAlreadyActiveError} when a scope is already active here
   */
  beginScope(): Scope {
    this.assertNotDisposed();
    const scope = new Scope(this);
    this.scopes.activate(scope);
    this.logger.debug(`Scope ${scope.token} started`, { container: this.name });
    return scope;
  }

  /**
   * End the active scope, disposing its instances. No-op when no scope is
   * active. Returns a promise only when a disposer returned one.
   *
   * @throws {AggregateDisposalError} if any disposer failed; the scope is ended regardless
   */
  endScope(): void | Promise<void> {
    return this.endActiveScope(true);
  }

  /**
   * Run `fn` in a fresh execution context with its own scope, ending the
   * scope once `fn` settles. Concurrent calls never share a scope.
   *
   * When `fn` fails, its error wins over a disposal failure, which is logged.
   *
   * @example
   * ```typescript
   * server.on('request', (req, res) =>
   *   container.withScope(async (scope) => {
   *     scope.provide(RequestT, req);
   *     await container.resolve(HandlerT).handle(res);
   *   })
   * );
   * ```
   */
  async withScope<R>(fn: (scope: Scope) => R): Promise<Awaited<R>> {
    const outer = this.scopes.active;
    if (outer) throw new ScopeAlreadyActiveError(outer.token);

    return this.scopes.run(async (): Promise<Awaited<R>> => {
      const scope = this.beginScope();
      let result: Awaited<R>;
      try {
        result = await fn(scope);
      } catch (error) {
        await this.endActiveScope(false);
        throw error;
      }
      await this.endActiveScope(true);
      return result;
    });
  }

  /**
   * Run `fn` in a fresh execution context with no active scope, e.g. for a
   * background task that must not share the caller's scope.
   */
  isolate<R>(fn: () => R): R {
    return this.scopes.run(fn);
  }

  // ----- lifecycle -----

  /**
   * Drop every registration and cached Singleton WITHOUT disposing them,
   * and end the active scope of the current context. The container stays
   * usable.
   *
   * @see dispose() for resource cleanup
   */
  clear(): void | Promise<void> {
    this.store.clear();
    this.singletons.clear();
    return this.endActiveScope(true);
  }

  /**
   * Dispose materialized Singletons exposing `dispose()` or `close()`, in
   * reverse creation order, and mark the container disposed. Every disposer
   * runs; failures are collected.
   *
   * @throws {AggregateDisposalError} if one or more disposals failed
   */
  dispose(): void | Promise<void> {
    if (this.disposed) return;

    const disposers: Array<() => unknown> = [];
    for (const instance of this.singletons.instances().reverse()) {
      const disposer = disposerFor(instance);
      if (disposer) disposers.push(disposer);
    }
    this.singletons.clear();

    return this.settleDisposal(
      () => runDisposers(`container '${this.name}'`, disposers),
      `container '${this.name}'`,
      true,
      () => {
        this.disposed = true;
      }
    );
  }

  // ----- internals -----

  private assertNotDisposed(): void {
    if (this.disposed) throw new ContainerDisposedError(this.name);
  }

  private endActiveScope(rethrow: boolean): void | Promise<void> {
    const scope = this.scopes.deactivate();
    if (!scope) return;
    this.logger.debug(`Scope ${scope.token} ended`, { container: this.name });
    return this.settleDisposal(() => scope.end(), `scope '${scope.token}'`, rethrow);
  }

  /**
   * Run a disposal that may complete synchronously or return a promise. A
   * failure is logged and, when `rethrow` is set, passed on. `done` runs once
   * the disposal settled either way.
   */
  private settleDisposal(
    run: () => void | Promise<void>,
    owner: string,
    rethrow: boolean,
    done?: () => void
  ): void | Promise<void> {
    const fail = (error: unknown): void => {
      done?.();
      this.logger.error(`Disposal of ${owner} failed`, { container: this.name, error });
      if (rethrow) throw error;
    };

    let pending: void | Promise<void>;
    try {
      pending = run();
    } catch (error) {
      return fail(error);
    }
    if (pending instanceof Promise) return pending.then(() => done?.(), fail);
    done?.();
  }

  private addClass(lifetime: LifetimeType, args: ShorthandArgs): this {
    const [first, second, third, fourth] = args;
    // (implementation, deps?, options?) when the second argument is not a class
    const selfBound = !isConstructor(second);
    const implementation = selfBound ? first : second;
    const deps = selfBound ? second : third;
    const options = (selfBound ? third : fourth) ?? {};

    if (deps !== undefined && !Array.isArray(deps)) {
      throw new InvalidRegistrationError('deps must be an array', { provide: first, deps });
    }
    if (typeof options !== 'object' || Array.isArray(options)) {
      throw new InvalidRegistrationError('options must be an object', { provide: first, options });
    }
    const key: unknown = 'key' in options ? options.key : undefined;

    this.registerUnknown({ provide: first, key, useClass: implementation, deps, lifetime });
    return this;
  }

  /**
   * Validate any registration input and store its descriptor. Inputs reach
   * here untyped from JavaScript callers as well, so every field is checked.
   */
  private registerUnknown(input: unknown): void {
    const descriptor = isConstructor(input)
      ? this.fromDecoratedClass(input)
      : this.fromProvider(input);

    const previous = this.store.register(descriptor);
    if (previous) {
      this.logger.debug(`Replaced registration of ${describeSlot(descriptor.identity, descriptor.key)}`, {
        container: this.name,
        previousLifetime: previous.lifetime,
        lifetime: descriptor.lifetime,
      });
    }
  }

  private fromDecoratedClass(ctor: Constructor): RegistrationDescriptor {
    const def = StaticRegistry.definition(ctor);
    if (!def) throw new MissingInjectableError(ctor.name);

    const { metadata } = def;
    const dependencies = this.injectableDeps(ctor, metadata.deps, ctor.name);
    return this.describe(metadata.provide, metadata.key, metadata.lifetime, {
      kind: 'class',
      implementation: ctor,
      dependencies: this.checkArity(ctor, dependencies, ctor.name),
    });
  }

  private fromProvider(input: unknown): RegistrationDescriptor {
    if (!isProvider(input)) {
      throw new InvalidRegistrationError(
        "expected a provider object with 'provide' and one of useClass, useValue or useFactory, or an @Injectable() class",
        input
      );
    }
    if (!isServiceIdentity(input.provide)) {
      throw new InvalidRegistrationError("'provide' must be a token or a class", input);
    }
    if (input.key !== undefined && !isRegistrationKey(input.key)) {
      throw new InvalidRegistrationError("'key' must be a string, a number or a symbol", input);
    }
    if (input.lifetime !== undefined && !isLifetime(input.lifetime)) {
      throw new InvalidRegistrationError(`unknown lifetime '${String(input.lifetime)}'`, input);
    }

    if ('useClass' in input) {
      const impl = input.useClass;
      if (!isConstructor(impl)) {
        throw new InvalidRegistrationError("'useClass' must be a constructible class", input);
      }
      // Provider fields win over @Injectable() metadata of the implementation.
      const metadata = StaticRegistry.definition(impl)?.metadata;
      const dependencies =
        input.deps !== undefined
          ? this.normalizeDeps(input.deps, input)
          : this.injectableDeps(impl, metadata?.deps, input);
      return this.describe(input.provide, input.key, input.lifetime ?? metadata?.lifetime ?? DEFAULT_LIFETIME, {
        kind: 'class',
        implementation: impl,
        dependencies: this.checkArity(impl, dependencies, input),
      });
    }

    if ('useFactory' in input) {
      const factory = input.useFactory;
      if (typeof factory !== 'function') {
        throw new InvalidRegistrationError("'useFactory' must be a function", input);
      }
      const dependencies = input.deps !== undefined ? this.normalizeDeps(input.deps, input) : EMPTY_DEPS;
      if (dependencies.length < factory.length) {
        throw new InvalidRegistrationError(
          `factory takes ${factory.length} parameter(s) but declares ${dependencies.length} dependencies`,
          input
        );
      }
      return this.describe(input.provide, input.key, input.lifetime ?? DEFAULT_LIFETIME, {
        kind: 'factory',
        factory,
        dependencies,
      });
    }

    return this.describe(input.provide, input.key, input.lifetime ?? DEFAULT_LIFETIME, {
      kind: 'value',
      value: input.useValue,
    });
  }

  /**
   * Dependencies of a class registered without explicit provider `deps`:
   * the `deps` of its `@Injectable()`, else its `@Inject()` parameters up to
   * the constructor's arity. A class with no decorator metadata has none.
   */
  private injectableDeps(
    ctor: Constructor,
    explicit: readonly unknown[] | undefined,
    source: unknown
  ): readonly DependencySpec[] {
    if (explicit) return this.normalizeDeps(explicit, source);

    const recorded = StaticRegistry.parameters(ctor);
    if (!recorded) return EMPTY_DEPS;

    const count = Math.max(recorded.length, ctor.length);
    const deps: DependencySpec[] = [];
    for (let i = 0; i < count; i++) {
      const dep = recorded[i];
      if (!dep) throw new MissingInjectError(describeIdentity(ctor), i);
      deps.push(dep);
    }
    return deps;
  }

  private checkArity(
    ctor: Constructor,
    deps: readonly DependencySpec[],
    source: unknown
  ): readonly DependencySpec[] {
    if (deps.length < ctor.length) {
      throw new InvalidRegistrationError(
        `${describeIdentity(ctor)} takes ${ctor.length} constructor parameter(s) but declares ${deps.length} dependencies`,
        source
      );
    }
    return deps;
  }

  /**
   * Convert declared dependencies to their full form. Each entry is a token, a
   * class or `{ identity, key?, optional? }`.
   */
  private normalizeDeps(deps: unknown, source: unknown): readonly DependencySpec[] {
    if (!Array.isArray(deps)) throw new InvalidRegistrationError("'deps' must be an array", source);
    if (deps.length === 0) return EMPTY_DEPS;

    return Object.freeze(
      deps.map((dep: unknown, i): DependencySpec => {
        if (isServiceIdentity(dep)) return Object.freeze({ identity: dep, key: undefined, optional: false });
        if (typeof dep === 'object' && dep !== null && 'identity' in dep && isServiceIdentity(dep.identity)) {
          const key: unknown = 'key' in dep ? dep.key : undefined;
          if (key !== undefined && !isRegistrationKey(key)) {
            throw new InvalidRegistrationError(`deps[${i}].key must be a string, a number or a symbol`, source);
          }
          const optional = 'optional' in dep && dep.optional === true;
          return Object.freeze({ identity: dep.identity, key, optional });
        }
        throw new InvalidRegistrationError(
          `deps[${i}] must be a token, a class or { identity, key?, optional? }`,
          source
        );
      })
    );
  }

  private describe(
    identity: ServiceIdentity,
    key: RegistrationKey | undefined,
    lifetime: LifetimeType,
    strategy: BuildStrategy
  ): RegistrationDescriptor {
    return Object.freeze({
      identity,
      key,
      label: describeIdentity(identity),
      lifetime,
      strategy: Object.freeze(strategy),
    });
  }
}

/**
 * Runtime shape of the shorthand registration arguments:
 * `(identity, implementation, deps?, options?)` or `(implementation, deps?, options?)`.
 */
type ShorthandArgs = [
  first: ServiceIdentity,
  second?: unknown,
  third?: unknown,
  fourth?: RegistrationOptions,
];
