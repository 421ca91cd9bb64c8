/* Scope
 *
 * A disposable context that owns the Scoped-lifetime instances created while
 * it was active, typically one per inbound request.
 *
 * Design:
 *  - Each scope has its own InstanceCache for Scoped instances, allocated on
 *    first use
 *  - Scope-local values (provide()) take precedence over container
 *    registrations for the same (identity, key) while resolving in this scope
 *  - end() disposes the instances the scope created, in creation order,
 *    calling dispose() or close() when present, then purges the cache
 *  - Provided values belong to the caller and are not disposed
 *  - end() is idempotent; afterwards resolve() and provide() fail with
 *    ScopeEndedError
 *
 * Lifetime interaction:
 *  - Singleton: shared through the container, never stored here
 *  - Scoped: stored here, one instance per (identity, key)
 *  - Transient: never cached
 *
 * Usage example:
 * ```typescript
 * await container.withScope(async (scope) => {
 *   scope.provide(RequestT, req);
 *   await container.resolve(HandlerT).handle();
 * });
 * ```
 */

import { AggregateDisposalError, ScopeEndedError } from '../errors/errors.js';
import type {
  Disposable,
  RegistrationDescriptor,
  RegistrationKey,
  ServiceIdentity,
} from '../types/types.js';
import { describeIdentity } from './identity.js';
import { InstanceCache } from './instance-cache.js';
import { RegistrationStore } from './registration-store.js';

/**
 * What a scope needs from its container to resolve through itself.
 */
export interface ScopeHost {
  resolveWithin<T>(identity: ServiceIdentity<T>, key: RegistrationKey | undefined, scope: Scope): T;
  tryResolveWithin<T>(
    identity: ServiceIdentity<T>,
    key: RegistrationKey | undefined,
    scope: Scope
  ): T | undefined;
}

type Disposer = () => unknown;

let scopeCounter = 0;

const toError = (e: unknown): Error => (e instanceof Error ? e : new Error(String(e)));

/** True for anything with a callable `then`, native promise or not. */
export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    typeof (value as { then?: unknown }).then === 'function'
  );
}

/**
 * Disposer for an instance exposing `dispose()` or `close()`, if it does.
 */
export function disposerFor(value: unknown): Disposer | undefined {
  if ((typeof value !== 'object' && typeof value !== 'function') || value === null) {
    return undefined;
  }
  const candidate = value as Disposable;
  const fn =
    typeof candidate.dispose === 'function'
      ? candidate.dispose
      : typeof candidate.close === 'function'
        ? candidate.close
        : undefined;
  return fn ? () => fn.call(value) : undefined;
}

/**
 * Run disposers in order, collecting failures. Returns a promise only when a
 * disposer returned one; failures surface as one AggregateDisposalError after
 * every disposer ran.
 */
export function runDisposers(owner: string, disposers: Disposer[]): void | Promise<void> {
  const errors: Error[] = [];
  const pending: Promise<unknown>[] = [];

  for (const fn of disposers) {
    try {
      const result = fn();
      if (isPromiseLike(result)) pending.push(Promise.resolve(result));
    } catch (error) {
      errors.push(toError(error));
    }
  }

  if (pending.length === 0) {
    if (errors.length > 0) throw new AggregateDisposalError(owner, errors);
    return;
  }

  return Promise.allSettled(pending).then((results) => {
    for (const result of results) {
      if (result.status === 'rejected') errors.push(toError(result.reason));
    }
    if (errors.length > 0) throw new AggregateDisposalError(owner, errors);
  });
}

export class Scope {
  /** Unique scope token, e.g. `scope_3` */
  readonly token: string;

  private ended = false;

  /**
   * Scoped instances created in this scope.
   * Lazily allocated on the first scoped resolution.
   */
  private _cache?: InstanceCache;

  /** Scope-local values registered through provide(). */
  private locals?: RegistrationStore;

  /** Extra cleanup callbacks registered by callers. */
  private disposers?: Disposer[];

  constructor(private readonly host: ScopeHost) {
    this.token = `scope_${++scopeCounter}`;
  }

  get isEnded(): boolean {
    return this.ended;
  }

  /**
   * Cache of this scope's Scoped instances, created on first access.
   *
   * @throws {ScopeEndedError} if the scope has ended
   */
  get cache(): InstanceCache {
    if (this.ended) throw new ScopeEndedError(this.token);
    return (this._cache ??= new InstanceCache());
  }

  /**
   * Make `value` resolvable for `(identity, key)` inside this scope only.
   * A second call for the same slot replaces the value.
   *
   * @example
   * ```typescript
   * scope.provide(RequestIdT, crypto.randomUUID());
   * ```
   */
  provide<T>(identity: ServiceIdentity<T>, value: T, key?: RegistrationKey): void {
    if (this.ended) throw new ScopeEndedError(this.token);
    this.locals ??= new RegistrationStore();
    this.locals.register(
      Object.freeze<RegistrationDescriptor>({
        identity,
        key,
        label: describeIdentity(identity),
        lifetime: 'scoped',
        strategy: Object.freeze({ kind: 'value', value }),
      })
    );
  }

  /**
   * Scope-local descriptor for `(identity, key)`, if one was provided.
   * @internal Used by the resolver.
   */
  getLocal(identity: ServiceIdentity, key?: RegistrationKey): RegistrationDescriptor | undefined {
    return this.locals?.lookup(identity, key);
  }

  /**
   * Register a cleanup callback run when the scope ends, after the scope's
   * own instances were disposed.
   *
   * @throws {ScopeEndedError} if the scope has ended
   */
  registerDisposer(fn: () => unknown): void {
    if (this.ended) throw new ScopeEndedError(this.token);
    (this.disposers ??= []).push(fn);
  }

  /**
   * Resolve through this scope, whether or not it is the active one.
   *
   * @throws {ScopeEndedError} if the scope has ended
   */
  resolve<T>(identity: ServiceIdentity<T>, key?: RegistrationKey): T {
    if (this.ended) throw new ScopeEndedError(this.token);
    return this.host.resolveWithin(identity, key, this);
  }

  /**
   * Like {@link resolve}, but `undefined` when `(identity, key)` is not
   * registered. Other failures propagate.
   */
  tryResolve<T>(identity: ServiceIdentity<T>, key?: RegistrationKey): T | undefined {
    if (this.ended) throw new ScopeEndedError(this.token);
    return this.host.tryResolveWithin(identity, key, this);
  }

  /**
   * End the scope: dispose its instances in creation order, run registered
   * disposers, purge the cache.
   *
   * Safe to call more than once; later calls are no-ops. Returns a promise
   * only when a disposer returned one.
   *
   * @throws {AggregateDisposalError} if any disposer failed
   */
  end(): void | Promise<void> {
    if (this.ended) return;
    this.ended = true;

    const disposers: Disposer[] = [];
    for (const instance of this._cache?.instances() ?? []) {
      const disposer = disposerFor(instance);
      if (disposer) disposers.push(disposer);
    }
    if (this.disposers) disposers.push(...this.disposers);

    this._cache?.clear();
    this.locals?.clear();
    this.disposers = undefined;

    return runDisposers(`scope '${this.token}'`, disposers);
  }
}
