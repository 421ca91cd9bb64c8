import type { Token } from '../core/token.js';
import type { Logger } from '../logging/logger.js';

/**
 * Generic constructor signature used throughout the container.
 *
 * @template T - Type produced by the constructor
 * @template A - Constructor parameter tuple
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = unknown, A extends unknown[] = any[]> = new (...args: A) => T;

/**
 * Key under which implementations are registered and looked up.
 *
 * Either a typed token (an abstract contract) or a class constructor, which
 * then acts as its own identity. Compared by reference.
 */
export type ServiceIdentity<T = unknown> = Token<T> | Constructor<T>;

/**
 * Secondary key separating several registrations of one identity.
 * Omitting it addresses the default (unkeyed) registration.
 */
export type RegistrationKey = string | number | symbol;

/**
 * Supported lifetimes for registrations.
 *
 *   - **Singleton**: one instance per container, created on first resolve
 *   - **Scoped**: one instance per scope (e.g. per request)
 *   - **Transient**: a new instance for every resolve
 *
 * A constant object rather than a string enum: the values stay plain strings
 * at the API boundary while keeping autocompletion.
 *
 * @example
 * ```typescript
 * container.register({ provide: ClockT, useClass: SystemClock, lifetime: Lifetime.Singleton });
 * ```
 */
export const Lifetime = {
  Singleton: 'singleton',
  Scoped: 'scoped',
  Transient: 'transient',
} as const;

export type LifetimeType = (typeof Lifetime)[keyof typeof Lifetime];
export type Lifetime = LifetimeType;

/** Lifetime applied when a registration does not name one. */
export const DEFAULT_LIFETIME: LifetimeType = Lifetime.Transient;

const LIFETIMES: ReadonlySet<string> = new Set<string>(Object.values(Lifetime));

export function isLifetime(value: unknown): value is LifetimeType {
  return typeof value === 'string' && LIFETIMES.has(value);
}

/**
 * Full form of a declared dependency.
 *
 * `optional` dependencies resolve to `undefined` when `(identity, key)` has no
 * registration instead of failing with `NotRegisteredError`.
 */
export interface DependencySpec<T = unknown> {
  identity: ServiceIdentity<T>;
  key?: RegistrationKey;
  optional?: boolean;
}

/** A declared dependency: a bare identity or a {@link DependencySpec}. */
export type Dependency<T = unknown> = ServiceIdentity<T> | DependencySpec<T>;

/**
 * Maps a parameter tuple to the dependency list that satisfies it, so
 * `deps` of a class or factory provider are checked against its signature.
 */
export type DependenciesOf<A extends unknown[]> = { [K in keyof A]: Dependency<A[K]> };

/**
 * How a registration is turned into a value. Exactly one per descriptor.
 */
export type BuildStrategy =
  | {
      readonly kind: 'class';
      readonly implementation: Constructor;
      readonly dependencies: readonly DependencySpec[];
    }
  | {
      readonly kind: 'value';
      readonly value: unknown;
    }
  | {
      readonly kind: 'factory';
      readonly factory: (...args: unknown[]) => unknown;
      readonly dependencies: readonly DependencySpec[];
    };

/**
 * Record stored per `(identity, key)`. Frozen once stored and replaced
 * wholesale on overwrite, never mutated.
 */
export interface RegistrationDescriptor {
  readonly identity: ServiceIdentity;
  readonly key: RegistrationKey | undefined;
  /** Human-readable label used in diagnostics */
  readonly label: string;
  readonly lifetime: LifetimeType;
  readonly strategy: BuildStrategy;
}

interface ProviderBase<T> {
  provide: ServiceIdentity<T>;
  key?: RegistrationKey;
}

/**
 * Register a class built by constructor injection.
 *
 * @example
 * ```typescript
 * { provide: UserServiceT, useClass: UserService, deps: [LoggerT], lifetime: Lifetime.Scoped }
 * ```
 */
export interface ClassProvider<T = unknown, A extends unknown[] = unknown[]> extends ProviderBase<T> {
  useClass: Constructor<T, A>;
  deps?: DependenciesOf<A>;
  lifetime?: LifetimeType;
}

/**
 * Register a prebuilt value. The same value is returned whatever the
 * lifetime, since there is nothing to construct.
 *
 * @example
 * ```typescript
 * { provide: SettingsT, useValue: { region: 'eu-west-1' } }
 * ```
 */
export interface ValueProvider<T = unknown> extends ProviderBase<T> {
  useValue: T;
  lifetime?: LifetimeType;
}

/**
 * Register a factory called with its resolved `deps`, in order.
 *
 * @example
 * ```typescript
 * {
 *   provide: ConnectionT,
 *   useFactory: (settings: Settings) => new Connection(settings.url),
 *   deps: [SettingsT],
 *   lifetime: Lifetime.Singleton,
 * }
 * ```
 */
export interface FactoryProvider<T = unknown, A extends unknown[] = unknown[]>
  extends ProviderBase<T> {
  useFactory: (...args: A) => T;
  deps?: DependenciesOf<A>;
  lifetime?: LifetimeType;
}

/** Provider union accepted by `Container.register`. */
export type Provider<T = unknown> =
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  ClassProvider<T, any[]> | ValueProvider<T> | FactoryProvider<T, any[]>;

/** Options shared by the builder-style registration shorthands. */
export interface RegistrationOptions {
  key?: RegistrationKey;
}

/**
 * Metadata recorded by `@Injectable()` for a class.
 */
export interface InjectableMetadata {
  readonly provide: ServiceIdentity;
  readonly lifetime: LifetimeType;
  readonly key: RegistrationKey | undefined;
  /** Explicit `deps` given to the decorator, when any */
  readonly deps: readonly Dependency[] | undefined;
}

/**
 * Definition assembled from `@Injectable()` and `@Inject()` metadata.
 *
 * Dependencies are in parameter order; `undefined` entries mark parameters
 * without an `@Inject()` and are reported at registration time.
 */
export interface InjectableDefinition {
  readonly ctor: Constructor;
  readonly metadata: InjectableMetadata;
  readonly dependencies: readonly (DependencySpec | undefined)[];
}

/**
 * Container configuration passed to the constructor.
 */
export interface ContainerConfig {
  /**
   * Name used in log lines and error messages.
   *
   * @default 'Container'
   */
  name?: string;

  /**
   * Destination for diagnostic logging.
   *
   * @default NullLogger
   */
  logger?: Logger;

  /**
   * Hook invoked after an instance is constructed by a class or factory
   * strategy. Receives the registration label and the construction time in
   * nanoseconds.
   */
  onInstantiate?: (label: string, durationNs: number) => void;

  /**
   * Reject Scoped registrations resolved while a Singleton is under
   * construction, since the Singleton would keep the first scope's instance.
   *
   * @default false
   */
  validateScopes?: boolean;
}

export interface Disposable {
  dispose?: () => unknown;
  close?: () => unknown;
}
