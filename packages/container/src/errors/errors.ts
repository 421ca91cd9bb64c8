const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

const chainLines = (chain: readonly string[] | undefined, target: string): string[] =>
  chain && chain.length > 0 ? ['Dependency chain:', `  ${chain.join(' → ')} → ${target}`, ''] : [];

export type ContainerErrorCode =
  | 'NOT_REGISTERED'
  | 'CIRCULAR_DEPENDENCY'
  | 'SCOPE_REQUIRED'
  | 'SCOPE_ALREADY_ACTIVE'
  | 'SCOPE_ENDED'
  | 'INVALID_REGISTRATION'
  | 'FACTORY_FAILED'
  | 'LIFETIME_VIOLATION'
  | 'MISSING_INJECTABLE'
  | 'MISSING_INJECT'
  | 'DISPOSAL_FAILED'
  | 'CONTAINER_DISPOSED'
  | 'CONTAINER_NOT_CONFIGURED'
  | 'CONTAINER_ALREADY_CONFIGURED';

/**
 * Base class of every error raised by the container. `code` is a literal per
 * subclass, so a caught error can be narrowed with a `switch`.
 */
export abstract class ContainerError extends Error {
  abstract readonly code: ContainerErrorCode;
}

/**
 * No registration exists for the requested identity and key.
 */
export class NotRegisteredError extends ContainerError {
  readonly code = 'NOT_REGISTERED';

  constructor(
    public identity: string,
    public key: string | undefined,
    public available: string[],
    public dependencyChain?: string[]
  ) {
    const target = key === undefined ? `'${identity}'` : `'${identity}' with key ${key}`;
    const parts: string[] = [`Service ${target} is not registered.`, ''];

    parts.push(...chainLines(dependencyChain, identity));

    if (available.length > 0 && available.length <= 10) {
      parts.push('Registered services:');
      available.forEach((a) => parts.push(`  - ${a}`));
      parts.push('');
    } else if (available.length > 10) {
      parts.push(`${available.length} services are registered.`, '');
    }

    parts.push(
      'To fix this:',
      `  1. Register ${identity}${key === undefined ? '' : ` under key ${key}`} before resolving it`,
      `  2. Check that the token or class passed in 'deps' is the one that was registered`,
      `  3. Declare the dependency as { identity, optional: true } if it may be absent`
    );

    super(format(`Service ${target} is not registered.`, parts));
    this.name = 'NotRegisteredError';
  }
}

/**
 * A registration depends on itself, directly or through other registrations.
 */
export class CircularDependencyError extends ContainerError {
  readonly code = 'CIRCULAR_DEPENDENCY';

  /**
   * @param path - Every frame of the resolution stack followed by the frame
   * that closed the loop, e.g. `['A', 'B', 'A']`
   */
  constructor(public path: string[]) {
    const pathStr = path.join(' → ');
    const message = format(`Circular dependency detected: ${pathStr}`, [
      'Circular dependency detected:',
      '',
      `  ${pathStr}`,
      '',
      `${path[path.length - 1]} ends up depending on itself.`,
      '',
      'To fix this:',
      '  1. Extract the shared logic into a separate service',
      '  2. Have one side resolve the other lazily through a factory',
    ]);
    super(message);
    this.name = 'CircularDependencyError';
  }
}

/**
 * A Scoped registration was resolved with no active scope.
 */
export class ScopeRequiredError extends ContainerError {
  readonly code = 'SCOPE_REQUIRED';

  constructor(
    public identity: string,
    public dependencyChain?: string[]
  ) {
    const parts: string[] = [`Cannot resolve scoped service '${identity}' without an active scope.`, ''];
    parts.push(...chainLines(dependencyChain, identity));
    parts.push(
      'To fix this:',
      '  1. Resolve inside a scope:',
      '     container.beginScope();',
      '     try { container.resolve(Token); } finally { container.endScope(); }',
      '  2. Or wrap the work in container.withScope(() => ...)',
      '  3. Or register the service as Singleton or Transient'
    );
    super(format(`Cannot resolve scoped service '${identity}' without an active scope.`, parts));
    this.name = 'ScopeRequiredError';
  }
}

/**
 * `beginScope()` was called while a scope is active in the same execution
 * context. Scopes do not nest.
 */
export class ScopeAlreadyActiveError extends ContainerError {
  readonly code = 'SCOPE_ALREADY_ACTIVE';

  constructor(public activeScope: string) {
    const dev = [
      `Scope '${activeScope}' is already active.`,
      '',
      'Scopes do not nest. End the active scope with endScope() first,',
      'or use container.isolate() / withScope() to start a separate execution context.',
    ];
    super(format(`Scope '${activeScope}' is already active.`, dev));
    this.name = 'ScopeAlreadyActiveError';
  }
}

export class ScopeEndedError extends ContainerError {
  readonly code = 'SCOPE_ENDED';

  constructor(public scope: string) {
    const dev = [
      `Scope '${scope}' has ended.`,
      '',
      'Do not resolve or provide values through a scope after endScope().',
    ];
    super(format(`Scope '${scope}' has ended.`, dev));
    this.name = 'ScopeEndedError';
  }
}

export class InvalidRegistrationError extends ContainerError {
  readonly code = 'INVALID_REGISTRATION';

  constructor(
    public reason: string,
    public registration?: unknown
  ) {
    let received: string;
    try {
      received = JSON.stringify(registration, null, 2) ?? String(registration);
    } catch {
      received = String(registration);
    }

    const dev = [
      `Invalid registration: ${reason}`,
      '',
      'Valid registrations:',
      `  - A class decorated with @Injectable()`,
      `  - { provide, useClass, deps?, lifetime?, key? }`,
      `  - { provide, useValue, lifetime?, key? }`,
      `  - { provide, useFactory, deps?, lifetime?, key? }`,
      '',
      'Received:',
      received,
    ];
    super(format(`Invalid registration: ${reason}`, dev));
    this.name = 'InvalidRegistrationError';
  }
}

export class FactoryExecutionError extends ContainerError {
  readonly code = 'FACTORY_FAILED';

  constructor(
    public identity: string,
    cause: unknown
  ) {
    const dev = [
      'Factory execution failed',
      '',
      `Factory for '${identity}' threw during creation. See 'cause' for details.`,
    ];
    super(format(`Factory for '${identity}' failed during creation.`, dev), { cause });
    this.name = 'FactoryExecutionError';
  }
}

/**
 * A Scoped registration was requested while a Singleton was being built.
 * Raised only when the container is created with `validateScopes: true`.
 */
export class LifetimeViolationError extends ContainerError {
  readonly code = 'LIFETIME_VIOLATION';

  constructor(
    public consumer: string,
    public dependency: string,
    public dependencyChain?: string[]
  ) {
    const parts: string[] = [
      `Singleton '${consumer}' cannot depend on scoped service '${dependency}'.`,
      '',
    ];
    parts.push(...chainLines(dependencyChain, dependency));
    parts.push(
      'A singleton outlives every scope and would keep the first scope\'s instance.',
      '',
      'To fix this:',
      `  1. Register '${consumer}' as Scoped or Transient`,
      `  2. Register '${dependency}' as Singleton`
    );
    super(format(`Lifetime violation: singleton '${consumer}' → scoped '${dependency}'`, parts));
    this.name = 'LifetimeViolationError';
  }
}

export class MissingInjectableError extends ContainerError {
  readonly code = 'MISSING_INJECTABLE';

  constructor(public className: string) {
    const dev = [
      'Missing @Injectable decorator',
      '',
      `Class ${className} is not decorated with @Injectable().`,
      'Decorate it, or register it with an explicit provider object.',
    ];
    super(format(`Class ${className} must be decorated with @Injectable().`, dev));
    this.name = 'MissingInjectableError';
  }
}

export class MissingInjectError extends ContainerError {
  readonly code = 'MISSING_INJECT';

  constructor(
    public className: string,
    public parameterIndex: number
  ) {
    const dev = [
      'Missing @Inject decorator',
      '',
      `Parameter ${parameterIndex} of ${className} has no @Inject decorator.`,
      '',
      'Example:',
      `  @Injectable()`,
      `  class ${className} {`,
      `    constructor(@Inject(SomeService) private readonly service: SomeService) {}`,
      `  }`,
    ];
    super(format(`Missing @Inject decorator at parameter ${parameterIndex} of ${className}.`, dev));
    this.name = 'MissingInjectError';
  }
}

/**
 * One or more disposers failed while a scope or the container was disposed.
 * Every disposer still ran; the individual failures are kept in `errors`.
 */
export class AggregateDisposalError extends ContainerError {
  readonly code = 'DISPOSAL_FAILED';

  constructor(
    public owner: string,
    public errors: Error[]
  ) {
    const errorList = errors.map((e, i) => `  ${i + 1}. ${e.message}`).join('\n');
    const dev = [
      `${errors.length} error(s) occurred while disposing ${owner}:`,
      errorList,
      '',
      'Check the `errors` property for each failure.',
    ];
    super(format(`${errors.length} disposal error(s) occurred in ${owner}.`, dev));
    this.name = 'AggregateDisposalError';
  }
}

export class ContainerDisposedError extends ContainerError {
  readonly code = 'CONTAINER_DISPOSED';

  constructor(public containerName: string) {
    const dev = [
      `Container '${containerName}' has been disposed.`,
      '',
      'Dispose is irreversible. Create a new container before resolving again.',
    ];
    super(format(`Container '${containerName}' has been disposed.`, dev));
    this.name = 'ContainerDisposedError';
  }
}

export class ContainerNotConfiguredError extends ContainerError {
  readonly code = 'CONTAINER_NOT_CONFIGURED';

  constructor() {
    const dev = [
      'ServiceProvider is not configured.',
      '',
      'Call ServiceProvider.configure((container) => { ... }) at startup.',
    ];
    super(format('ServiceProvider is not configured.', dev));
    this.name = 'ContainerNotConfiguredError';
  }
}

export class ContainerAlreadyConfiguredError extends ContainerError {
  readonly code = 'CONTAINER_ALREADY_CONFIGURED';

  constructor() {
    const dev = [
      'ServiceProvider is already configured.',
      '',
      'Call ServiceProvider.reset() before configuring it again.',
    ];
    super(format('ServiceProvider is already configured.', dev));
    this.name = 'ContainerAlreadyConfiguredError';
  }
}
