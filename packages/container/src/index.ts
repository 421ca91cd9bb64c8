export {
  getKeyedService,
  getService,
  ServiceProvider,
  tryGetService,
} from './api/service-provider.js';

export { Inject, Injectable } from './decorators/index.js';
export type { InjectableOptions, InjectOptions } from './decorators/index.js';
export { StaticRegistry } from './registry/static-registry.js';

export { Container } from './core/container.js';
export { describeIdentity, describeSlot, isServiceIdentity } from './core/identity.js';
export { Scope } from './core/scope.js';
export * from './core/token.js';

export { DEFAULT_LIFETIME, Lifetime } from './types/types.js';
export type {
  BuildStrategy,
  ClassProvider,
  Constructor,
  ContainerConfig,
  DependenciesOf,
  Dependency,
  DependencySpec,
  Disposable,
  FactoryProvider,
  InjectableDefinition,
  InjectableMetadata,
  LifetimeType,
  Provider,
  RegistrationDescriptor,
  RegistrationKey,
  RegistrationOptions,
  ServiceIdentity,
  ValueProvider,
} from './types/types.js';

export { ConsoleLogger, NullLogger } from './logging/logger.js';
export type { Logger, LogLevel } from './logging/logger.js';

// Errors
export {
  AggregateDisposalError,
  CircularDependencyError,
  ContainerAlreadyConfiguredError,
  ContainerDisposedError,
  ContainerError,
  ContainerNotConfiguredError,
  FactoryExecutionError,
  InvalidRegistrationError,
  LifetimeViolationError,
  MissingInjectableError,
  MissingInjectError,
  NotRegisteredError,
  ScopeAlreadyActiveError,
  ScopeEndedError,
  ScopeRequiredError,
} from './errors/errors.js';
export type { ContainerErrorCode } from './errors/errors.js';
