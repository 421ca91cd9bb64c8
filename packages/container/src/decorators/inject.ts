import { isServiceIdentity } from '../core/identity.js';
import { StaticRegistry } from '../registry/static-registry.js';
import type { Constructor, RegistrationKey, ServiceIdentity } from '../types/types.js';

export interface InjectOptions {
  key?: RegistrationKey;
  /** Inject `undefined` instead of failing when nothing is registered. */
  optional?: boolean;
}

/**
 * Parameter decorator declaring the dependency of one constructor parameter.
 *
 * Every constructor parameter of an `@Injectable()` class needs one, unless
 * the class lists its dependencies in `deps`.
 *
 * @example
 * ```typescript
 * @Injectable()
 * class Checkout {
 *   constructor(
 *     @Inject(PaymentGatewayT, { key: 'stripe' }) private gateway: PaymentGateway,
 *     @Inject(AuditLogT, { optional: true }) private audit?: AuditLog
 *   ) {}
 * }
 * ```
 */
export function Inject<T>(identity: ServiceIdentity<T>, options: InjectOptions = {}): ParameterDecorator {
  if (!isServiceIdentity(identity)) {
    throw new Error("@Inject() expects a token or a class: `@Inject(FooT)` or `@Inject(Foo)`.");
  }

  return function (
    target: object,
    propertyKey: string | symbol | undefined,
    parameterIndex: number
  ) {
    if (propertyKey !== undefined) {
      throw new Error(`@Inject() is only supported on constructor parameters (got '${String(propertyKey)}').`);
    }

    // For constructor parameters the target is the class itself.
    const constructor = target as unknown as Constructor;
    StaticRegistry.registerInject(constructor, parameterIndex, {
      identity,
      key: options.key,
      optional: options.optional ?? false,
    });
  };
}
