import { isServiceIdentity } from '../core/identity.js';
import { StaticRegistry } from '../registry/static-registry.js';
import { DEFAULT_LIFETIME, isLifetime } from '../types/types.js';
import type {
  Constructor,
  Dependency,
  InjectableMetadata,
  LifetimeType,
  RegistrationKey,
  ServiceIdentity,
} from '../types/types.js';

const isProd = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

export interface InjectableOptions {
  /** Identity the class is registered under. Defaults to the class itself. */
  provide?: ServiceIdentity;
  /** Defaults to Transient. */
  lifetime?: LifetimeType;
  key?: RegistrationKey;
  /** Explicit dependencies; win over `@Inject()` parameter decorators. */
  deps?: readonly Dependency[];
}

/**
 * Marks a class as injectable and records its registration metadata.
 *
 * Constructor parameters are declared with `@Inject()` or through `deps`;
 * nothing is read from emitted type metadata.
 *
 * @example
 * ```typescript
 * const UserServiceT = token<UserService>('UserService');
 *
 * @Injectable({ provide: UserServiceT, lifetime: Lifetime.Scoped })
 * class UserService {
 *   constructor(@Inject(DatabaseT) private db: Database) {}
 * }
 *
 * container.register(UserService);
 * ```
 */
export function Injectable(options: InjectableOptions = {}): ClassDecorator {
  if (options.provide !== undefined && !isServiceIdentity(options.provide)) {
    throw new Error(
      "@Injectable() 'provide' must be a token or a class. Create a token with `token<Foo>('Foo')`."
    );
  }
  if (options.lifetime !== undefined && !isLifetime(options.lifetime)) {
    throw new Error(`@Injectable() got unknown lifetime '${String(options.lifetime)}'.`);
  }

  return (target) => {
    const constructor = target as unknown as Constructor;

    const metadata: InjectableMetadata = {
      provide: options.provide ?? constructor,
      lifetime: options.lifetime ?? DEFAULT_LIFETIME,
      key: options.key,
      deps: options.deps,
    };
    if (!isProd) Object.freeze(metadata);

    StaticRegistry.registerInjectable(constructor, metadata);
  };
}
