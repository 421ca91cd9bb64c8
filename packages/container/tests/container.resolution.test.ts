import { describe, expect, it, vi } from 'vitest';

import { Container } from '../src/core/container.js';
import { token } from '../src/core/token.js';
import {
  AggregateDisposalError,
  CircularDependencyError,
  ContainerDisposedError,
  FactoryExecutionError,
  LifetimeViolationError,
  NotRegisteredError,
  ScopeRequiredError,
} from '../src/errors/errors.js';
import type { Logger as ContainerLogger } from '../src/logging/logger.js';
import { Lifetime } from '../src/types/types.js';
import { captureError, captureRejection } from './helpers.js';

function spyLogger(): ContainerLogger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('Container resolution', () => {
  describe('worked examples', () => {
    it('injects a concrete class into another without any interface', () => {
      class Logger {}
      class Service {
        constructor(readonly logger: Logger) {}
      }
      const container = new Container().addTransient(Logger).addTransient(Service, [Logger]);

      const service = container.resolve(Service);

      expect(service).toBeInstanceOf(Service);
      expect(service.logger).toBeInstanceOf(Logger);
    });

    it('shares one Singleton logger between Transient services', () => {
      interface ILogger {
        log(message: string): void;
      }
      interface IUserService {
        readonly logger: ILogger;
      }
      class ConsoleLogger implements ILogger {
        log(): void {}
      }
      class UserService implements IUserService {
        constructor(readonly logger: ILogger) {}
      }
      const ILoggerT = token<ILogger>('ILogger');
      const IUserServiceT = token<IUserService>('IUserService');

      const container = new Container()
        .addSingleton(ILoggerT, ConsoleLogger)
        .addTransient(IUserServiceT, UserService, [ILoggerT]);

      const first = container.resolve(IUserServiceT);
      const second = container.resolve(IUserServiceT);

      expect(first).toBeInstanceOf(UserService);
      expect(second).toBeInstanceOf(UserService);
      expect(first).not.toBe(second);
      expect(first.logger).toBeInstanceOf(ConsoleLogger);
      expect(first.logger).toBe(second.logger);
    });
  });

  describe('lifetimes', () => {
    class Counter {}

    it('returns the same Singleton instance every time', () => {
      const container = new Container().addSingleton(Counter);

      expect(container.resolve(Counter)).toBe(container.resolve(Counter));
    });

    it('builds a new Transient instance every time', () => {
      const container = new Container().addTransient(Counter);

      expect(container.resolve(Counter)).not.toBe(container.resolve(Counter));
    });

    it('returns a Transient prebuilt value unchanged', () => {
      const CounterT = token<Counter>('Counter');
      const value = new Counter();
      const container = new Container().register({ provide: CounterT, useValue: value });

      expect(container.resolve(CounterT)).toBe(value);
      expect(container.resolve(CounterT)).toBe(value);
    });

    it('shares a Scoped instance within a scope and builds a fresh one in the next', () => {
      const container = new Container().addScoped(Counter);

      container.beginScope();
      const first = container.resolve(Counter);
      expect(container.resolve(Counter)).toBe(first);
      container.endScope();

      container.beginScope();
      const next = container.resolve(Counter);
      container.endScope();

      expect(next).toBeInstanceOf(Counter);
      expect(next).not.toBe(first);
    });

    it('keeps Singletons across scopes', () => {
      const container = new Container().addSingleton(Counter);

      container.beginScope();
      const first = container.resolve(Counter);
      container.endScope();
      container.beginScope();
      const second = container.resolve(Counter);
      container.endScope();

      expect(second).toBe(first);
    });

    it('rejects a Scoped registration with no active scope', () => {
      const container = new Container().addScoped(Counter);

      const error = captureError(() => container.resolve(Counter), ScopeRequiredError);

      expect(error.identity).toBe('Counter');
      expect(error.dependencyChain).toEqual([]);
    });

    it('names the chain that reached a Scoped registration', () => {
      const DbT = token('Db');
      class Handler {
        constructor(readonly db: unknown) {}
      }
      const container = new Container().addScoped(DbT, Counter).addTransient(Handler, [DbT]);

      const error = captureError(() => container.resolve(Handler), ScopeRequiredError);

      expect(error.identity).toBe('Db');
      expect(error.dependencyChain).toEqual(['Handler']);
    });

    it('requires a scope for a Scoped value as well', () => {
      const RequestIdT = token<string>('RequestId');
      const container = new Container().register({
        provide: RequestIdT,
        useValue: 'req-1',
        lifetime: Lifetime.Scoped,
      });

      expect(() => container.resolve(RequestIdT)).toThrow(ScopeRequiredError);
      container.beginScope();
      expect(container.resolve(RequestIdT)).toBe('req-1');
      container.endScope();
    });
  });

  describe('cycles', () => {
    it('reports A → B → A with the whole path', () => {
      const AT = token('A');
      const BT = token('B');
      const container = new Container()
        .addFactory(AT, (b: unknown) => ({ b }), [BT])
        .addFactory(BT, (a: unknown) => ({ a }), [AT]);

      expect(captureError(() => container.resolve(AT), CircularDependencyError).path).toEqual([
        'A',
        'B',
        'A',
      ]);
    });

    it('reports a self-dependency as [A, A]', () => {
      const AT = token('A');
      const container = new Container().addFactory(AT, (a: unknown) => ({ a }), [AT]);

      expect(captureError(() => container.resolve(AT), CircularDependencyError).path).toEqual(['A', 'A']);
    });

    it('reports a keyed self-dependency on a NaN key', () => {
      const AT = token('A');
      const container = new Container().addFactory(
        AT,
        (a: unknown) => ({ a }),
        [{ identity: AT, key: NaN }],
        Lifetime.Transient,
        { key: NaN }
      );

      expect(captureError(() => container.resolve(AT, NaN), CircularDependencyError).path).toEqual([
        'A[NaN]',
        'A[NaN]',
      ]);
    });

    it('detects cycles between classes registered to themselves', () => {
      class Left {
        constructor(readonly right: unknown) {}
      }
      class Right {
        constructor(readonly left: unknown) {}
      }
      const container = new Container().addSingleton(Left, [Right]).addSingleton(Right, [Left]);

      expect(captureError(() => container.resolve(Right), CircularDependencyError).path).toEqual([
        'Right',
        'Left',
        'Right',
      ]);
      // A failed construction caches nothing.
      expect(() => container.resolve(Right)).toThrow(CircularDependencyError);
    });

    it('allows a diamond, which is not a cycle', () => {
      class Shared {}
      class Left {
        constructor(readonly shared: Shared) {}
      }
      class Right {
        constructor(readonly shared: Shared) {}
      }
      class Top {
        constructor(
          readonly left: Left,
          readonly right: Right
        ) {}
      }
      const container = new Container()
        .addSingleton(Shared)
        .addTransient(Left, [Shared])
        .addTransient(Right, [Shared])
        .addTransient(Top, [Left, Right]);

      const top = container.resolve(Top);

      expect(top.left.shared).toBe(top.right.shared);
    });
  });

  describe('missing registrations', () => {
    it('reports a missing top-level registration', () => {
      const DbT = token('Db');
      const container = new Container().addTransient(token('Clock'), class SystemClock {});

      const error = captureError(() => container.resolve(DbT), NotRegisteredError);

      expect(error.identity).toBe('Db');
      expect(error.key).toBeUndefined();
      expect(error.dependencyChain).toEqual([]);
      expect(error.available).toEqual(['Clock']);
    });

    it('reports the chain that led to a missing dependency', () => {
      const DbT = token('Db');
      class Repository {
        constructor(readonly db: unknown) {}
      }
      class Handler {
        constructor(readonly repo: Repository) {}
      }
      const container = new Container()
        .addTransient(Repository, [DbT])
        .addTransient(Handler, [Repository]);

      const error = captureError(() => container.resolve(Handler), NotRegisteredError);

      expect(error.identity).toBe('Db');
      expect(error.dependencyChain).toEqual(['Handler', 'Repository']);
      expect(error.available).toEqual(['Repository', 'Handler']);
    });
  });

  describe('failed construction', () => {
    it('stores nothing, so the next resolve builds again', () => {
      const ConnT = token<{ attempt: number }>('Conn');
      let attempts = 0;
      const container = new Container().addFactory(
        ConnT,
        () => {
          attempts++;
          if (attempts === 1) throw new Error('warming up');
          return { attempt: attempts };
        },
        [],
        Lifetime.Singleton
      );

      const error = captureError(() => container.resolve(ConnT), FactoryExecutionError);
      expect(error.cause).toEqual(new Error('warming up'));

      const conn = container.resolve(ConnT);
      expect(conn).toEqual({ attempt: 2 });
      expect(container.resolve(ConnT)).toBe(conn);
    });

    it('lets a later sibling resolve after an earlier one failed', () => {
      const BrokenT = token('Broken');
      const SharedT = token('Shared');
      const container = new Container()
        .addFactory(
          BrokenT,
          (_shared: unknown) => {
            throw new Error('broken');
          },
          [SharedT]
        )
        .addFactory(SharedT, () => ({ shared: true }), [], Lifetime.Singleton);

      expect(() => container.resolve(BrokenT)).toThrow(FactoryExecutionError);
      expect(container.resolve(SharedT)).toEqual({ shared: true });
    });
  });

  describe('overwrites', () => {
    it('builds from the new descriptor after a resolved Singleton was replaced', () => {
      interface Clock {
        readonly zone: string;
      }
      class UtcClock implements Clock {
        readonly zone = 'UTC';
      }
      class LocalClock implements Clock {
        readonly zone = 'local';
      }
      const ClockT = token<Clock>('Clock');
      const container = new Container().addSingleton(ClockT, UtcClock);

      const before = container.resolve(ClockT);
      container.addSingleton(ClockT, LocalClock);
      const after = container.resolve(ClockT);

      expect(before).toBeInstanceOf(UtcClock);
      expect(after).toBeInstanceOf(LocalClock);
      expect(container.resolve(ClockT)).toBe(after);
    });
  });

  describe('scope validation', () => {
    const DbT = token('Db');
    const CacheT = token('Cache');
    class Db {}
    class Cache {
      constructor(readonly db: unknown) {}
    }

    it('rejects a Scoped dependency of a Singleton when enabled', () => {
      const container = new Container({ validateScopes: true })
        .addScoped(DbT, Db)
        .addSingleton(CacheT, Cache, [DbT]);

      container.beginScope();
      const error = captureError(() => container.resolve(CacheT), LifetimeViolationError);
      container.endScope();

      expect(error.consumer).toBe('Cache');
      expect(error.dependency).toBe('Db');
      expect(error.dependencyChain).toEqual(['Cache']);
    });

    it('lets the Singleton capture the Scoped instance when disabled', () => {
      const container = new Container().addScoped(DbT, Db).addSingleton(CacheT, Cache, [DbT]);

      const scope = container.beginScope();
      const db = container.resolve(DbT);
      const cache = container.resolve(CacheT);
      container.endScope();

      expect(scope.isEnded).toBe(true);
      expect(cache).toEqual(new Cache(db));
    });

    it('allows a Scoped dependency of a Transient', () => {
      const container = new Container({ validateScopes: true })
        .addScoped(DbT, Db)
        .addTransient(CacheT, Cache, [DbT]);

      container.beginScope();
      expect(() => container.resolve(CacheT)).not.toThrow();
      container.endScope();
    });
  });

  describe('optional dependencies', () => {
    const AuditT = token<{ record(event: string): void }>('Audit');
    class Checkout {
      constructor(readonly audit?: { record(event: string): void }) {}
    }

    it('inject undefined when nothing is registered', () => {
      const container = new Container().addTransient(Checkout, [{ identity: AuditT, optional: true }]);

      expect(container.resolve(Checkout).audit).toBeUndefined();
    });

    it('inject the registered instance otherwise', () => {
      const audit = { record: vi.fn() };
      const container = new Container()
        .addInstance(AuditT, audit)
        .addTransient(Checkout, [{ identity: AuditT, optional: true }]);

      expect(container.resolve(Checkout).audit).toBe(audit);
    });

    it('still fail when the optional dependency is registered but broken', () => {
      const MissingT = token('Missing');
      const container = new Container()
        .addFactory(AuditT, (_missing: unknown) => ({ record: () => undefined }), [MissingT])
        .addTransient(Checkout, [{ identity: AuditT, optional: true }]);

      expect(captureError(() => container.resolve(Checkout), NotRegisteredError).identity).toBe('Missing');
    });
  });

  describe('tryResolve', () => {
    it('returns undefined only for the requested slot being unregistered', () => {
      const DbT = token('Db');
      const MissingT = token('Missing');
      const container = new Container()
        .addInstance(DbT, 'db')
        .addFactory(token('Other'), (_m: unknown) => 1, [MissingT]);

      expect(container.tryResolve(MissingT)).toBeUndefined();
      expect(container.tryResolve(DbT)).toBe('db');
      expect(container.tryResolve(DbT, 'replica')).toBeUndefined();
      expect(container.tryResolveKeyed(DbT, 'replica')).toBeUndefined();
    });

    it('propagates a missing nested dependency', () => {
      const MissingT = token('Missing');
      const ReportT = token('Report');
      const container = new Container().addFactory(ReportT, (_m: unknown) => 1, [MissingT]);

      expect(captureError(() => container.tryResolve(ReportT), NotRegisteredError).identity).toBe('Missing');
    });

    it('propagates cycles and missing scopes', () => {
      const AT = token('A');
      const ScopedT = token('Scoped');
      const container = new Container()
        .addFactory(AT, (a: unknown) => a, [AT])
        .addFactory(ScopedT, () => ({}), [], Lifetime.Scoped);

      expect(() => container.tryResolve(AT)).toThrow(CircularDependencyError);
      expect(() => container.tryResolve(ScopedT)).toThrow(ScopeRequiredError);
    });
  });

  describe('instrumentation', () => {
    it('reports each construction but not prebuilt values', () => {
      const onInstantiate = vi.fn();
      const SettingsT = token('Settings');
      class Repository {
        constructor(readonly settings: unknown) {}
      }
      const container = new Container({ onInstantiate })
        .addInstance(SettingsT, { url: 'x' })
        .addTransient(Repository, [SettingsT]);

      container.resolve(Repository);

      expect(onInstantiate).toHaveBeenCalledOnce();
      expect(onInstantiate).toHaveBeenCalledWith('Repository', expect.any(Number));
    });
  });

  describe('dispose', () => {
    it('disposes Singletons in reverse creation order and then refuses to resolve', () => {
      const order: string[] = [];
      class Bottom {
        dispose(): void {
          order.push('Bottom');
        }
      }
      class Top {
        constructor(readonly bottom: Bottom) {}
        close(): void {
          order.push('Top');
        }
      }
      const container = new Container({ name: 'app' })
        .addSingleton(Bottom)
        .addSingleton(Top, [Bottom]);
      container.resolve(Top);

      expect(container.dispose()).toBeUndefined();
      expect(order).toEqual(['Top', 'Bottom']);

      expect(captureError(() => container.resolve(Top), ContainerDisposedError).containerName).toBe('app');
      expect(() => container.beginScope()).toThrow(ContainerDisposedError);

      container.dispose();
      expect(order).toEqual(['Top', 'Bottom']);
    });

    it('also disposes a Singleton whose registration was replaced', () => {
      const dispose = vi.fn();
      const ConnT = token('Conn');
      const container = new Container().addFactory(ConnT, () => ({ dispose }), [], Lifetime.Singleton);
      container.resolve(ConnT);
      container.addFactory(ConnT, () => ({ dispose }), [], Lifetime.Singleton);
      container.resolve(ConnT);

      container.dispose();

      expect(dispose).toHaveBeenCalledTimes(2);
    });

    it('leaves unresolved registrations and Transients alone', () => {
      const dispose = vi.fn();
      const ConnT = token('Conn');
      const container = new Container()
        .addFactory(ConnT, () => ({ dispose }), [], Lifetime.Transient)
        .addFactory(token('Idle'), () => ({ dispose }), [], Lifetime.Singleton);
      container.resolve(ConnT);

      container.dispose();

      expect(dispose).not.toHaveBeenCalled();
    });

    it('collects failures, logs them and still marks the container disposed', () => {
      const logger = spyLogger();
      const survivor = vi.fn();
      const BadT = token('Bad');
      const GoodT = token('Good');
      const container = new Container({ name: 'app', logger })
        .addFactory(GoodT, () => ({ dispose: survivor }), [], Lifetime.Singleton)
        .addFactory(
          BadT,
          () => ({
            dispose: () => {
              throw new Error('socket already closed');
            },
          }),
          [],
          Lifetime.Singleton
        );
      container.resolve(GoodT);
      container.resolve(BadT);

      const error = captureError(() => container.dispose(), AggregateDisposalError);

      expect(error.owner).toBe("container 'app'");
      expect(error.errors.map((e) => e.message)).toEqual(['socket already closed']);
      expect(survivor).toHaveBeenCalledOnce();
      expect(logger.error).toHaveBeenCalledWith("Disposal of container 'app' failed", {
        container: 'app',
        error,
      });
      expect(() => container.resolve(GoodT)).toThrow(ContainerDisposedError);
    });

    it('returns a promise when a disposer is async', async () => {
      const closed = vi.fn();
      const PoolT = token('Pool');
      const container = new Container()
        .addFactory(PoolT, () => ({ close: () => Promise.resolve().then(closed) }), [], Lifetime.Singleton);
      container.resolve(PoolT);

      await container.dispose();

      expect(closed).toHaveBeenCalledOnce();
      expect(() => container.resolve(PoolT)).toThrow(ContainerDisposedError);
    });

    it('rejects when an async disposer fails', async () => {
      const PoolT = token('Pool');
      const container = new Container()
        .addFactory(PoolT, () => ({ close: () => Promise.reject(new Error('timeout')) }), [], Lifetime.Singleton);
      container.resolve(PoolT);

      const error = await captureRejection(container.dispose(), AggregateDisposalError);

      expect(error.errors.map((e) => e.message)).toEqual(['timeout']);
    });
  });

  describe('clear', () => {
    it('drops registrations and Singletons without disposing them', () => {
      const dispose = vi.fn();
      const ConnT = token('Conn');
      const container = new Container().addFactory(ConnT, () => ({ dispose }), [], Lifetime.Singleton);
      container.resolve(ConnT);
      container.beginScope();

      container.clear();

      expect(dispose).not.toHaveBeenCalled();
      expect(container.isRegistered(ConnT)).toBe(false);
      expect(container.activeScope).toBeUndefined();
      expect(() => container.resolve(ConnT)).toThrow(NotRegisteredError);

      container.addFactory(ConnT, () => ({ dispose }), [], Lifetime.Singleton);
      expect(container.resolve(ConnT)).toEqual({ dispose });
    });
  });
});
