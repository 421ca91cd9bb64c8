import { Bench } from 'tinybench';

import { Container, Inject, Injectable, Lifetime, token } from '../src/index.js';

/**
 * Resolution Benchmark
 *
 * Measures registration, cold and warm resolution, and the per-request scope
 * cycle on a small layered graph:
 *   - Singletons: Logger, Config, Database
 *   - Scoped: UserRepository
 *   - Transient: UserService
 *
 * Run:
 *   npm run bench
 */

const LoggerT = token<Logger>('Logger');
const ConfigT = token<Config>('Config');
const DatabaseT = token<Database>('Database');
const UserRepositoryT = token<UserRepository>('UserRepository');
const UserServiceT = token<UserService>('UserService');

class Logger {
  log(_msg: string) {
    return 'LOG';
  }
}

class Config {
  getValue() {
    return 'config';
  }
}

class Database {
  constructor(private readonly logger: Logger) {}
  query() {
    this.logger.log('Query');
    return 'data';
  }
}

class UserRepository {
  constructor(private readonly db: Database) {}
  findUser(_id: string) {
    return this.db.query();
  }
}

@Injectable({ provide: UserServiceT, lifetime: Lifetime.Transient })
class UserService {
  constructor(
    @Inject(UserRepositoryT) private readonly repo: UserRepository,
    @Inject(ConfigT) private readonly config: Config,
    @Inject(LoggerT) private readonly logger: Logger
  ) {}
  getUser(id: string) {
    this.logger.log(`Getting user ${id} with ${this.config.getValue()}`);
    return this.repo.findUser(id);
  }
}

const bootstrap = (): Container =>
  new Container({ name: 'bench' })
    .addSingleton(LoggerT, Logger)
    .addSingleton(ConfigT, Config)
    .addSingleton(DatabaseT, Database, [LoggerT])
    .addScoped(UserRepositoryT, UserRepository, [DatabaseT])
    .register(UserService);

function preWarm(fn: () => void, times = 10000) {
  for (let i = 0; i < times; i++) fn();
}

async function runResolveBenchmark() {
  console.log('=== Resolution Benchmark ===\n');

  const bench = new Bench({ time: 1000 });

  const warm = bootstrap();
  warm.beginScope();
  preWarm(() => warm.resolve(UserServiceT));
  warm.resolve(LoggerT);

  console.log('[phase] warmup complete\n');

  bench
    // T1: registration only
    .add('T1: Bootstrap Only (Cold)', () => {
      bootstrap();
    })

    // T2: registration, one scope and the full graph
    .add('T2: Cold Start (Full Lifecycle)', () => {
      const container = bootstrap();
      container.beginScope();
      container.resolve(UserServiceT).getUser('42');
      container.endScope();
    })

    // T3: cached Singleton lookup
    .add('T3: Warm Resolve (Singleton)', () => {
      warm.resolve(LoggerT);
    })

    // T4: Transient built on cached Scoped and Singleton dependencies
    .add('T4: Warm Resolve (Transient over cached graph)', () => {
      warm.resolve(UserServiceT);
    })

    // T5: one request: scope, resolve, end
    .add('T5: Request Scope (begin, resolve, end)', () => {
      warm.endScope();
      warm.beginScope();
      warm.resolve(UserServiceT).getUser('42');
    });

  console.log(`[phase] running ${bench.tasks.length} tasks...`);
  await bench.run();
  console.table(bench.table());

  const getMs = (name: string) => {
    const task = bench.tasks.find((t) => t.name === name);
    return task?.result?.period ?? 0;
  };

  const registrationTime = getMs('T1: Bootstrap Only (Cold)');
  const coldResolveTime = getMs('T2: Cold Start (Full Lifecycle)');

  console.log('\nBreakdown:');
  console.log(`  Registration Cost (T1):      ${registrationTime.toFixed(3)} ms`);
  console.log(`  Instantiate Cost (T2 - T1):  ${(coldResolveTime - registrationTime).toFixed(3)} ms`);
  console.log(
    `  Warm Singleton Resolve (T3): ${(getMs('T3: Warm Resolve (Singleton)') * 1_000_000).toFixed(0)} ns`
  );

  await warm.endScope();
}

runResolveBenchmark().catch(console.error);
