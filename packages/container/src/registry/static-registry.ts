import type {
  Constructor,
  DependencySpec,
  InjectableDefinition,
  InjectableMetadata,
} from '../types/types.js';

/**
 * Sentinel for classes with no decorated constructor parameters.
 */
const EMPTY_LINKS: readonly (DependencySpec | undefined)[] = Object.freeze([]);

/**
 * Mutable record storing decorator metadata for one class.
 *
 * - metadata: from @Injectable(), absent while only @Inject() has run
 * - links: parameter index -> dependency, from @Inject()
 * - cachedDef: definition built on first lookup, dropped on any change
 */
type InjectableRecord = {
  metadata?: InjectableMetadata;
  links: Map<number, DependencySpec>;
  cachedDef?: InjectableDefinition;
};

/**
 * WeakMap so decorated classes that are no longer referenced can be
 * collected.
 */
type Bag = {
  records: WeakMap<Constructor, InjectableRecord>;
};

const createBag = (): Bag => ({ records: new WeakMap() });

let bag: Bag = createBag();

/**
 * Registry of decorator metadata.
 *
 * Parameter decorators run before the class decorator, so `@Inject()` may
 * create a record that `@Injectable()` completes later. Containers read the
 * assembled definition through {@link definition} when a decorated class is
 * registered.
 */
export class StaticRegistry {
  /**
   * Record metadata from `@Injectable()`. A second call for the same class
   * (module reload) replaces it.
   */
  static registerInjectable(target: Constructor, metadata: InjectableMetadata): void {
    const rec = this.recordFor(target);
    rec.metadata = metadata;
    rec.cachedDef = undefined;
  }

  /**
   * Record the dependency of one constructor parameter from `@Inject()`.
   */
  static registerInject(target: Constructor, parameterIndex: number, dependency: DependencySpec): void {
    const rec = this.recordFor(target);
    rec.links.set(parameterIndex, dependency);
    rec.cachedDef = undefined;
  }

  /**
   * Definition of a class decorated with `@Injectable()`, or undefined when
   * the class carries no `@Injectable()` metadata.
   */
  static definition(ctor: Constructor): InjectableDefinition | undefined {
    const rec = bag.records.get(ctor);
    if (!rec?.metadata) return undefined;
    return (rec.cachedDef ??= Object.freeze({
      ctor,
      metadata: rec.metadata,
      dependencies: computeDeps(rec.links),
    }));
  }

  /**
   * Parameter dependencies recorded by `@Inject()`, with or without
   * `@Injectable()`. Undefined when the class carries no decorator metadata.
   */
  static parameters(ctor: Constructor): readonly (DependencySpec | undefined)[] | undefined {
    const rec = bag.records.get(ctor);
    return rec ? (rec.cachedDef?.dependencies ?? computeDeps(rec.links)) : undefined;
  }

  /**
   * Drop every record. For tests: classes decorated before the reset lose
   * their metadata.
   */
  static reset(): void {
    bag = createBag();
  }

  private static recordFor(target: Constructor): InjectableRecord {
    let rec = bag.records.get(target);
    if (!rec) {
      rec = { links: new Map() };
      bag.records.set(target, rec);
    }
    return rec;
  }
}

/**
 * Dependencies in parameter order. The array runs up to the highest decorated
 * index; parameters in between without `@Inject()` are `undefined`.
 *
 *   constructor(@Inject(A) a, b, @Inject(C) c)  ->  [A, undefined, C]
 */
function computeDeps(
  links: ReadonlyMap<number, DependencySpec>
): readonly (DependencySpec | undefined)[] {
  if (links.size === 0) return EMPTY_LINKS;
  let max = -1;
  for (const i of links.keys()) if (i > max) max = i;
  const deps = new Array<DependencySpec | undefined>(max + 1).fill(undefined);
  for (const [i, dep] of links) deps[i] = dep;
  return Object.freeze(deps);
}
