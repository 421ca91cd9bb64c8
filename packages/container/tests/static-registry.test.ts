import { beforeEach, describe, expect, it } from 'vitest';

import { token } from '../src/core/token.js';
import { StaticRegistry } from '../src/registry/static-registry.js';
import type { DependencySpec, InjectableMetadata } from '../src/types/types.js';

const metadata = (provide: InjectableMetadata['provide']): InjectableMetadata => ({
  provide,
  lifetime: 'singleton',
  key: undefined,
  deps: undefined,
});

describe('StaticRegistry', () => {
  beforeEach(() => {
    StaticRegistry.reset();
  });

  it('assembles a definition from both decorators', () => {
    class Service {}
    const ServiceT = token('Service');
    const dep: DependencySpec = { identity: token('Dep'), key: undefined, optional: false };

    StaticRegistry.registerInject(Service, 2, dep);
    StaticRegistry.registerInjectable(Service, metadata(ServiceT));

    const def = StaticRegistry.definition(Service);
    expect(def?.ctor).toBe(Service);
    expect(def?.metadata.provide).toBe(ServiceT);
    expect(def?.dependencies).toEqual([undefined, undefined, dep]);
    expect(Object.isFrozen(def)).toBe(true);
  });

  it('returns the same definition until the record changes', () => {
    class Service {}
    StaticRegistry.registerInjectable(Service, metadata(Service));

    const first = StaticRegistry.definition(Service);
    expect(StaticRegistry.definition(Service)).toBe(first);

    StaticRegistry.registerInject(Service, 0, { identity: token('Dep') });
    const second = StaticRegistry.definition(Service);
    expect(second).not.toBe(first);
    expect(second?.dependencies).toHaveLength(1);
  });

  it('has no definition without @Injectable metadata', () => {
    class OnlyInject {}
    const dep: DependencySpec = { identity: token('Dep') };
    StaticRegistry.registerInject(OnlyInject, 0, dep);

    expect(StaticRegistry.definition(OnlyInject)).toBeUndefined();
    expect(StaticRegistry.parameters(OnlyInject)).toEqual([dep]);
  });

  it('knows nothing about undecorated classes', () => {
    class Plain {}

    expect(StaticRegistry.definition(Plain)).toBeUndefined();
    expect(StaticRegistry.parameters(Plain)).toBeUndefined();
  });

  it('forgets every record on reset', () => {
    class Service {}
    StaticRegistry.registerInjectable(Service, metadata(Service));

    StaticRegistry.reset();

    expect(StaticRegistry.definition(Service)).toBeUndefined();
  });
});
