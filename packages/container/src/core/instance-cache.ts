import type { RegistrationDescriptor, ServiceIdentity } from '../types/types.js';
import { slotKey, type SlotKey } from './registration-store.js';

/**
 * Materialized instance held for one `(identity, key)` slot.
 */
export interface CacheSlot {
  /** Descriptor the instance was built from */
  readonly descriptor: RegistrationDescriptor;
  readonly instance: unknown;
}

/**
 * Lifetime cache: `(identity, key)` -> instance.
 *
 * One cache is owned by the container for Singletons, and one by each scope
 * for the Scoped instances created while it was active.
 *
 * A slot remembers the descriptor it was built from. A lookup with a
 * different descriptor (the registration was overwritten since) is a miss,
 * and the next `set()` replaces the stale slot.
 */
export class InstanceCache {
  private readonly slots = new Map<ServiceIdentity, Map<SlotKey, CacheSlot>>();

  /** Slots in creation order, for disposal. Stale slots stay listed. */
  private created: CacheSlot[] = [];

  /**
   * Number of live slots.
   */
  get size(): number {
    let n = 0;
    for (const byKey of this.slots.values()) n += byKey.size;
    return n;
  }

  /**
   * Cached slot for the descriptor's `(identity, key)`, or undefined when
   * nothing is cached or the slot was built from another descriptor.
   */
  get(descriptor: RegistrationDescriptor): CacheSlot | undefined {
    const slot = this.slots.get(descriptor.identity)?.get(slotKey(descriptor.key));
    return slot !== undefined && slot.descriptor === descriptor ? slot : undefined;
  }

  set(descriptor: RegistrationDescriptor, instance: unknown): void {
    let byKey = this.slots.get(descriptor.identity);
    if (!byKey) {
      byKey = new Map();
      this.slots.set(descriptor.identity, byKey);
    }
    const slot: CacheSlot = { descriptor, instance };
    byKey.set(slotKey(descriptor.key), slot);
    this.created.push(slot);
  }

  /**
   * Every instance ever stored, in creation order, including instances
   * whose slot was later replaced.
   */
  instances(): unknown[] {
    return this.created.map((slot) => slot.instance);
  }

  /**
   * Snapshot of live slots keyed by their identity.
   */
  entries(): CacheSlot[] {
    const out: CacheSlot[] = [];
    for (const byKey of this.slots.values()) out.push(...byKey.values());
    return out;
  }

  clear(): void {
    this.slots.clear();
    this.created = [];
  }
}
