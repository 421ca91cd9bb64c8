/*
 * RegistrationStore
 * -----------------
 * Append-and-lookup table used by Container to map `(identity, key)` to the
 * registration descriptor describing how to build that service.
 *
 * Responsibilities
 *  - keep one descriptor per `(identity, key)`; the unkeyed slot is a
 *    distinct implicit key
 *  - last write wins: re-registering a slot replaces its descriptor
 *  - list every descriptor of one identity in insertion order
 *
 * Design notes
 *  - Pure storage. Nothing here constructs or caches instances.
 *  - Two-level maps (identity -> key -> descriptor) keep `allFor()` a single
 *    map walk and preserve insertion order. An overwrite keeps the slot's
 *    original position because `Map.set` on an existing key does not move it.
 */
import type { RegistrationDescriptor, RegistrationKey, ServiceIdentity } from '../types/types.js';

/** Implicit key value of the unkeyed slot. */
export const UNKEYED: unique symbol = Symbol('trellis.unkeyed');

export type SlotKey = RegistrationKey | typeof UNKEYED;

export const slotKey = (key: RegistrationKey | undefined): SlotKey => key ?? UNKEYED;

export class RegistrationStore {
  /** identity -> slot key -> descriptor */
  private readonly registrations = new Map<ServiceIdentity, Map<SlotKey, RegistrationDescriptor>>();

  private count = 0;

  /**
   * Number of stored descriptors across all identities and keys.
   */
  get size(): number {
    return this.count;
  }

  /**
   * Store a descriptor, replacing the one already held by its slot.
   *
   * @returns the replaced descriptor, if any
   */
  register(descriptor: RegistrationDescriptor): RegistrationDescriptor | undefined {
    let slots = this.registrations.get(descriptor.identity);
    if (!slots) {
      slots = new Map();
      this.registrations.set(descriptor.identity, slots);
    }

    const key = slotKey(descriptor.key);
    const previous = slots.get(key);
    if (!previous) this.count++;
    slots.set(key, descriptor);
    return previous;
  }

  lookup(identity: ServiceIdentity, key?: RegistrationKey): RegistrationDescriptor | undefined {
    return this.registrations.get(identity)?.get(slotKey(key));
  }

  isRegistered(identity: ServiceIdentity, key?: RegistrationKey): boolean {
    return this.registrations.get(identity)?.has(slotKey(key)) ?? false;
  }

  /**
   * Every descriptor of `identity` across all keys, in insertion order.
   */
  allFor(identity: ServiceIdentity): RegistrationDescriptor[] {
    const slots = this.registrations.get(identity);
    return slots ? Array.from(slots.values()) : [];
  }

  /** Registered identities, in order of first registration. */
  *identities(): IterableIterator<ServiceIdentity> {
    yield* this.registrations.keys();
  }

  /** Every stored descriptor, grouped by identity. */
  *descriptors(): IterableIterator<RegistrationDescriptor> {
    for (const slots of this.registrations.values()) yield* slots.values();
  }

  clear(): void {
    this.registrations.clear();
    this.count = 0;
  }
}
