import type { Constructor, RegistrationKey, ServiceIdentity } from '../types/types.js';
import { isToken } from './token.js';

/**
 * Runtime guard for values usable as a service identity: a token, or a
 * function with a prototype object (a class or an old-style constructor).
 * Arrow functions and async functions have no prototype and are rejected.
 */
export function isServiceIdentity(x: unknown): x is ServiceIdentity {
  return isToken(x) || isConstructor(x);
}

/**
 * Runtime guard for classes. Same prototype test as {@link isServiceIdentity},
 * restricted to functions.
 */
export function isConstructor(x: unknown): x is Constructor {
  return typeof x === 'function' && typeof x.prototype === 'object' && x.prototype !== null;
}

/** Label of an identity for diagnostics: the token label or the class name. */
export function describeIdentity(identity: ServiceIdentity): string {
  if (isToken(identity)) return identity.label;
  return identity.name || 'AnonymousClass';
}

/**
 * Key equality as `Map` applies it (SameValueZero), so `NaN` matches itself.
 */
export function sameKey(a: RegistrationKey | undefined, b: RegistrationKey | undefined): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}

export function describeKey(key: RegistrationKey): string {
  return typeof key === 'string' ? `'${key}'` : String(key);
}

/** Label of an `(identity, key)` pair, e.g. `PaymentGateway['stripe']`. */
export function describeSlot(identity: ServiceIdentity, key?: RegistrationKey): string {
  const label = describeIdentity(identity);
  return key === undefined ? label : `${label}[${describeKey(key)}]`;
}
