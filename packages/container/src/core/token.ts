/**
 * Phantom type brand for compile-time type safety.
 * Associates tokens with their resolved value type without runtime overhead.
 */
declare const TOKEN_BRAND: unique symbol;

/**
 * Type-safe identity for an abstract contract.
 *
 * Tokens are compared by reference; the phantom parameter `T` is what
 * `resolve(token)` returns.
 *
 * @template T - The type of value this token resolves to
 */
export interface Token<T = unknown> {
  /** Discriminant for runtime type checking */
  readonly kind: 'token';

  /** Unique identifier (tok_1, tok_2, ...) */
  readonly id: string;

  /** Human-readable label for diagnostics */
  readonly label: string;

  readonly [TOKEN_BRAND]: T;
}

let tokenCounter = 0;

/**
 * Create a new type-safe token.
 *
 * @param label - Label used in error messages (defaults to "Token")
 * @returns A frozen Token with a unique identity
 *
 * @example
 * ```typescript
 * interface Clock { now(): Date }
 * const ClockT = token<Clock>('Clock');
 * ```
 */
export function token<T = unknown>(label?: string): Token<T> {
  const id = `tok_${++tokenCounter}`;
  const created = { kind: 'token', id, label: label ?? 'Token' };
  // The brand exists only in the type system.
  return Object.freeze(created) as Token<T>;
}

/**
 * Runtime guard for values created by {@link token}.
 */
export function isToken(x: unknown): x is Token {
  if (typeof x !== 'object' || x === null) return false;
  const candidate = x as Partial<Record<'kind' | 'id' | 'label', unknown>>;
  return (
    candidate.kind === 'token' &&
    typeof candidate.id === 'string' &&
    typeof candidate.label === 'string'
  );
}

/**
 * Create several tokens at once under a shared label prefix.
 *
 * The values of `shape` are only used for their type.
 *
 * @example
 * ```typescript
 * const Billing = tokenGroup('Billing', {
 *   Gateway: null as unknown as PaymentGateway,
 *   Ledger: null as unknown as Ledger,
 * });
 * // Billing.Gateway: Token<PaymentGateway>, label 'BillingGateway'
 * ```
 */
export function tokenGroup<S extends Record<string, unknown>>(
  prefix: string,
  shape: S
): { readonly [K in keyof S]: Token<S[K]> } {
  const group: Partial<Record<keyof S, Token>> = {};
  for (const name of Object.keys(shape) as Array<keyof S & string>) {
    group[name] = token(`${prefix}${name}`);
  }
  return Object.freeze(group) as { readonly [K in keyof S]: Token<S[K]> };
}
