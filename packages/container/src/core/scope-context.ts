import { AsyncLocalStorage } from 'node:async_hooks';

import { ScopeAlreadyActiveError } from '../errors/errors.js';
import type { Scope } from './scope.js';

/**
 * Mutable cell holding the active scope of one logical execution context.
 * Shared by reference with every async continuation started inside it.
 */
interface ScopeSlot {
  scope: Scope | undefined;
}

/**
 * Tracks the active scope per logical execution context.
 *
 * Code running inside {@link run} sees its own slot, propagated through
 * promises and callbacks by AsyncLocalStorage; code outside any run shares
 * the root slot. Two concurrent requests entered through `run` therefore
 * never observe each other's scope; two that activate a scope on the root
 * slot collide.
 */
export class ScopeContext {
  private readonly storage = new AsyncLocalStorage<ScopeSlot>();
  private readonly root: ScopeSlot = { scope: undefined };

  private slot(): ScopeSlot {
    return this.storage.getStore() ?? this.root;
  }

  /**
   * Active scope of the current context. A scope ended directly through
   * `Scope.end()` is dropped from the slot here.
   */
  get active(): Scope | undefined {
    const slot = this.slot();
    if (slot.scope?.isEnded) slot.scope = undefined;
    return slot.scope;
  }

  /**
   * @throws {ScopeAlreadyActiveError} when the context already has an active scope
   */
  activate(scope: Scope): void {
    const current = this.active;
    if (current) throw new ScopeAlreadyActiveError(current.token);
    this.slot().scope = scope;
  }

  /**
   * Clear the slot and hand back the scope it held, if any.
   */
  deactivate(): Scope | undefined {
    const slot = this.slot();
    const scope = slot.scope;
    slot.scope = undefined;
    return scope;
  }

  /**
   * Run `fn` in a fresh context with no active scope.
   */
  run<R>(fn: () => R): R {
    return this.storage.run({ scope: undefined }, fn);
  }
}
