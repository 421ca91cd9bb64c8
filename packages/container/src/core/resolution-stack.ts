import { CircularDependencyError } from '../errors/errors.js';
import type { LifetimeType, RegistrationKey, ServiceIdentity } from '../types/types.js';
import { describeSlot, sameKey } from './identity.js';

export interface StackFrame {
  readonly identity: ServiceIdentity;
  readonly key: RegistrationKey | undefined;
  /** Lifetime of the registration being built, once it is known */
  lifetime?: LifetimeType;
}

/**
 * Ordered set of `(identity, key)` pairs under construction during one
 * top-level resolve call. Created per call and never shared.
 */
export class ResolutionStack {
  private readonly frames: StackFrame[] = [];

  get depth(): number {
    return this.frames.length;
  }

  /**
   * Push a frame, failing when the same `(identity, key)` is already under
   * construction. The error path is the whole stack plus the repeated frame.
   *
   * @throws CircularDependencyError
   */
  push(identity: ServiceIdentity, key: RegistrationKey | undefined): StackFrame {
    if (this.frames.some((f) => f.identity === identity && sameKey(f.key, key))) {
      const path = this.frames.map((f) => describeSlot(f.identity, f.key));
      path.push(describeSlot(identity, key));
      throw new CircularDependencyError(path);
    }
    const frame: StackFrame = { identity, key };
    this.frames.push(frame);
    return frame;
  }

  pop(): void {
    this.frames.pop();
  }

  /** Labels of the frames below the top one, for error chains. */
  chain(): string[] {
    return this.frames.slice(0, -1).map((f) => describeSlot(f.identity, f.key));
  }

  /**
   * Nearest frame below the top one whose registration is a Singleton.
   */
  findSingletonConsumer(): StackFrame | undefined {
    for (let i = this.frames.length - 2; i >= 0; i--) {
      if (this.frames[i]?.lifetime === 'singleton') return this.frames[i];
    }
    return undefined;
  }
}
