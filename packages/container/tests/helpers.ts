type ErrorClass<E extends Error> = abstract new (...args: never[]) => E;

/**
 * Run `fn` and return the error it throws, failing when it throws nothing or
 * an error of another class.
 */
export function captureError<E extends Error>(fn: () => unknown, type: ErrorClass<E>): E {
  try {
    fn();
  } catch (error) {
    if (error instanceof type) return error;
    throw error;
  }
  throw new Error(`expected ${type.name} to be thrown`);
}

/** Async counterpart of {@link captureError}. */
export async function captureRejection<E extends Error>(
  promise: Promise<unknown> | void,
  type: ErrorClass<E>
): Promise<E> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof type) return error;
    throw error;
  }
  throw new Error(`expected ${type.name} to be rejected`);
}

export const tick = (ms = 0): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));
