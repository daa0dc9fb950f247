export const TIMED_OUT: unique symbol = Symbol('timedOut');

/**
 * Settle with `promise`, or with TIMED_OUT once `ms` has passed. The timer is
 * always cleared; the losing promise is left to settle on its own.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T | typeof TIMED_OUT> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), Math.max(0, ms));
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
