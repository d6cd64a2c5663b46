export const TIMED_OUT = Symbol('timed-out');

/**
 * Resolves with the task's value, or with TIMED_OUT once `ms` elapses. The
 * task itself keeps running; only the wait is abandoned. A rejection of the
 * task propagates.
 */
export async function withDeadline<T>(task: Promise<T>, ms: number): Promise<T | typeof TIMED_OUT> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), ms);
  });

  try {
    return await Promise.race([task, expired]);
  } finally {
    clearTimeout(timer);
  }
}
