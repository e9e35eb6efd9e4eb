/**
 * Run `fn` with an AbortSignal that fires after `ms`.
 * The timer is always cleared, whether `fn` settles or throws.
 */
export async function withAbortTimeout<T>(
  ms: number,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), ms);
  try {
    return await fn(controller.signal);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Settle with `task`, or reject with `onTimeout()` if it takes longer than
 * `ms`. The task itself is not cancelled; its late result is ignored.
 */
export function raceTimeout<T>(task: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  return Promise.race([task, deadline]).finally(() => clearTimeout(timer));
}
