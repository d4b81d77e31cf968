/**
 * Run `work` with an abort signal that fires after `ms`. The returned promise
 * rejects with `onTimeout()` even if `work` ignores the signal.
 */
export async function withTimeout<T>(
  work: (signal: AbortSignal) => PromiseLike<T>,
  ms: number,
  onTimeout: () => Error,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(onTimeout());
    }, ms);
  });

  try {
    return await Promise.race([Promise.resolve(work(controller.signal)), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
