// Largest delay a single timer accepts; longer ones fire almost immediately.
const MAX_TIMER_MS = 2_147_483_647;

/**
 * Waits `ms` milliseconds. Resolves `true` when the full delay elapsed and
 * `false` as soon as `signal` aborts. Delays past the timer limit are waited
 * out in several steps.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };

    const wait = (remaining: number): void => {
      const step = Math.min(remaining, MAX_TIMER_MS);
      timer = setTimeout(() => {
        if (remaining > step) {
          wait(remaining - step);
          return;
        }
        signal?.removeEventListener('abort', onAbort);
        resolve(true);
      }, step);
    };

    wait(ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
