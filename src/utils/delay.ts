/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * delay.ts: Async delay utility for icytune.
 */

/**
 * Resolves after the given delay. The timer is unreferenced, so a pending delay never keeps the process alive on its own, and an abort signal ends the wait early.
 * @param ms - The delay duration in milliseconds.
 * @param signal - Optional signal that resolves the delay as soon as it aborts.
 * @returns A promise that resolves after the delay or on abort, whichever comes first.
 */
export async function delay(ms: number, signal?: AbortSignal): Promise<void> {

  if(signal?.aborted) {

    return;
  }

  return new Promise<void>((resolve) => {

    const finish = (): void => {

      clearTimeout(timer);
      signal?.removeEventListener("abort", finish);
      resolve();
    };

    const timer = setTimeout(finish, ms);

    timer.unref();
    signal?.addEventListener("abort", finish, { once: true });
  });
}
