/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * fetch.ts: Bounded HTTP requests for the catalog and channel icons.
 */

// How long a catalog or icon request may take before it is abandoned.
export const FETCH_TIMEOUT_MS = 15000;

/**
 * Options shared by every catalog request.
 */
export interface BoundedFetchOptions {

  // Fetch implementation. Defaults to the global fetch.
  fetch?: typeof fetch;

  // Aborts the request early, for example on Ctrl-C.
  signal?: AbortSignal;

  // Request timeout in milliseconds. Defaults to FETCH_TIMEOUT_MS.
  timeout?: number;
}

/**
 * Fetches a URL and reads its body, giving up after the timeout or when the caller's signal aborts. The timeout covers the body as well as the headers.
 * @param url - The URL to fetch.
 * @param options - Fetch implementation, abort signal and timeout.
 * @param read - Turns a successful response into the result.
 * @returns Whatever read() returns.
 * @throws If the request fails, returns an HTTP error, times out or is aborted.
 */
export async function boundedFetch<T>(url: string, options: BoundedFetchOptions, read: (response: Response) => Promise<T>): Promise<T> {

  const timeout = options.timeout ?? FETCH_TIMEOUT_MS;
  const controller = new AbortController();
  const external = options.signal;

  const timeoutId = setTimeout(() => controller.abort(new Error([ "No response from ", url, " within ", String(timeout), " ms" ].join(""))), timeout);

  const onAbort = (): void => {

    controller.abort(new Error("Request cancelled"));
  };

  if(external?.aborted) {

    onAbort();
  } else {

    external?.addEventListener("abort", onAbort, { once: true });
  }

  try {

    controller.signal.throwIfAborted();

    const response = await (options.fetch ?? fetch)(url, { signal: controller.signal });

    if(!response.ok) {

      throw new Error([ "HTTP ", String(response.status), " from ", url ].join(""));
    }

    return await read(response);
  } finally {

    clearTimeout(timeoutId);
    external?.removeEventListener("abort", onAbort);
  }
}
