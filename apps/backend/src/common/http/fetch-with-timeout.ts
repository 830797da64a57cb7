export class FetchTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = 'FetchTimeoutError';
  }
}

export class FetchAbortedError extends Error {
  constructor() {
    super('Request was cancelled by the caller');
    this.name = 'FetchAbortedError';
  }
}

/**
 * `fetch` with its own deadline. The deadline and the optional caller signal
 * cover the body as well: `read` runs inside them, and the timer is cleared
 * only once it has settled. The two cases surface as distinct error classes.
 */
export const fetchWithTimeout = async <T>(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  read: (response: Response) => Promise<T>,
  signal?: AbortSignal,
): Promise<T> => {
  if (signal?.aborted) {
    throw new FetchAbortedError();
  }

  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onCallerAbort = () => controller.abort();
  signal?.addEventListener('abort', onCallerAbort, { once: true });

  // A body stream does not always observe the signal, so both steps race it.
  const aborted = new Promise<never>((_resolve, reject) => {
    controller.signal.addEventListener(
      'abort',
      () => reject(timedOut ? new FetchTimeoutError(timeoutMs) : new FetchAbortedError()),
      { once: true },
    );
  });

  try {
    const response = await Promise.race([fetch(url, { ...init, signal: controller.signal }), aborted]);
    return await Promise.race([read(response), aborted]);
  } catch (error) {
    if (error instanceof FetchTimeoutError || error instanceof FetchAbortedError) {
      throw error;
    }
    if (error instanceof Error && error.name === 'AbortError') {
      throw timedOut ? new FetchTimeoutError(timeoutMs) : new FetchAbortedError();
    }
    throw error;
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener('abort', onCallerAbort);
  }
};
