export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface RequestPolicy {
  timeoutMs: number;
  /** Extra attempts after the first, spent only on transient failures. */
  retries: number;
}

/** Consumes the response while the attempt's timeout and cancellation still apply. */
export type ReadResponse<T> = (response: Response) => Promise<T>;

const isTransientStatus = (status: number) => status === 429 || status >= 500;

/**
 * Issues a request with a hard timeout and a small retry budget. The timeout
 * covers the body as well as the headers: `read` runs inside the attempt. A
 * caller supplied signal cancels the in-flight attempt and is never retried.
 * Errors thrown by `read` itself are not retried.
 */
export async function fetchWithRetry<T>(
  fetchImpl: FetchLike,
  url: string,
  init: RequestInit,
  policy: RequestPolicy,
  read: ReadResponse<T>,
  signal?: AbortSignal
): Promise<T> {
  let lastError: unknown = new Error(`Request to ${url} was not attempted`);

  for (let attempt = 0; attempt <= policy.retries; attempt += 1) {
    signal?.throwIfAborted();
    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new Error(`Request timed out after ${policy.timeoutMs}ms`)),
      policy.timeoutMs
    );
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });
    let reading = false;

    try {
      const response = await fetchImpl(url, { ...init, signal: controller.signal });
      if (isTransientStatus(response.status) && attempt < policy.retries) {
        await response.body?.cancel();
        lastError = new Error(`HTTP ${response.status}`);
        continue;
      }
      reading = true;
      return await read(response);
    } catch (error) {
      const rejectedByReader = reading && !controller.signal.aborted;
      if (signal?.aborted || rejectedByReader || attempt >= policy.retries) {
        throw error;
      }
      lastError = error;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  throw lastError;
}
