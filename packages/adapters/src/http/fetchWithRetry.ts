// ═════════════════════════════════════════════════════════════
// @edgeline/adapters — HTTP with timeout and retry
//
// - Short timeout per attempt (default 5s)
// - Opt-in retry (default 0) with exponential backoff
// - Retries network errors, timeouts, 429 and 5xx; never other 4xx
// - A caller AbortSignal stops the request and any pending retry
// ═════════════════════════════════════════════════════════════

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface RetryOptions {
  readonly timeoutMs?: number;
  readonly maxRetries?: number;
  readonly backoffMs?: number;
  /** Caller cancellation */
  readonly signal?: AbortSignal;
  readonly fetchImpl?: FetchLike;
}

// ─── Constants ──────────────────────────────────────────────

const DEFAULT_TIMEOUT_MS = 5_000;
const DEFAULT_MAX_RETRIES = 0;
const DEFAULT_BACKOFF_MS = 500;

// ─── Errors ─────────────────────────────────────────────────

/**
 * Failed HTTP exchange. `status` is set when the server answered.
 */
export class HttpError extends Error {
  constructor(
    message: string,
    public readonly status: number | null,
    public readonly timedOut: boolean = false
  ) {
    super(message);
    this.name = "HttpError";
  }
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new HttpError("request cancelled by caller", null));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new HttpError("request cancelled by caller", null));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

// ─── Main function ──────────────────────────────────────────

/**
 * Runs a fetch with a per-attempt timeout and bounded retries.
 *
 * @returns the first response with a non-retryable status (ok or 4xx)
 * @throws HttpError after the last failed attempt or on caller abort
 */
export async function fetchWithRetry(
  url: string,
  init: RequestInit = {},
  options: RetryOptions = {}
): Promise<Response> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  const backoffMs = options.backoffMs ?? DEFAULT_BACKOFF_MS;
  const doFetch: FetchLike = options.fetchImpl ?? ((input, requestInit) => fetch(input, requestInit));
  const callerSignal = options.signal;

  let lastError: HttpError | null = null;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (attempt > 0) {
      await delay(backoffMs * Math.pow(2, attempt - 1), callerSignal);
    }
    if (callerSignal?.aborted) {
      throw new HttpError("request cancelled by caller", null);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const onCallerAbort = () => controller.abort();
    callerSignal?.addEventListener("abort", onCallerAbort, { once: true });

    try {
      const response = await doFetch(url, { ...init, signal: controller.signal });

      if (isRetryableStatus(response.status)) {
        lastError = new HttpError(
          `HTTP ${response.status} from ${url} (attempt ${attempt + 1}/${maxRetries + 1})`,
          response.status
        );
        await response.body?.cancel();
        continue;
      }
      return response;
    } catch (error: unknown) {
      if (callerSignal?.aborted) {
        throw new HttpError("request cancelled by caller", null);
      }
      if (isAbortError(error)) {
        lastError = new HttpError(
          `Timeout after ${timeoutMs}ms from ${url} (attempt ${attempt + 1}/${maxRetries + 1})`,
          null,
          true
        );
      } else {
        const message = error instanceof Error ? error.message : String(error);
        lastError = new HttpError(`Network error from ${url}: ${message}`, null);
      }
    } finally {
      clearTimeout(timeoutId);
      callerSignal?.removeEventListener("abort", onCallerAbort);
    }
  }

  throw lastError ?? new HttpError(`Request to ${url} failed`, null);
}

/**
 * Reads a JSON body, mapping a parse failure to HttpError.
 */
export async function readJson(response: Response, url: string): Promise<unknown> {
  try {
    const body: unknown = await response.json();
    return body;
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new HttpError(`Invalid JSON from ${url}: ${message}`, response.status);
  }
}
