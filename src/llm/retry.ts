import axios, { AxiosError, AxiosResponse } from "axios";

import { logger } from "../config/logger";

export type RetryPolicy = {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  exponentialBase: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 60000,
  exponentialBase: 2,
};

export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

// Axios errors without a response that come from the request itself, not the network.
const NON_TRANSPORT_CODES = new Set(["ERR_BAD_OPTION", "ERR_BAD_OPTION_VALUE", "ERR_INVALID_URL", "ERR_NOT_SUPPORT", "ERR_CANCELED"]);

export class HttpStatusError extends Error {
  public readonly status: number;
  public readonly body: string;

  constructor(status: number, body: string) {
    super(`Server returned ${status}`);
    this.name = "HttpStatusError";
    this.status = status;
    this.body = body;
  }
}

export type RetryOptions = {
  /** Decides whether a failure is worth another attempt. Defaults to isRetryableFailure. */
  isRetryable?: (err: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  /** Component name used in log lines. */
  label?: string;
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Delay before retry number `attempt` (0 = first retry). */
export function retryDelayMs(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.baseDelayMs * Math.pow(policy.exponentialBase, attempt), policy.maxDelayMs);
}

export function isTransportError(err: unknown): err is AxiosError {
  return err instanceof AxiosError && !err.response && !NON_TRANSPORT_CODES.has(String(err.code));
}

export function isRetryableFailure(err: unknown): boolean {
  if (err instanceof HttpStatusError) return RETRYABLE_STATUSES.has(err.status);
  return isTransportError(err);
}

function describeFailure(err: unknown): string {
  if (err instanceof AxiosError && err.code) return `${err.code}: ${err.message}`;
  return err instanceof Error ? err.message : String(err);
}

export async function withRetry<T>(
  operation: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: RetryOptions = {}
): Promise<T> {
  const isRetryable = options.isRetryable ?? isRetryableFailure;
  const wait = options.sleep ?? sleep;
  const label = options.label ?? "retry";
  const maxAttempts = Math.max(0, Math.floor(policy.maxRetries)) + 1;

  let lastErr: unknown = null;

  for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
    try {
      return await operation();
    } catch (err) {
      if (!isRetryable(err)) throw err;
      lastErr = err;

      if (attempt < maxAttempts - 1) {
        const delayMs = retryDelayMs(attempt, policy);
        logger.warn(label, `Attempt ${attempt + 1}/${maxAttempts} failed: ${describeFailure(err)}. Retrying in ${(delayMs / 1000).toFixed(2)} seconds...`);
        await wait(delayMs);
        continue;
      }

      logger.error(label, `All ${maxAttempts} attempts failed. Last error: ${describeFailure(err)}`);
    }
  }

  throw lastErr;
}

export type PostJsonOptions = {
  headers: Record<string, string>;
  timeoutMs: number;
  policy?: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
};

export function responseBodyText(data: unknown): string {
  if (typeof data === "string") return data;
  try {
    return JSON.stringify(data) ?? "";
  } catch {
    return String(data);
  }
}

/**
 * POSTs JSON with retries. Statuses in RETRYABLE_STATUSES become
 * HttpStatusError (retried, then thrown); every other response is returned.
 */
export async function postJsonWithRetry(url: string, body: unknown, options: PostJsonOptions): Promise<AxiosResponse<unknown>> {
  return withRetry(
    async () => {
      const response = await axios.post<unknown>(url, body, {
        headers: options.headers,
        timeout: options.timeoutMs,
        validateStatus: () => true,
      });
      if (RETRYABLE_STATUSES.has(response.status)) {
        logger.warn("http", `Received status code ${response.status}, will retry`);
        throw new HttpStatusError(response.status, responseBodyText(response.data));
      }
      return response;
    },
    options.policy,
    { sleep: options.sleep, label: "http" }
  );
}
