import pRetry, { AbortError } from "p-retry";
import { HttpStatusError } from "../errors.js";

export type FetchResult = {
  content: Buffer;
  contentType: string;
  lastModified?: string;
  statusCode: number;
};

export type FetchOptions = {
  retries?: number;
  timeoutMs?: number;
  headers?: Record<string, string>;
  /** Aborts the request and any pending retry */
  signal?: AbortSignal;
  /** Delay before the first retry, doubled for each further one */
  retryDelayMs?: number;
  onRetry?: (attempt: number, error: Error) => void;
};

function randomInt(min: number, max: number): number {
  return min + Math.floor(Math.random() * (max - min + 1));
}

/**
 * Chrome-like User-Agent with a Sec-Ch-Ua of the same major version.
 * Some lenders reject requests whose two headers disagree.
 */
export function randomBrowserHeaders(): Record<string, string> {
  const major = randomInt(120, 144);
  const platform =
    Math.random() < 0.5
      ? "Windows NT 10.0; Win64; x64"
      : `Macintosh; Intel Mac OS X ${randomInt(13, 15)}_${randomInt(0, 9)}_${randomInt(0, 9)}`;

  return {
    "User-Agent": `Mozilla/5.0 (${platform}) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/${major}.0.${randomInt(0, 9)}.${randomInt(0, 999)} Safari/537.36`,
    "Sec-Ch-Ua": `"Chromium";v="${major}", "Google Chrome";v="${major}", "Not_A Brand";v="99"`,
  };
}

export function defaultHeaders(): Record<string, string> {
  return {
    Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,application/json;q=0.9,*/*;q=0.8",
    "Accept-Language": "sv-SE,sv;q=0.9,en-US;q=0.8,en;q=0.7",
    "Cache-Control": "no-cache",
    ...randomBrowserHeaders(),
  };
}

/**
 * Fetches a URL with a per-attempt timeout and optional retries.
 *
 * Redirects are not followed. Non-2xx responses raise HttpStatusError; only
 * 5xx and network failures are retried.
 */
export async function fetchWithRetry(url: string, options: FetchOptions = {}): Promise<FetchResult> {
  const {
    retries = 0,
    timeoutMs = 30000,
    headers = {},
    signal,
    retryDelayMs = 1000,
    onRetry,
  } = options;

  return pRetry(
    async () => {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
      const forwardAbort = () => controller.abort();
      signal?.addEventListener("abort", forwardAbort, { once: true });

      try {
        if (signal?.aborted) {
          throw new AbortError("request aborted");
        }

        const response = await fetch(url, {
          signal: controller.signal,
          redirect: "manual",
          headers: { ...defaultHeaders(), ...headers },
        });

        if (!response.ok) {
          const error = new HttpStatusError(url, response.status, response.statusText);
          throw response.status >= 500 ? error : new AbortError(error);
        }

        return {
          content: Buffer.from(await response.arrayBuffer()),
          contentType: response.headers.get("content-type") || "unknown",
          lastModified: response.headers.get("last-modified") || undefined,
          statusCode: response.status,
        };
      } finally {
        clearTimeout(timeoutId);
        signal?.removeEventListener("abort", forwardAbort);
      }
    },
    {
      retries,
      minTimeout: retryDelayMs,
      signal,
      onFailedAttempt: (error) => {
        onRetry?.(error.attemptNumber, error);
      },
    }
  );
}
