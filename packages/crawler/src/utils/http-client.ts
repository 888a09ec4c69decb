import type { Logger } from "../logger.js";
import { fetchWithRetry } from "./fetch.js";

export type RequestOptions = {
  headers?: Record<string, string>;
  signal?: AbortSignal;
};

/**
 * Transport used by crawlers. Tests substitute a fixture-backed fake.
 */
export interface HttpClient {
  /** Response body decoded as UTF-8 */
  fetch(url: string, options?: RequestOptions): Promise<string>;
  /** Response body as bytes, for PDFs */
  fetchRaw(url: string, options?: RequestOptions): Promise<Uint8Array>;
}

export class NodeHttpClient implements HttpClient {
  constructor(
    private readonly config: { timeoutMs: number; retries: number; logger: Logger }
  ) {}

  async fetch(url: string, options: RequestOptions = {}): Promise<string> {
    const bytes = await this.fetchRaw(url, options);
    return new TextDecoder("utf-8").decode(bytes);
  }

  async fetchRaw(url: string, options: RequestOptions = {}): Promise<Uint8Array> {
    const started = Date.now();
    const result = await fetchWithRetry(url, {
      retries: this.config.retries,
      timeoutMs: this.config.timeoutMs,
      headers: options.headers,
      signal: options.signal,
      onRetry: (attempt, error) => {
        this.config.logger.warn("fetch attempt failed", { url, attempt, error: error.message });
      },
    });
    this.config.logger.debug("fetched", {
      url,
      status: result.statusCode,
      contentType: result.contentType,
      bytes: result.content.length,
      ms: Date.now() - started,
    });
    return new Uint8Array(result.content);
  }
}
