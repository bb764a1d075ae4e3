import { logger } from '../../utils/logger.js';
import { sleep } from '../../utils/async.js';
import { FetchError, FetchResult, fail, ok } from '../../types/index.js';

/**
 * Cache for decoded response bodies. `get` resolves to null on a miss.
 */
export interface ResponseCache {
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown, ttlSeconds?: number): Promise<void>;
}

export interface ProviderClientOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  cache?: ResponseCache;
}

export interface GetJsonOptions {
  query?: Record<string, string | number>;
  headers?: Record<string, string>;
  cacheKey?: string;
  cacheTtlSec?: number;
}

function isRetryable(error: FetchError): boolean {
  if (error.kind === 'timeout' || error.kind === 'network') {
    return true;
  }
  return error.kind === 'http' && (error.status === 429 || (error.status ?? 0) >= 500);
}

/**
 * Base for upstream REST clients. Every request is bounded by a timeout,
 * retried with exponential backoff on transient failures, and resolves to a
 * FetchResult: callers never see a rejected promise.
 */
export abstract class ProviderClient {
  protected apiKey: string;
  protected baseUrl: string;
  protected timeoutMs: number;
  protected maxRetries: number;
  protected retryDelayMs: number;
  protected cache?: ResponseCache;

  protected abstract readonly name: string;

  constructor(options: ProviderClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.maxRetries = options.maxRetries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.cache = options.cache;
  }

  /**
   * Check if the client is properly configured
   */
  isConfigured(): boolean {
    return !!this.apiKey;
  }

  protected async getJson(path: string, options: GetJsonOptions = {}): Promise<FetchResult<unknown>> {
    if (!this.isConfigured()) {
      return fail('not-configured', `${this.name} API key is not configured`);
    }

    const cached = await this.readCache(options.cacheKey);
    if (cached !== null) {
      return ok(cached);
    }

    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      url.searchParams.set(key, String(value));
    }

    const result = await this.withRetry(() => this.request(url, options.headers), path);

    if (result.ok && options.cacheKey) {
      await this.writeCache(options.cacheKey, result.value, options.cacheTtlSec);
    }

    return result;
  }

  private async request(url: URL, headers?: Record<string, string>): Promise<FetchResult<unknown>> {
    let response: Response;
    try {
      response = await fetch(url, {
        headers: { accept: 'application/json', ...headers },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        return fail('timeout', `request timed out after ${this.timeoutMs}ms`);
      }
      return fail('network', error instanceof Error ? error.message : String(error));
    }

    if (!response.ok) {
      return fail('http', `${this.name} API error: ${response.status} ${response.statusText}`, response.status);
    }

    try {
      return ok((await response.json()) as unknown);
    } catch (error) {
      return fail('malformed', `invalid JSON body: ${(error as Error).message}`);
    }
  }

  /**
   * Execute a request with exponential backoff retry logic
   */
  private async withRetry(
    operation: () => Promise<FetchResult<unknown>>,
    operationName: string
  ): Promise<FetchResult<unknown>> {
    const attempts = this.maxRetries + 1;
    let result = await operation();

    for (let attempt = 1; !result.ok && attempt < attempts && isRetryable(result.error); attempt++) {
      const delay = this.retryDelayMs * Math.pow(2, attempt - 1);

      logger.warn(`${this.name} ${operationName} failed (attempt ${attempt}/${attempts})`, {
        error: result.error.message,
        nextRetryIn: `${delay}ms`,
      });

      await sleep(delay);
      result = await operation();
    }

    if (!result.ok) {
      logger.warn(`${this.name} ${operationName} gave up`, {
        kind: result.error.kind,
        error: result.error.message,
      });
    }

    return result;
  }

  private async readCache(key?: string): Promise<unknown> {
    if (!this.cache || !key) {
      return null;
    }
    try {
      return (await this.cache.get(key)) ?? null;
    } catch (error) {
      logger.warn('Provider cache read failed', { key, error: (error as Error).message });
      return null;
    }
  }

  private async writeCache(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    if (!this.cache) {
      return;
    }
    try {
      await this.cache.set(key, value, ttlSeconds);
    } catch (error) {
      logger.warn('Provider cache write failed', { key, error: (error as Error).message });
    }
  }
}

export default ProviderClient;
