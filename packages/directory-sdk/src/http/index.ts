/**
 * HTTP client with retry, timeout, cancellation, and error handling
 */

import { parseConfig } from "@mediaref/errors";
import type { ZodType, ZodTypeDef } from "zod";
import { DirectoryAPIError, DirectoryNetworkError, DirectoryTimeoutError } from "../errors.js";
import { ClientConfigSchema, ErrorResponseSchema } from "../schemas.js";
import type { ClientConfig, ErrorResponse, RequestOptions, RetryOptions } from "../types/index.js";

/**
 * Default configuration values
 */
const DEFAULT_BASE_URL = "http://localhost:9000";
const DEFAULT_TIMEOUT = 10_000;
const DEFAULT_RETRY_OPTIONS: Required<RetryOptions> = {
  maxAttempts: 3,
  initialDelay: 200,
  maxDelay: 2_000,
  backoffMultiplier: 2,
  retryableStatusCodes: [408, 429, 500, 502, 503, 504],
};

/**
 * HTTP client for making requests to the resource directory
 */
export class HttpClient {
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly retryOptions: Required<RetryOptions>;
  private readonly defaultHeaders: Record<string, string>;

  constructor(config: ClientConfig) {
    const parsed = parseConfig("directory client", ClientConfigSchema, config);
    this.baseUrl = parsed.baseUrl ?? DEFAULT_BASE_URL;
    this.timeout = parsed.timeout ?? DEFAULT_TIMEOUT;
    this.retryOptions = {
      ...DEFAULT_RETRY_OPTIONS,
      ...parsed.retry,
    };

    this.defaultHeaders = {
      "Content-Type": "application/json",
      "User-Agent": "@mediaref/directory-sdk",
      ...(parsed.apiKey ? { Authorization: `Bearer ${parsed.apiKey}` } : {}),
      ...parsed.headers,
    };
  }

  /**
   * Create a new HttpClient with updated retry options
   */
  withRetry(options: RetryOptions): HttpClient {
    return new HttpClient({
      baseUrl: this.baseUrl,
      timeout: this.timeout,
      retry: { ...this.retryOptions, ...options },
      headers: this.defaultHeaders,
    });
  }

  /**
   * Create a new HttpClient with updated timeout
   */
  withTimeout(timeout: number): HttpClient {
    return new HttpClient({
      baseUrl: this.baseUrl,
      timeout,
      retry: this.retryOptions,
      headers: this.defaultHeaders,
    });
  }

  /**
   * Make an HTTP request with retry and timeout, validating the body
   * against `schema`.
   */
  async request<T>(
    path: string,
    options: RequestOptions,
    schema: ZodType<T, ZodTypeDef, unknown>,
  ): Promise<T> {
    const url = this.buildUrl(path, options.query);
    const headers = { ...this.defaultHeaders, ...options.headers };

    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= this.retryOptions.maxAttempts; attempt++) {
      try {
        options.signal?.throwIfAborted();

        const fetchOptions: RequestInit = {
          method: options.method,
          headers,
        };

        if (options.body !== undefined) {
          fetchOptions.body = JSON.stringify(options.body);
        }

        const response = await this.fetchWithTimeout(url, fetchOptions, options.signal);

        return await this.handleResponse(response, schema);
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        // The caller gave up: surface their abort reason, never retry
        if (options.signal?.aborted) {
          throw options.signal.reason;
        }

        if (
          error instanceof DirectoryAPIError &&
          !this.retryOptions.retryableStatusCodes.includes(error.statusCode)
        ) {
          throw error;
        }

        if (
          !(
            error instanceof DirectoryTimeoutError ||
            error instanceof DirectoryNetworkError ||
            error instanceof DirectoryAPIError
          )
        ) {
          throw error;
        }

        if (attempt === this.retryOptions.maxAttempts) {
          throw lastError;
        }

        const delay = Math.min(
          this.retryOptions.initialDelay * this.retryOptions.backoffMultiplier ** (attempt - 1),
          this.retryOptions.maxDelay,
        );

        await this.sleep(delay, options.signal);
      }
    }

    // Unreachable while maxAttempts >= 1
    throw lastError ?? new DirectoryNetworkError("Request failed after all retries");
  }

  /**
   * Build full URL with query parameters
   */
  private buildUrl(
    path: string,
    query?: Record<string, string | number | boolean | undefined>,
  ): string {
    const url = new URL(path, this.baseUrl);

    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      }
    }

    return url.toString();
  }

  /**
   * Fetch with timeout, linked to the caller's signal
   */
  private async fetchWithTimeout(
    url: string,
    init: RequestInit,
    signal: AbortSignal | undefined,
  ): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);
    const onExternalAbort = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    }
    signal?.addEventListener("abort", onExternalAbort, { once: true });

    try {
      return await fetch(url, {
        ...init,
        signal: controller.signal,
      });
    } catch (error) {
      if (signal?.aborted) {
        throw signal.reason;
      }

      if (error instanceof Error && error.name === "AbortError") {
        throw new DirectoryTimeoutError(`Request timeout after ${this.timeout}ms`, this.timeout);
      }

      const message = `Network error: ${error instanceof Error ? error.message : String(error)}`;
      throw error instanceof Error
        ? new DirectoryNetworkError(message, { cause: error })
        : new DirectoryNetworkError(message);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onExternalAbort);
    }
  }

  /**
   * Handle HTTP response
   */
  private async handleResponse<T>(
    response: Response,
    schema: ZodType<T, ZodTypeDef, unknown>,
  ): Promise<T> {
    if (response.ok) {
      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        throw new DirectoryAPIError("Failed to parse response JSON", response.status, undefined, {
          cause: error instanceof Error ? error : undefined,
        });
      }

      const parsed = schema.safeParse(body);
      if (!parsed.success) {
        throw new DirectoryAPIError(
          `Unexpected response shape: ${parsed.error.issues[0]?.message ?? "invalid"}`,
          response.status,
          undefined,
          { cause: parsed.error },
        );
      }
      return parsed.data;
    }

    let errorResponse: ErrorResponse | undefined;
    try {
      const parsed = ErrorResponseSchema.safeParse(await response.json());
      errorResponse = parsed.success ? parsed.data : undefined;
    } catch {
      // Non-JSON error bodies fall back to the status line
      errorResponse = undefined;
    }

    const message = errorResponse?.message ?? `HTTP ${response.status}: ${response.statusText}`;

    throw new DirectoryAPIError(message, response.status, errorResponse);
  }

  /**
   * Sleep for a given duration, rejecting with the abort reason if `signal`
   * fires first
   */
  private sleep(ms: number, signal: AbortSignal | undefined): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }
      const onAbort = () => {
        clearTimeout(timeoutId);
        reject(signal?.reason);
      };
      const timeoutId = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, ms);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
