/**
 * Common types and interfaces for @mediaref/directory-sdk
 */

/**
 * Configuration options for DirectoryClient
 */
export interface ClientConfig {
  /**
   * API key for authentication
   */
  apiKey?: string;

  /**
   * Base URL of the resource directory service
   * @default "http://localhost:9000"
   */
  baseUrl?: string;

  /**
   * Request timeout in milliseconds
   * @default 10000
   */
  timeout?: number;

  /**
   * Retry configuration
   */
  retry?: RetryOptions;

  /**
   * Custom headers to include with every request
   */
  headers?: Record<string, string>;
}

/**
 * Retry options for failed requests
 */
export interface RetryOptions {
  /**
   * Maximum number of attempts, including the first
   * @default 3
   */
  maxAttempts?: number;

  /**
   * Initial delay in milliseconds before first retry
   * @default 200
   */
  initialDelay?: number;

  /**
   * Maximum delay in milliseconds between retries
   * @default 2000
   */
  maxDelay?: number;

  /**
   * Backoff multiplier for exponential backoff
   * @default 2
   */
  backoffMultiplier?: number;

  /**
   * HTTP status codes that should trigger a retry
   * @default [408, 429, 500, 502, 503, 504]
   */
  retryableStatusCodes?: number[];
}

/**
 * HTTP request options
 */
export interface RequestOptions {
  /**
   * HTTP method
   */
  method: "GET" | "POST";

  /**
   * Request body (will be JSON serialized)
   */
  body?: unknown;

  /**
   * Additional headers for this request
   */
  headers?: Record<string, string>;

  /**
   * Query parameters
   */
  query?: Record<string, string | number | boolean | undefined>;

  /**
   * Caller cancellation; aborting stops the request and any further retries
   */
  signal?: AbortSignal | undefined;
}

/**
 * API error response
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: Record<string, unknown> | undefined;
}
