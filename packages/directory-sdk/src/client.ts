/**
 * Main resource directory client
 */

import { HttpClient } from "./http/index.js";
import { FilesResource } from "./resources/files.js";
import type { ClientConfig, RetryOptions } from "./types/index.js";

/**
 * Resource directory API client
 *
 * Provides access to the directory's resources with built-in retry,
 * timeout, and error handling.
 *
 * @example
 * ```typescript
 * const client = new DirectoryClient({
 *   apiKey: process.env.DIRECTORY_API_KEY,
 *   baseUrl: 'http://resource-server:9000',
 * });
 *
 * const url = await client.files.getUrl('file_abc');
 * ```
 */
export class DirectoryClient {
  /**
   * Original config for creating new instances
   */
  private readonly _config: ClientConfig;

  /**
   * Files resource (delivery URLs)
   */
  public readonly files: FilesResource;

  constructor(config: ClientConfig) {
    this._config = config;
    this.files = new FilesResource(new HttpClient(config));
  }

  /**
   * Create a new client with updated retry options
   *
   * Returns a new instance — the original client is not modified.
   */
  withRetry(options: RetryOptions): DirectoryClient {
    return new DirectoryClient({
      ...this._config,
      retry: { ...this._config.retry, ...options },
    });
  }

  /**
   * Create a new client with updated timeout
   *
   * Returns a new instance — the original client is not modified.
   */
  withTimeout(ms: number): DirectoryClient {
    return new DirectoryClient({
      ...this._config,
      timeout: ms,
    });
  }
}
