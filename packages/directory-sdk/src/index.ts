/**
 * @mediaref/directory-sdk - TypeScript client for the resource directory
 *
 * @example
 * ```typescript
 * import { DirectoryClient } from '@mediaref/directory-sdk';
 *
 * const client = new DirectoryClient({ baseUrl: 'http://resource-server:9000' });
 * const { results } = await client.files.getUrls({ fileIds: ['file_a'] });
 * ```
 */

// Main client
export { DirectoryClient } from "./client.js";
// Errors
export {
  DirectoryAPIError,
  DirectoryFileUnavailableError,
  DirectoryNetworkError,
  DirectoryTimeoutError,
  DirectoryValidationError,
} from "./errors.js";
// HTTP client
export { HttpClient } from "./http/index.js";
// Resources
export { BaseResource } from "./resources/base.js";
export { FilesResource } from "./resources/files.js";
// Schemas
export { ClientConfigSchema, FileUrlInfoSchema, GetFileUrlsResponseSchema } from "./schemas.js";
export {
  type CallOptions,
  DEFAULT_URL_EXPIRES_IN,
  type FileUrlInfo,
  type GetFileUrlsParams,
  type GetFileUrlsResponse,
  MAX_FILE_URL_BATCH,
} from "./types/files.js";
export type { ClientConfig, ErrorResponse, RequestOptions, RetryOptions } from "./types/index.js";
