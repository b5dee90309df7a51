/**
 * File URL types for the resource directory
 */

/**
 * URL information for one file, as returned by the directory
 */
export interface FileUrlInfo {
  /** Time-limited delivery URL of the original file */
  readonly url: string;
  /** Variant name (e.g. "thumbnail_200x200") to variant URL */
  readonly variantUrls: Readonly<Record<string, string>>;
  /** Whether the directory could produce a URL for this file */
  readonly success: boolean;
  /** Failure reason when success is false */
  readonly error: string;
}

/**
 * Parameters for a batch URL lookup
 */
export interface GetFileUrlsParams {
  /** File IDs to look up (at most MAX_FILE_URL_BATCH) */
  readonly fileIds: readonly string[];
  /** Include variant URLs such as thumbnails */
  readonly includeVariants?: boolean;
  /** URL lifetime in seconds */
  readonly expiresIn?: number;
}

/**
 * Batch URL lookup response, keyed by file ID
 */
export interface GetFileUrlsResponse {
  readonly results: Readonly<Record<string, FileUrlInfo>>;
}

/**
 * Per-call options
 */
export interface CallOptions {
  readonly signal?: AbortSignal | undefined;
}

/** Largest batch the directory accepts in a single getUrls call */
export const MAX_FILE_URL_BATCH = 100;

/** Default URL lifetime in seconds */
export const DEFAULT_URL_EXPIRES_IN = 3600;
