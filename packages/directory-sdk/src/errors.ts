/**
 * SDK-specific error classes extending @mediaref/errors
 */

import {
  ERROR_CATALOG,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
  MediaRefError,
} from "@mediaref/errors";
import type { ErrorResponse } from "./types/index.js";

/**
 * Error for API-level failures (4xx, 5xx responses or unreadable bodies)
 */
export class DirectoryAPIError extends MediaRefError {
  readonly _tag = "DirectoryAPIError" as const;
  readonly code: ErrorCode = "DIRECTORY_API_ERROR";
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.DIRECTORY_API_ERROR.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.DIRECTORY_API_ERROR.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.DIRECTORY_API_ERROR.domain;

  /**
   * HTTP status code from the API response
   */
  public readonly statusCode: number;

  /**
   * Error response from the API
   */
  public readonly response?: ErrorResponse;

  constructor(
    message: string,
    statusCode: number,
    response: ErrorResponse | undefined,
    options?: ErrorOptions,
  ) {
    super(message, undefined, undefined, options);
    this.statusCode = statusCode;
    if (response !== undefined) {
      this.response = response;
    }
  }
}

/**
 * Error for request timeouts
 */
export class DirectoryTimeoutError extends MediaRefError {
  readonly _tag = "DirectoryTimeoutError" as const;
  readonly code: ErrorCode = "INTERNAL_TIMEOUT";
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.INTERNAL_TIMEOUT.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.INTERNAL_TIMEOUT.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.INTERNAL_TIMEOUT.domain;

  /**
   * Timeout duration in milliseconds
   */
  public readonly timeout: number;

  constructor(message: string, timeout: number, options?: ErrorOptions) {
    super(message, undefined, undefined, options);
    this.timeout = timeout;
  }
}

/**
 * Error for network-level failures (connection refused, DNS, etc.)
 */
export class DirectoryNetworkError extends MediaRefError {
  readonly _tag = "DirectoryNetworkError" as const;
  readonly code: ErrorCode = "INTERNAL_UNAVAILABLE";
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.INTERNAL_UNAVAILABLE.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.INTERNAL_UNAVAILABLE.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.INTERNAL_UNAVAILABLE.domain;

  constructor(message: string, options?: ErrorOptions) {
    super(message, undefined, undefined, options);
  }
}

/**
 * Error for client-side validation failures (checked before any request)
 */
export class DirectoryValidationError extends MediaRefError {
  readonly _tag = "DirectoryValidationError" as const;
  readonly code: ErrorCode = "DIRECTORY_BATCH_TOO_LARGE";
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.DIRECTORY_BATCH_TOO_LARGE.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.DIRECTORY_BATCH_TOO_LARGE.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.DIRECTORY_BATCH_TOO_LARGE.domain;
  override readonly isExpected = true;

  /**
   * Field that failed validation
   */
  public readonly field?: string;

  constructor(message: string, field: string | undefined, options?: ErrorOptions) {
    super(message, undefined, undefined, options);
    if (field !== undefined) {
      this.field = field;
    }
  }
}

/**
 * Error for a single file the directory could not produce a URL for
 */
export class DirectoryFileUnavailableError extends MediaRefError {
  readonly _tag = "DirectoryFileUnavailableError" as const;
  readonly code: ErrorCode = "DIRECTORY_FILE_UNAVAILABLE";
  readonly httpStatus: HttpStatusCode = ERROR_CATALOG.DIRECTORY_FILE_UNAVAILABLE.httpStatus;
  readonly grpcCode: GrpcStatusCode = ERROR_CATALOG.DIRECTORY_FILE_UNAVAILABLE.grpcCode;
  readonly domain: ErrorDomain = ERROR_CATALOG.DIRECTORY_FILE_UNAVAILABLE.domain;
  override readonly isExpected = true;

  public readonly fileId: string;

  constructor(fileId: string, reason: string) {
    super(`File URL unavailable for ${fileId}: ${reason}`);
    this.fileId = fileId;
  }
}
