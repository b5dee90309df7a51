import type { ErrorCode, ErrorDomain, GrpcStatusCode, HttpStatusCode } from "./catalog.js";

/**
 * Plain-object form of a MediaRefError, suitable for logs and wire payloads.
 */
export interface ErrorJSON {
  _tag: string;
  name: string;
  code: ErrorCode;
  message: string;
  httpStatus: HttpStatusCode;
  grpcCode: GrpcStatusCode;
  domain: ErrorDomain;
  isExpected: boolean;
  timestamp: string;
  traceId?: string | undefined;
  metadata?: Record<string, string> | undefined;
}

/**
 * Abstract root of every error thrown by the mediaref packages.
 *
 * Concrete classes pin `code` to a catalog entry and copy its HTTP status,
 * gRPC code, domain and expectedness. Match with `error.code === "..."`
 * for a precise condition or `instanceof` for a category.
 */
export abstract class MediaRefError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: ErrorCode;
  abstract readonly httpStatus: HttpStatusCode;
  abstract readonly grpcCode: GrpcStatusCode;
  abstract readonly domain: ErrorDomain;
  readonly isExpected: boolean = false;

  readonly metadata: Record<string, string> | undefined;
  readonly traceId: string | undefined;
  readonly timestamp: Date;

  constructor(
    message: string,
    metadata?: Record<string, string>,
    traceId?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
    this.metadata = metadata;
    this.traceId = traceId;
    this.timestamp = new Date();
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      httpStatus: this.httpStatus,
      grpcCode: this.grpcCode,
      domain: this.domain,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      traceId: this.traceId,
      metadata: this.metadata,
    };
  }
}
