import { MediaRefError } from "../base.js";
import {
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "../catalog.js";
import type { MediaRefErrorOptions } from "../types.js";

type ExternalCode = CodesForBase<"ExternalError">;

/**
 * Errors caused by runtime failures in external dependencies.
 * HTTP 500/502/503. The `.code` field discriminates the specific error.
 */
export class ExternalError extends MediaRefError {
  readonly _tag = "ExternalError" as const;
  override readonly code: ExternalCode;
  override readonly httpStatus: HttpStatusCode;
  override readonly grpcCode: GrpcStatusCode;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  constructor(options: MediaRefErrorOptions<ExternalCode>);
  constructor(message: string, metadata?: Record<string, string>, traceId?: string);
  constructor(
    messageOrOptions: string | MediaRefErrorOptions<ExternalCode>,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    const opts: MediaRefErrorOptions<ExternalCode> =
      typeof messageOrOptions === "string"
        ? { code: "INTERNAL_UNAVAILABLE", message: messageOrOptions, metadata, traceId }
        : messageOrOptions;
    super(
      opts.message,
      opts.metadata,
      opts.traceId,
      opts.cause ? { cause: opts.cause } : undefined,
    );
    const entry = ERROR_CATALOG[opts.code];
    this.code = opts.code;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
