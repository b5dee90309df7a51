import { MediaRefError } from "../base.js";
import {
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "../catalog.js";
import type { MediaRefErrorOptions } from "../types.js";

type InternalCode = CodesForBase<"InternalError">;

/**
 * Errors caused by bugs or broken invariants.
 * HTTP 500. The `.code` field discriminates the specific error.
 */
export class InternalError extends MediaRefError {
  readonly _tag = "InternalError" as const;
  override readonly code: InternalCode;
  override readonly httpStatus: HttpStatusCode;
  override readonly grpcCode: GrpcStatusCode;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  constructor(options: MediaRefErrorOptions<InternalCode>);
  constructor(message: string, metadata?: Record<string, string>, traceId?: string);
  constructor(
    messageOrOptions: string | MediaRefErrorOptions<InternalCode>,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    const opts: MediaRefErrorOptions<InternalCode> =
      typeof messageOrOptions === "string"
        ? { code: "INTERNAL_ERROR", message: messageOrOptions, metadata, traceId }
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
