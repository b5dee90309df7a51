import { MediaRefError } from "../base.js";
import {
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "../catalog.js";
import type { MediaRefErrorOptions } from "../types.js";

type TimeoutCode = CodesForBase<"TimeoutError">;

/**
 * Errors caused by deadlines and cancellation.
 * HTTP 499/504. The `.code` field discriminates the specific error.
 */
export class TimeoutError extends MediaRefError {
  readonly _tag = "TimeoutError" as const;
  override readonly code: TimeoutCode;
  override readonly httpStatus: HttpStatusCode;
  override readonly grpcCode: GrpcStatusCode;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  constructor(options: MediaRefErrorOptions<TimeoutCode>);
  constructor(message: string, metadata?: Record<string, string>, traceId?: string);
  constructor(
    messageOrOptions: string | MediaRefErrorOptions<TimeoutCode>,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    const opts: MediaRefErrorOptions<TimeoutCode> =
      typeof messageOrOptions === "string"
        ? { code: "INTERNAL_TIMEOUT", message: messageOrOptions, metadata, traceId }
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
