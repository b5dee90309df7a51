import { MediaRefError } from "../base.js";
import {
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "../catalog.js";
import type { MediaRefErrorOptions, ValidationIssue } from "../types.js";

type ValidationCode = CodesForBase<"ValidationError">;

type ValidationErrorOptions = MediaRefErrorOptions<ValidationCode> & {
  issues?: readonly ValidationIssue[] | undefined;
};

/**
 * Errors caused by invalid input, configuration, or request data.
 * HTTP 400-class. The `.code` field discriminates the specific error.
 */
export class ValidationError extends MediaRefError {
  readonly _tag = "ValidationError" as const;
  override readonly code: ValidationCode;
  override readonly httpStatus: HttpStatusCode;
  override readonly grpcCode: GrpcStatusCode;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  /** Structured validation issues */
  readonly issues: readonly ValidationIssue[];

  constructor(options: ValidationErrorOptions);
  constructor(
    message: string,
    issues?: readonly ValidationIssue[],
    metadata?: Record<string, string>,
    traceId?: string,
  );
  constructor(
    messageOrOptions: string | ValidationErrorOptions,
    issues?: readonly ValidationIssue[],
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    const opts: ValidationErrorOptions =
      typeof messageOrOptions === "string"
        ? { code: "VALIDATION_FAILED", message: messageOrOptions, issues, metadata, traceId }
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
    this.issues = opts.issues ?? [];
  }
}
