import type { ErrorCode } from "./catalog.js";

/**
 * One rejected field of a validated input
 */
export interface ValidationIssue {
  field: string;
  message: string;
  code: string;
  value?: unknown;
}

/**
 * Constructor options shared by the base error types. The catalog entry for
 * `code` supplies the status codes, domain and expectedness.
 */
export interface MediaRefErrorOptions<C extends ErrorCode> {
  code: C;
  message: string;
  metadata?: Record<string, string> | undefined;
  traceId?: string | undefined;
  cause?: Error | undefined;
}
