/**
 * @mediaref/errors
 *
 * Shared error taxonomy for the media reference resolution packages.
 *
 * The error system is built on 4 behavioral base types:
 * ValidationError, TimeoutError, ExternalError, InternalError
 *
 * Each error carries a `.code` from the catalog that discriminates
 * the specific error condition. Use `error.code === "XXX"` for
 * fine-grained matching, or `instanceof BaseType` for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, MediaRefError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export { ExternalError, InternalError, TimeoutError, ValidationError } from "./bases/index.js";

// ============================================================================
// TYPE INFRASTRUCTURE
// ============================================================================

export type { MediaRefErrorOptions, ValidationIssue } from "./types.js";

// ============================================================================
// DOMAIN ERRORS
// ============================================================================

export { ConfigValidationError, parseConfig } from "./config.js";
export {
  FillAbortedError,
  InvalidMarkerPatternError,
  MappingCycleError,
  MappingDepthExceededError,
  MappingUnmappedFieldError,
} from "./fill.js";
