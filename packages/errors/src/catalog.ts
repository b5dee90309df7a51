/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code used across the mediaref packages. Each code maps to an
 * HTTP status, a gRPC canonical code, and one of the behavioral base types.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: internal, validation, config, directory, fill, mapping
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType = "ValidationError" | "TimeoutError" | "ExternalError" | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - System failures and unknown errors
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    httpStatus: 500,
    grpcCode: "INTERNAL" as const,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },
  INTERNAL_UNAVAILABLE: {
    domain: "internal",
    httpStatus: 503,
    grpcCode: "UNAVAILABLE" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Service unavailable",
    description: "The service is temporarily unavailable",
  },
  INTERNAL_TIMEOUT: {
    domain: "internal",
    httpStatus: 504,
    grpcCode: "DEADLINE_EXCEEDED" as const,
    baseType: "TimeoutError" as const,
    isExpected: false,
    title: "Request timeout",
    description: "The operation exceeded the deadline",
  },

  // ============================================================================
  // VALIDATION ERRORS - Bad input
  // ============================================================================
  VALIDATION_FAILED: {
    domain: "validation",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Validation failed",
    description: "The request payload failed validation",
  },
  CONFIG_INVALID: {
    domain: "config",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid configuration",
    description: "The supplied options failed schema validation",
  },

  // ============================================================================
  // DIRECTORY ERRORS - Resource directory service
  // ============================================================================
  DIRECTORY_API_ERROR: {
    domain: "directory",
    httpStatus: 502,
    grpcCode: "UNAVAILABLE" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Resource directory error",
    description: "The resource directory returned an error response",
  },
  DIRECTORY_BATCH_TOO_LARGE: {
    domain: "directory",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Batch too large",
    description: "Too many file IDs were requested in a single call",
  },
  DIRECTORY_FILE_UNAVAILABLE: {
    domain: "directory",
    httpStatus: 404,
    grpcCode: "NOT_FOUND" as const,
    baseType: "ExternalError" as const,
    isExpected: true,
    title: "File URL unavailable",
    description: "The resource directory could not produce a URL for the file",
  },

  // ============================================================================
  // FILL ERRORS - Binding configuration and resolution passes
  // ============================================================================
  FILL_ABORTED: {
    domain: "fill",
    httpStatus: 499,
    grpcCode: "CANCELLED" as const,
    baseType: "TimeoutError" as const,
    isExpected: true,
    title: "Fill aborted",
    description: "The resolution pass was cancelled before it completed",
  },
  MEDIA_INVALID_MARKER_PATTERN: {
    domain: "fill",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid marker pattern",
    description: "A rich-text marker pattern must have exactly one capture group",
  },

  // ============================================================================
  // MAPPING ERRORS - Structural mapper plan derivation
  // ============================================================================
  MAPPING_CYCLE_DETECTED: {
    domain: "mapping",
    httpStatus: 500,
    grpcCode: "FAILED_PRECONDITION" as const,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Cyclic shape",
    description: "A shape pair refers back to itself during plan derivation",
  },
  MAPPING_DEPTH_EXCEEDED: {
    domain: "mapping",
    httpStatus: 500,
    grpcCode: "FAILED_PRECONDITION" as const,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Shape nesting too deep",
    description: "Plan derivation exceeded the configured maximum depth",
  },
  MAPPING_UNMAPPED_FIELD: {
    domain: "mapping",
    httpStatus: 500,
    grpcCode: "FAILED_PRECONDITION" as const,
    baseType: "ValidationError" as const,
    isExpected: false,
    title: "Unmapped destination field",
    description: "A destination field has no compatible source counterpart",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * gRPC canonical status codes used in the catalog
 */
export type GrpcStatusCode = ErrorCatalogEntry["grpcCode"];

/**
 * HTTP status codes used in the catalog
 */
export type HttpStatusCode = ErrorCatalogEntry["httpStatus"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
