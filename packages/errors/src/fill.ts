/**
 * Fill and mapping errors
 *
 *   - FillAbortedError           (FILL_ABORTED)
 *   - InvalidMarkerPatternError  (MEDIA_INVALID_MARKER_PATTERN)
 *   - MappingCycleError          (MAPPING_CYCLE_DETECTED)
 *   - MappingDepthExceededError  (MAPPING_DEPTH_EXCEEDED)
 *   - MappingUnmappedFieldError  (MAPPING_UNMAPPED_FIELD)
 *
 * Unresolved or failed identifiers are not errors:
 * they leave their destination untouched and never raise.
 */

import { InternalError } from "./bases/internal-error.js";
import { TimeoutError } from "./bases/timeout-error.js";
import { ValidationError } from "./bases/validation-error.js";

// ---------------------------------------------------------------------------
// Resolution pass
// ---------------------------------------------------------------------------

/**
 * Thrown when the caller's AbortSignal fires before the resolve completes.
 * No binding is filled.
 */
export class FillAbortedError extends TimeoutError {
  readonly idCount: number;

  constructor(idCount: number, cause?: Error) {
    super({
      code: "FILL_ABORTED",
      message: `Fill aborted while resolving ${idCount} identifier(s)`,
      cause,
    });
    this.idCount = idCount;
  }
}

/**
 * Thrown when a rich-text marker pattern does not expose exactly one
 * capture group.
 */
export class InvalidMarkerPatternError extends ValidationError {
  readonly pattern: string;
  readonly groupCount: number;

  constructor(pattern: string, groupCount: number) {
    super({
      code: "MEDIA_INVALID_MARKER_PATTERN",
      message: `Marker pattern /${pattern}/ must have exactly one capture group, found ${groupCount}`,
      issues: [
        {
          field: "pattern",
          message: "expected exactly one capture group",
          code: "capture_groups",
          value: groupCount,
        },
      ],
    });
    this.pattern = pattern;
    this.groupCount = groupCount;
  }
}

// ---------------------------------------------------------------------------
// Plan derivation
// ---------------------------------------------------------------------------

/**
 * Thrown when a (source, destination) shape pair is reached again while its
 * own plan is still being derived.
 */
export class MappingCycleError extends InternalError {
  /** Shape pairs from the outermost plan to the repeated one, "Source->Dest" */
  readonly path: readonly string[];

  constructor(path: readonly string[]) {
    super({
      code: "MAPPING_CYCLE_DETECTED",
      message: `Cyclic shape mapping: ${path.join(" > ")}`,
    });
    this.path = path;
  }
}

/**
 * Thrown when shape nesting goes deeper than the configured maximum.
 */
export class MappingDepthExceededError extends InternalError {
  readonly maxDepth: number;
  readonly path: readonly string[];

  constructor(maxDepth: number, path: readonly string[]) {
    super({
      code: "MAPPING_DEPTH_EXCEEDED",
      message: `Shape nesting exceeds maximum depth ${maxDepth}: ${path.join(" > ")}`,
    });
    this.maxDepth = maxDepth;
    this.path = path;
  }
}

/**
 * Thrown in strict mode when destination fields have no compatible source.
 */
export class MappingUnmappedFieldError extends ValidationError {
  readonly source: string;
  readonly destination: string;
  readonly fields: readonly string[];

  constructor(source: string, destination: string, fields: readonly string[]) {
    super({
      code: "MAPPING_UNMAPPED_FIELD",
      message: `${source} -> ${destination}: unmapped destination field(s) ${fields.join(", ")}`,
      issues: fields.map((field) => ({
        field,
        message: "no compatible source field",
        code: "unmapped",
      })),
    });
    this.source = source;
    this.destination = destination;
    this.fields = fields;
  }
}
