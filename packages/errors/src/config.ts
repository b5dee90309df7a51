import type { ZodError, ZodType, ZodTypeDef } from "zod";
import { ValidationError } from "./bases/validation-error.js";
import type { ValidationIssue } from "./types.js";

/**
 * Thrown when an options object fails schema validation at construction.
 */
export class ConfigValidationError extends ValidationError {
  /** Component whose options were rejected (e.g. "filler") */
  readonly component: string;

  constructor(component: string, issues: readonly ValidationIssue[], cause?: Error) {
    super({
      code: "CONFIG_INVALID",
      message: `Invalid ${component} configuration: ${issues
        .map((issue) => `${issue.field}: ${issue.message}`)
        .join("; ")}`,
      issues,
      cause,
    });
    this.component = component;
  }

  /**
   * Build from a Zod error, one issue per Zod issue.
   */
  static fromZodError(component: string, error: ZodError): ConfigValidationError {
    return new ConfigValidationError(
      component,
      error.issues.map((issue) => ({
        field: issue.path.length > 0 ? issue.path.join(".") : "(root)",
        message: issue.message,
        code: issue.code,
      })),
      error,
    );
  }
}

/**
 * Parse an options object against its schema.
 *
 * @throws ConfigValidationError listing every issue
 */
export function parseConfig<T>(
  component: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  value: unknown,
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw ConfigValidationError.fromZodError(component, result.error);
  }
  return result.data;
}
