/**
 * Option schemas for the filler and the directory resolver.
 * Both are validated at construction through parseConfig.
 */

import { DEFAULT_URL_EXPIRES_IN } from "@mediaref/directory-sdk";
import { z } from "zod";
import { isLogger, type Logger } from "./logging.js";
import { PlanRegistry } from "./mapper/registry.js";
import { isRichTextMarker, type RichTextMarker } from "./rich-text.js";

/**
 * What to do with destination fields the mapper cannot populate
 */
export const UnmappedPolicySchema = z.enum(["ignore", "warn", "error"]);

export type UnmappedPolicy = z.infer<typeof UnmappedPolicySchema>;

export const FillerConfigSchema = z
  .object({
    /** Plan cache shared across fills; one is created when absent */
    registry: z.instanceof(PlanRegistry).optional(),
    /** Nesting limit for the registry created when `registry` is absent */
    maxDepth: z.number().int().min(1).optional(),
    unmapped: UnmappedPolicySchema.default("ignore"),
    /** Wrap resolve calls in an OpenTelemetry span */
    tracing: z.boolean().default(true),
    logger: z
      .custom<Logger>(isLogger, { message: "Expected an object with a warn(message) method" })
      .optional(),
    /** Marker grammar used for richText fields of mapped shapes */
    marker: z
      .custom<RichTextMarker>(isRichTextMarker, { message: "Expected a marker from createMarker()" })
      .optional(),
  })
  .refine((config) => config.registry === undefined || config.maxDepth === undefined, {
    message: "maxDepth applies only to the default registry; set it on the PlanRegistry instead",
    path: ["maxDepth"],
  });

export type FillerConfig = z.input<typeof FillerConfigSchema>;

export const DirectoryResolverConfigSchema = z.object({
  /** Request variant URLs such as thumbnails */
  includeVariants: z.boolean().default(true),
  /** URL lifetime in seconds */
  expiresIn: z.number().int().positive().default(DEFAULT_URL_EXPIRES_IN),
});

export type DirectoryResolverConfig = z.input<typeof DirectoryResolverConfigSchema>;

export type ResolvedDirectoryResolverConfig = z.output<typeof DirectoryResolverConfigSchema>;
