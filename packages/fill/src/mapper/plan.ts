import type { FieldKindName, Shape } from "../shape/index.js";

interface FieldStep {
  /** Destination key */
  readonly key: string;
  /** Source key the value is read from */
  readonly sourceKey: string;
}

/** Verbatim copy, converted to the destination kind */
export interface CopyAction extends FieldStep {
  readonly op: "copy";
  readonly target: FieldKindName;
}

/** Source identifier into a url field, replaced by its URL in pass 2 */
export interface LiftIdAction extends FieldStep {
  readonly op: "liftId";
}

/** Source identifiers into a urls field, position for position */
export interface LiftIdsAction extends FieldStep {
  readonly op: "liftIds";
}

/** Markup copied in pass 1, markers rewritten in pass 2 */
export interface RichTextAction extends FieldStep {
  readonly op: "richText";
}

export interface NestedAction extends FieldStep {
  readonly op: "list" | "map" | "record";
  readonly plan: TypeShapePlan;
}

export interface DynamicMapAction extends FieldStep {
  readonly op: "dynamicMap";
  readonly plan: DynamicPlan;
}

export type FieldAction =
  | CopyAction
  | LiftIdAction
  | LiftIdsAction
  | RichTextAction
  | NestedAction
  | DynamicMapAction;

/**
 * Per-field actions turning a source shape value into a destination shape
 * value. Derived once per shape pair and frozen.
 */
export interface TypeShapePlan {
  readonly source: Shape;
  readonly destination: Shape;
  readonly actions: readonly FieldAction[];
  /** Destination fields with no compatible source, nested ones as paths */
  readonly unmapped: readonly string[];
}

/** Destination kinds a schema-less payload can populate */
export type DynamicSinkKind = "string" | "richText" | "fileId" | "integer" | "number" | "boolean";

export interface DynamicSink {
  readonly key: string;
  /** Payload key: the field's external name, else its key */
  readonly externalName: string;
  readonly kind: DynamicSinkKind;
}

/**
 * Population of a destination shape from a schema-less payload
 */
export interface DynamicPlan {
  readonly destination: Shape;
  readonly sinks: readonly DynamicSink[];
  readonly unmapped: readonly string[];
}
