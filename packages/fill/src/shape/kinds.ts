/**
 * Field kinds of a shape descriptor.
 *
 * Every kind carries an optional external `name`, the key used when the
 * field is matched against a schema-less payload.
 */

import type { Shape } from "./shape.js";

export interface FieldOptions {
  /** External name used when matching dynamic payloads */
  readonly name?: string | undefined;
}

interface BaseField<K extends string> {
  readonly kind: K;
  readonly name: string | undefined;
}

/** A shape, or a thunk returning one for self-referencing shapes */
export type ShapeRef<S extends Shape = Shape> = S | (() => S);

export type StringField = BaseField<"string">;
export type NumberField = BaseField<"number">;
export type IntegerField = BaseField<"integer">;
export type BooleanField = BaseField<"boolean">;
/** Opaque value copied verbatim, such as a Date */
export type ScalarField = BaseField<"scalar">;
/** Content identifier; round-trips unchanged */
export type FileIdField = BaseField<"fileId">;
export type FileIdsField = BaseField<"fileIds">;
export type StringsField = BaseField<"strings">;
/** Markup whose markers are rewritten with resolved URLs */
export type RichTextField = BaseField<"richText">;
/** Key to schema-less payload; only meaningful on source shapes */
export type DynamicMapField = BaseField<"dynamicMap">;

/** Resolved URL of the identifier held by source field `from` */
export interface UrlField extends BaseField<"url"> {
  readonly from: string | undefined;
}

/** Resolved URLs of the identifiers held by source field `from` */
export interface UrlsField extends BaseField<"urls"> {
  readonly from: string | undefined;
}

export interface ListField<S extends Shape = Shape> extends BaseField<"list"> {
  readonly shape: ShapeRef<S>;
}

export interface MapField<S extends Shape = Shape> extends BaseField<"map"> {
  readonly shape: ShapeRef<S>;
}

export interface RecordField<S extends Shape = Shape> extends BaseField<"record"> {
  readonly shape: ShapeRef<S>;
}

export type FieldKind =
  | StringField
  | NumberField
  | IntegerField
  | BooleanField
  | ScalarField
  | FileIdField
  | FileIdsField
  | StringsField
  | RichTextField
  | DynamicMapField
  | UrlField
  | UrlsField
  | ListField
  | MapField
  | RecordField;

export type FieldKindName = FieldKind["kind"];

function leaf<K extends string>(kind: K, options: FieldOptions): BaseField<K> {
  return Object.freeze({ kind, name: options.name });
}

/**
 * Field kind builders.
 *
 * @example
 * ```typescript
 * const Post = defineShape("Post", {
 *   title: kind.string(),
 *   coverId: kind.fileId(),
 *   coverUrl: kind.url("coverId"),
 *   body: kind.richText(),
 *   tags: kind.strings(),
 * });
 * ```
 */
export const kind = {
  string: (options: FieldOptions = {}): StringField => leaf("string", options),
  number: (options: FieldOptions = {}): NumberField => leaf("number", options),
  integer: (options: FieldOptions = {}): IntegerField => leaf("integer", options),
  boolean: (options: FieldOptions = {}): BooleanField => leaf("boolean", options),
  scalar: (options: FieldOptions = {}): ScalarField => leaf("scalar", options),
  fileId: (options: FieldOptions = {}): FileIdField => leaf("fileId", options),
  fileIds: (options: FieldOptions = {}): FileIdsField => leaf("fileIds", options),
  strings: (options: FieldOptions = {}): StringsField => leaf("strings", options),
  richText: (options: FieldOptions = {}): RichTextField => leaf("richText", options),
  dynamicMap: (options: FieldOptions = {}): DynamicMapField => leaf("dynamicMap", options),

  url: (from?: string, options: FieldOptions = {}): UrlField =>
    Object.freeze({ kind: "url", name: options.name, from }),
  urls: (from?: string, options: FieldOptions = {}): UrlsField =>
    Object.freeze({ kind: "urls", name: options.name, from }),

  list: <S extends Shape>(shape: ShapeRef<S>, options: FieldOptions = {}): ListField<S> =>
    Object.freeze({ kind: "list", name: options.name, shape }),
  map: <S extends Shape>(shape: ShapeRef<S>, options: FieldOptions = {}): MapField<S> =>
    Object.freeze({ kind: "map", name: options.name, shape }),
  record: <S extends Shape>(shape: ShapeRef<S>, options: FieldOptions = {}): RecordField<S> =>
    Object.freeze({ kind: "record", name: options.name, shape }),
};

export function resolveShape(ref: ShapeRef): Shape {
  return typeof ref === "function" ? ref() : ref;
}
