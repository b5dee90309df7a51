import type {
  BooleanField,
  DynamicMapField,
  FieldKind,
  FileIdField,
  FileIdsField,
  IntegerField,
  ListField,
  MapField,
  NumberField,
  RecordField,
  RichTextField,
  ScalarField,
  StringField,
  StringsField,
  UrlField,
  UrlsField,
} from "./kinds.js";

export type ShapeFields = Readonly<Record<string, FieldKind>>;

/**
 * Mapping descriptor: a name plus the kind of every field.
 * Plans are cached by shape identity, so define each shape once.
 */
export interface Shape<F extends ShapeFields = ShapeFields> {
  readonly name: string;
  readonly fields: F;
}

export function defineShape<F extends ShapeFields>(name: string, fields: F): Shape<F> {
  return Object.freeze({ name, fields: Object.freeze({ ...fields }) });
}

type InferField<K> = K extends StringField | FileIdField | UrlField | RichTextField
  ? string
  : K extends NumberField | IntegerField
    ? number
    : K extends BooleanField
      ? boolean
      : K extends FileIdsField | UrlsField | StringsField
        ? string[]
        : K extends ScalarField
          ? unknown
          : K extends DynamicMapField
            ? Record<string, unknown>
            : K extends ListField<infer S>
              ? (InferShape<S> | null)[]
              : K extends MapField<infer S>
                ? Record<string, InferShape<S> | null>
                : K extends RecordField<infer S>
                  ? InferShape<S> | null
                  : never;

/**
 * Value type produced for a shape by the mapper
 */
export type InferShape<S extends Shape> = {
  -readonly [P in keyof S["fields"]]: InferField<S["fields"][P]>;
};

type InputField<K> = K extends ListField<infer S>
  ? readonly (ShapeInput<S> | null | undefined)[]
  : K extends MapField<infer S>
    ? Readonly<Record<string, ShapeInput<S> | null | undefined>>
    : K extends RecordField<infer S>
      ? ShapeInput<S>
      : K extends FileIdsField | UrlsField | StringsField
        ? readonly string[]
        : InferField<K>;

/**
 * Value type accepted as a mapping source for a shape. Every field may be
 * absent or null.
 */
export type ShapeInput<S extends Shape> = {
  readonly [P in keyof S["fields"]]?: InputField<S["fields"][P]> | null | undefined;
};
