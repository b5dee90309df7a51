export {
  type BooleanField,
  type DynamicMapField,
  type FieldKind,
  type FieldKindName,
  type FieldOptions,
  type FileIdField,
  type FileIdsField,
  type IntegerField,
  kind,
  type ListField,
  type MapField,
  type NumberField,
  type RecordField,
  type RichTextField,
  resolveShape,
  type ScalarField,
  type ShapeRef,
  type StringField,
  type StringsField,
  type UrlField,
  type UrlsField,
} from "./kinds.js";
export { defineShape, type InferShape, type Shape, type ShapeFields, type ShapeInput } from "./shape.js";
