/**
 * Plan derivation: match destination fields to source fields by name and
 * kind. Pure and deterministic; nested plans come from the callbacks.
 */

import { type FieldKind, type FieldKindName, resolveShape, type Shape } from "../shape/index.js";
import type { DynamicPlan, DynamicSink, DynamicSinkKind, FieldAction, TypeShapePlan } from "./plan.js";

export type NestedPlanFn = (source: Shape, destination: Shape) => TypeShapePlan;
export type DynamicPlanFn = (destination: Shape) => DynamicPlan;

const STRING_LIKE: ReadonlySet<FieldKindName> = new Set(["string", "fileId", "richText", "url"]);
const STRING_LISTS: ReadonlySet<FieldKindName> = new Set(["strings", "fileIds", "urls"]);
const NUMERIC: ReadonlySet<FieldKindName> = new Set(["number", "integer"]);
const STRUCTURED: ReadonlySet<FieldKindName> = new Set(["list", "map", "record", "dynamicMap"]);

const DYNAMIC_SINKS: ReadonlySet<FieldKindName> = new Set<DynamicSinkKind>([
  "string",
  "richText",
  "fileId",
  "integer",
  "number",
  "boolean",
]);

function isDynamicSinkKind(kind: FieldKindName): kind is DynamicSinkKind {
  return DYNAMIC_SINKS.has(kind);
}

function fieldOf(shape: Shape, key: string): FieldKind | undefined {
  return Object.hasOwn(shape.fields, key) ? shape.fields[key] : undefined;
}

/**
 * Source key implied by a url field's name: `coverUrl` and `coverURL` both
 * read `cover`. A name without the suffix reads the field of the same name.
 */
export function urlSourceKey(key: string): string {
  for (const suffix of ["Url", "URL"]) {
    if (key.length > suffix.length && key.endsWith(suffix)) {
      return key.slice(0, -suffix.length);
    }
  }
  return key;
}

/**
 * Whether a value of kind `from` may be copied into kind `to`
 */
export function isCopyCompatible(from: FieldKindName, to: FieldKindName): boolean {
  if (from === to) {
    return true;
  }
  if (to === "scalar") {
    return !STRUCTURED.has(from);
  }
  return (
    (STRING_LIKE.has(from) && STRING_LIKE.has(to)) ||
    (STRING_LISTS.has(from) && STRING_LISTS.has(to)) ||
    (NUMERIC.has(from) && NUMERIC.has(to))
  );
}

function deriveAction(
  key: string,
  field: FieldKind,
  source: Shape,
  nested: NestedPlanFn,
  dynamic: DynamicPlanFn,
): FieldAction | undefined {
  switch (field.kind) {
    case "url":
    case "urls": {
      const sourceKey = field.from ?? urlSourceKey(key);
      const from = fieldOf(source, sourceKey);
      if (!from) {
        return undefined;
      }
      if (field.kind === "url") {
        return STRING_LIKE.has(from.kind) ? { op: "liftId", key, sourceKey } : undefined;
      }
      return STRING_LISTS.has(from.kind) ? { op: "liftIds", key, sourceKey } : undefined;
    }
    case "richText": {
      const from = fieldOf(source, key);
      return from && STRING_LIKE.has(from.kind) ? { op: "richText", key, sourceKey: key } : undefined;
    }
    case "list":
    case "record": {
      const from = fieldOf(source, key);
      if (!from || (from.kind !== "list" && from.kind !== "record") || from.kind !== field.kind) {
        return undefined;
      }
      const plan = nested(resolveShape(from.shape), resolveShape(field.shape));
      return { op: field.kind, key, sourceKey: key, plan };
    }
    case "map": {
      const from = fieldOf(source, key);
      if (from?.kind === "map") {
        const plan = nested(resolveShape(from.shape), resolveShape(field.shape));
        return { op: "map", key, sourceKey: key, plan };
      }
      if (from?.kind === "dynamicMap") {
        return { op: "dynamicMap", key, sourceKey: key, plan: dynamic(resolveShape(field.shape)) };
      }
      return undefined;
    }
    default: {
      const from = fieldOf(source, key);
      return from && isCopyCompatible(from.kind, field.kind)
        ? { op: "copy", key, sourceKey: key, target: field.kind }
        : undefined;
    }
  }
}

function nestedUnmapped(action: FieldAction): string[] {
  switch (action.op) {
    case "list":
      return action.plan.unmapped.map((path) => `${action.key}[].${path}`);
    case "map":
    case "dynamicMap":
      return action.plan.unmapped.map((path) => `${action.key}{}.${path}`);
    case "record":
      return action.plan.unmapped.map((path) => `${action.key}.${path}`);
    default:
      return [];
  }
}

export function derivePlan(
  source: Shape,
  destination: Shape,
  nested: NestedPlanFn,
  dynamic: DynamicPlanFn,
): TypeShapePlan {
  const actions: FieldAction[] = [];
  const unmapped: string[] = [];

  for (const [key, field] of Object.entries(destination.fields)) {
    const action = deriveAction(key, field, source, nested, dynamic);
    if (action) {
      actions.push(Object.freeze(action));
      unmapped.push(...nestedUnmapped(action));
    } else {
      unmapped.push(key);
    }
  }

  return Object.freeze({
    source,
    destination,
    actions: Object.freeze(actions),
    unmapped: Object.freeze(unmapped),
  });
}

export function deriveDynamicPlan(destination: Shape): DynamicPlan {
  const sinks: DynamicSink[] = [];
  const unmapped: string[] = [];

  for (const [key, field] of Object.entries(destination.fields)) {
    if (isDynamicSinkKind(field.kind)) {
      sinks.push(Object.freeze({ key, externalName: field.name ?? key, kind: field.kind }));
    } else {
      unmapped.push(key);
    }
  }

  return Object.freeze({
    destination,
    sinks: Object.freeze(sinks),
    unmapped: Object.freeze(unmapped),
  });
}
