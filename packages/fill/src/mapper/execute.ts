/**
 * Two-pass plan execution.
 *
 * Pass 1 (before the resolve) allocates destination values, performs the
 * verbatim copies and collects identifiers. Url fields hold their
 * identifier until pass 2 (after the resolve) replaces it with the
 * resolved URL, or with "" when unresolved.
 */

import type { IdentifierCollector } from "../collector.js";
import { lookupResolved, type ResolvedResources } from "../resource.js";
import { extractMarkerIds, type RichTextMarker, rewriteRichText } from "../rich-text.js";
import type { FieldKind, FieldKindName, Shape } from "../shape/index.js";
import type { DynamicPlan, DynamicSinkKind, FieldAction, TypeShapePlan } from "./plan.js";

export type MappedRecord = Record<string, unknown>;

export interface CollectContext {
  readonly collector: IdentifierCollector;
  readonly marker: RichTextMarker;
}

export interface FillContext {
  readonly resources: ResolvedResources;
  readonly marker: RichTextMarker;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function zeroValue(field: FieldKind): unknown {
  switch (field.kind) {
    case "string":
    case "fileId":
    case "url":
    case "richText":
      return "";
    case "number":
    case "integer":
      return 0;
    case "boolean":
      return false;
    case "strings":
    case "fileIds":
    case "urls":
    case "list":
      return [];
    case "map":
    case "dynamicMap":
      return {};
    case "record":
    case "scalar":
      return null;
  }
}

function zeroRecord(shape: Shape): MappedRecord {
  const record: MappedRecord = {};
  for (const [key, field] of Object.entries(shape.fields)) {
    record[key] = zeroValue(field);
  }
  return record;
}

function toIdList(value: readonly unknown[]): string[] {
  return value.map((id) => (typeof id === "string" ? id : ""));
}

function mapValues(
  value: Record<string, unknown>,
  fn: (entry: unknown) => MappedRecord | null,
): Record<string, MappedRecord | null> {
  // Own keys only: a decoded payload may carry "__proto__"
  return Object.fromEntries(
    Object.entries(value).map(([key, entry]): [string, MappedRecord | null] => [key, fn(entry)]),
  );
}

/**
 * Convert a source value for a copy into `target`. `undefined` means the
 * value has the wrong runtime type and the destination keeps its zero value.
 */
export function convertCopy(value: unknown, target: FieldKindName): unknown {
  switch (target) {
    case "string":
    case "fileId":
    case "url":
    case "richText":
      return typeof value === "string" ? value : undefined;
    case "number":
      return typeof value === "number" ? value : undefined;
    case "integer":
      return typeof value === "number" ? Math.trunc(value) : undefined;
    case "boolean":
      return typeof value === "boolean" ? value : undefined;
    case "strings":
    case "fileIds":
    case "urls":
      return Array.isArray(value) ? toIdList(value) : undefined;
    case "dynamicMap":
      return isRecord(value) ? { ...value } : undefined;
    case "scalar":
      return value;
    default:
      return undefined;
  }
}

function collectAction(
  action: FieldAction,
  value: unknown,
  out: MappedRecord,
  ctx: CollectContext,
): void {
  switch (action.op) {
    case "copy": {
      const converted = convertCopy(value, action.target);
      if (converted !== undefined) {
        out[action.key] = converted;
      }
      return;
    }
    case "liftId":
      if (typeof value === "string") {
        out[action.key] = value;
        ctx.collector.add(value);
      }
      return;
    case "liftIds":
      if (Array.isArray(value)) {
        const ids = toIdList(value);
        out[action.key] = ids;
        ctx.collector.addAll(ids);
      }
      return;
    case "richText":
      if (typeof value === "string") {
        out[action.key] = value;
        ctx.collector.addAll(extractMarkerIds(value, ctx.marker));
      }
      return;
    case "list": {
      const plan = action.plan;
      if (Array.isArray(value)) {
        out[action.key] = value.map((element) => collectValue(element, plan, ctx));
      }
      return;
    }
    case "map": {
      const plan = action.plan;
      if (isRecord(value)) {
        out[action.key] = mapValues(value, (entry) => collectValue(entry, plan, ctx));
      }
      return;
    }
    case "dynamicMap": {
      const plan = action.plan;
      if (isRecord(value)) {
        out[action.key] = mapValues(value, (entry) => collectDynamic(entry, plan, ctx));
      }
      return;
    }
    case "record":
      out[action.key] = collectValue(value, action.plan, ctx);
      return;
  }
}

/**
 * Pass 1 for one source value. Anything other than a plain object maps to
 * null.
 */
export function collectValue(
  source: unknown,
  plan: TypeShapePlan,
  ctx: CollectContext,
): MappedRecord | null {
  if (!isRecord(source)) {
    return null;
  }
  const out = zeroRecord(plan.destination);
  for (const action of plan.actions) {
    collectAction(action, source[action.sourceKey], out, ctx);
  }
  return out;
}

function convertSink(value: unknown, kind: DynamicSinkKind): unknown {
  switch (kind) {
    case "string":
    case "fileId":
    case "richText":
      return typeof value === "string" ? value : undefined;
    case "integer":
      return typeof value === "number" ? Math.trunc(value) : undefined;
    case "number":
      return typeof value === "number" ? value : undefined;
    case "boolean":
      return typeof value === "boolean" ? value : undefined;
  }
}

/**
 * Pass 1 for one schema-less payload: destination fields are matched by
 * external name; only scalar sinks are populated.
 */
export function collectDynamic(
  payload: unknown,
  plan: DynamicPlan,
  ctx: CollectContext,
): MappedRecord | null {
  if (!isRecord(payload)) {
    return null;
  }
  const out = zeroRecord(plan.destination);
  for (const sink of plan.sinks) {
    const value = convertSink(payload[sink.externalName], sink.kind);
    if (value === undefined) {
      continue;
    }
    out[sink.key] = value;
    if (sink.kind === "richText" && typeof value === "string") {
      ctx.collector.addAll(extractMarkerIds(value, ctx.marker));
    }
  }
  return out;
}

function urlFor(resources: ResolvedResources, id: string): string | undefined {
  return lookupResolved(resources, id)?.url;
}

function fillAction(action: FieldAction, out: MappedRecord, ctx: FillContext): void {
  const value = out[action.key];
  switch (action.op) {
    case "copy":
      return;
    case "liftId":
      out[action.key] = typeof value === "string" ? (urlFor(ctx.resources, value) ?? "") : "";
      return;
    case "liftIds":
      if (Array.isArray(value)) {
        out[action.key] = toIdList(value).map((id) => urlFor(ctx.resources, id) ?? "");
      }
      return;
    case "richText":
      if (typeof value === "string") {
        out[action.key] = rewriteRichText(value, (id) => urlFor(ctx.resources, id), ctx.marker);
      }
      return;
    case "list":
      if (Array.isArray(value)) {
        for (const element of value) {
          fillValue(element, action.plan, ctx);
        }
      }
      return;
    case "map":
      if (isRecord(value)) {
        for (const entry of Object.values(value)) {
          fillValue(entry, action.plan, ctx);
        }
      }
      return;
    case "dynamicMap":
      if (isRecord(value)) {
        for (const entry of Object.values(value)) {
          fillDynamic(entry, action.plan, ctx);
        }
      }
      return;
    case "record":
      fillValue(value, action.plan, ctx);
      return;
  }
}

/**
 * Pass 2 for one destination value produced by collectValue.
 */
export function fillValue(target: unknown, plan: TypeShapePlan, ctx: FillContext): void {
  if (!isRecord(target)) {
    return;
  }
  for (const action of plan.actions) {
    fillAction(action, target, ctx);
  }
}

function fillDynamic(target: unknown, plan: DynamicPlan, ctx: FillContext): void {
  if (!isRecord(target)) {
    return;
  }
  for (const sink of plan.sinks) {
    const value = target[sink.key];
    if (sink.kind === "richText" && typeof value === "string") {
      target[sink.key] = rewriteRichText(value, (id) => urlFor(ctx.resources, id), ctx.marker);
    }
  }
}
