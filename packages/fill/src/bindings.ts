/**
 * Bindings: where identifiers live, where resolved values land, and how a
 * resolved resource projects into the destination type.
 *
 * The set is closed: single, multi and rich. The value type of each binding
 * is captured in its closures, so a heterogeneous list of bindings can be
 * filled in one pass.
 */

import type { Getter, Setter } from "./ref.js";
import type { ResourceInfo } from "./resource.js";
import {
  createMarker,
  DEFAULT_MARKER,
  type MarkerRenderer,
  type RichTextMarker,
} from "./rich-text.js";

export type IdSource = Getter<string | null | undefined>;
export type IdListSource = Getter<readonly string[] | null | undefined>;
export type TextSource = Getter<string | null | undefined>;

/**
 * One identifier into one destination
 */
export interface SingleBinding {
  readonly kind: "single";
  readonly id: IdSource;
  readonly variant: string | undefined;
  readonly assign: (info: ResourceInfo) => void;
  /** Project the named variant URL as `url` (falls back to the primary URL) */
  useVariant(name: string): SingleBinding;
}

/**
 * Ordered identifiers into a same-length destination list
 */
export interface MultiBinding {
  readonly kind: "multi";
  readonly ids: IdListSource;
  readonly variant: string | undefined;
  /** Receives one entry per id; `undefined` where the id was empty or unresolved */
  readonly assign: (infos: readonly (ResourceInfo | undefined)[]) => void;
  useVariant(name: string): MultiBinding;
}

/**
 * Markup whose embedded markers are rewritten with resolved URLs
 */
export interface RichBinding {
  readonly kind: "rich";
  readonly raw: TextSource;
  readonly rendered: Setter<string>;
  readonly marker: RichTextMarker;
  readonly variant: string | undefined;
  useVariant(name: string): RichBinding;
  /**
   * Replace the marker grammar.
   *
   * @throws InvalidMarkerPatternError unless `pattern` has exactly one capture group
   */
  pattern(pattern: RegExp, render?: MarkerRenderer): RichBinding;
}

export type Binding = SingleBinding | MultiBinding | RichBinding;

export type BindingKind = Binding["kind"];

function singleBinding(
  id: IdSource,
  assign: (info: ResourceInfo) => void,
  variant: string | undefined,
): SingleBinding {
  return Object.freeze({
    kind: "single" as const,
    id,
    variant,
    assign,
    useVariant: (name: string) => singleBinding(id, assign, name),
  });
}

function multiBinding(
  ids: IdListSource,
  assign: (infos: readonly (ResourceInfo | undefined)[]) => void,
  variant: string | undefined,
): MultiBinding {
  return Object.freeze({
    kind: "multi" as const,
    ids,
    variant,
    assign,
    useVariant: (name: string) => multiBinding(ids, assign, name),
  });
}

function richBinding(
  raw: TextSource,
  rendered: Setter<string>,
  marker: RichTextMarker,
  variant: string | undefined,
): RichBinding {
  return Object.freeze({
    kind: "rich" as const,
    raw,
    rendered,
    marker,
    variant,
    useVariant: (name: string) => richBinding(raw, rendered, marker, name),
    pattern: (pattern: RegExp, render?: MarkerRenderer) =>
      richBinding(raw, rendered, createMarker(pattern, render), variant),
  });
}

/**
 * Resolve `id` and write its URL into `target`.
 */
export function single(id: IdSource, target: Setter<string>): SingleBinding {
  return singleBinding(id, (info) => target.set(info.url), undefined);
}

/**
 * Resolve `id` and write `transform(info)` into `target`.
 */
export function singleTo<T>(
  id: IdSource,
  target: Setter<T>,
  transform: (info: ResourceInfo) => T,
): SingleBinding {
  return singleBinding(id, (info) => target.set(transform(info)), undefined);
}

/**
 * Resolve every id and write their URLs, position for position, into
 * `targets`. Empty or unresolved positions hold `""`.
 */
export function multi(ids: IdListSource, targets: Setter<string[]>): MultiBinding {
  return multiTo(ids, targets, (info) => info.url, "");
}

/**
 * Resolve every id and write `transform(info)` per position into `targets`.
 * Empty or unresolved positions hold `zero`.
 */
export function multiTo<T>(
  ids: IdListSource,
  targets: Setter<T[]>,
  transform: (info: ResourceInfo) => T,
  zero: T,
): MultiBinding {
  return multiBinding(
    ids,
    (infos) => targets.set(infos.map((info) => (info ? transform(info) : zero))),
    undefined,
  );
}

/**
 * Rewrite markers in `raw` and write the result into `rendered`.
 * `raw` and `rendered` may address the same location.
 */
export function rich(raw: TextSource, rendered: Setter<string>): RichBinding {
  return richBinding(raw, rendered, DEFAULT_MARKER, undefined);
}

export function isBinding(value: Binding | null | undefined): value is Binding {
  return value !== null && value !== undefined;
}
