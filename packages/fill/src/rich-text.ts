/**
 * Rich-text marker rewriting.
 *
 * A marker is a span of markup carrying a content identifier next to a
 * URL-bearing attribute, by default:
 *
 *   data-href="<id>" src="<value>"
 *
 * Rewriting replaces only the attribute value of spans whose identifier
 * resolved; every other byte is reproduced.
 */

import { InvalidMarkerPatternError } from "@mediaref/errors";

/**
 * Produce the replacement for a matched span given its resolved URL
 */
export type MarkerRenderer = (span: string, url: string) => string;

export interface RichTextMarker {
  /** Global pattern with exactly one capture group: the identifier */
  readonly pattern: RegExp;
  readonly render: MarkerRenderer;
}

export const DEFAULT_MARKER_PATTERN = /data-href="([A-Za-z0-9_-]+)" src="[^"]*"/g;

const SRC_ATTRIBUTE = /(?<![\w-])src="[^"]*"/;

/**
 * Replace the value of the first `src="..."` attribute in `span` with the
 * resolved URL. A `"` in the URL is written as `&quot;`, as the attribute
 * value of a marker may not contain a quote; any other character is written
 * as is. A span without a `src` attribute is returned as is.
 */
export function replaceSrcAttribute(span: string, url: string): string {
  const escaped = url.replaceAll('"', "&quot;");
  return span.replace(SRC_ATTRIBUTE, () => `src="${escaped}"`);
}

/**
 * Number of capture groups in `pattern`.
 */
export function countCaptureGroups(pattern: RegExp): number {
  const flags = pattern.flags.replace(/[gy]/g, "");
  const match = new RegExp(`${pattern.source}|`, flags).exec("");
  return match ? match.length - 1 : 0;
}

/**
 * Validate a marker pattern and pair it with a renderer.
 *
 * @throws InvalidMarkerPatternError unless the pattern has exactly one capture group
 */
export function createMarker(
  pattern: RegExp,
  render: MarkerRenderer = replaceSrcAttribute,
): RichTextMarker {
  const groups = countCaptureGroups(pattern);
  if (groups !== 1) {
    throw new InvalidMarkerPatternError(pattern.source, groups);
  }
  const global = pattern.global ? pattern : new RegExp(pattern.source, `${pattern.flags}g`);
  return Object.freeze({ pattern: global, render });
}

export const DEFAULT_MARKER: RichTextMarker = createMarker(DEFAULT_MARKER_PATTERN);

/**
 * Every identifier captured in `text`, in order, duplicates included.
 */
export function extractMarkerIds(text: string, marker: RichTextMarker = DEFAULT_MARKER): string[] {
  const ids: string[] = [];
  for (const match of text.matchAll(marker.pattern)) {
    const id = match[1];
    if (id) {
      ids.push(id);
    }
  }
  return ids;
}

/**
 * Rewrite every span whose identifier `urlFor` resolves. Spans it returns
 * `undefined` for are left unchanged.
 */
export function rewriteRichText(
  text: string,
  urlFor: (id: string) => string | undefined,
  marker: RichTextMarker = DEFAULT_MARKER,
): string {
  return text.replace(marker.pattern, (span: string, id: unknown) => {
    if (typeof id !== "string" || id === "") {
      return span;
    }
    const url = urlFor(id);
    return url === undefined ? span : marker.render(span, url);
  });
}

export function isRichTextMarker(value: unknown): value is RichTextMarker {
  return (
    typeof value === "object" &&
    value !== null &&
    "pattern" in value &&
    value.pattern instanceof RegExp &&
    "render" in value &&
    typeof value.render === "function"
  );
}
