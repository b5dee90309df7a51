/**
 * Resolved delivery information for one content identifier.
 *
 * Created per resolve call and discarded once the owning fill returns.
 */
export interface ResourceInfo {
  /** Primary delivery URL */
  readonly url: string;
  /** Named alternate renditions (e.g. "thumbnail") */
  readonly variants: Readonly<Record<string, string>>;
  /** False when the directory could not produce a URL */
  readonly success: boolean;
  /** Failure reason when `success` is false */
  readonly error: string;
}

export interface ResourceInfoInit {
  readonly url?: string | undefined;
  readonly variants?: Readonly<Record<string, string>> | undefined;
  readonly success: boolean;
  readonly error?: string | undefined;
}

/**
 * Resolved resources keyed by identifier
 */
export type ResolvedResources = ReadonlyMap<string, ResourceInfo>;

/**
 * Build a frozen ResourceInfo, filling absent fields with empty values.
 */
export function createResourceInfo(init: ResourceInfoInit): ResourceInfo {
  return Object.freeze({
    url: init.url ?? "",
    variants: Object.freeze({ ...init.variants }),
    success: init.success,
    error: init.error ?? "",
  });
}

/**
 * URL of the named variant, or the primary URL when the variant is absent.
 */
export function variantUrl(info: ResourceInfo, name: string): string {
  const url = Object.hasOwn(info.variants, name) ? info.variants[name] : undefined;
  return url ?? info.url;
}

/**
 * View of `info` whose primary URL is the named variant (with fallback).
 * Without a variant name the info is returned as is.
 */
export function projectVariant(info: ResourceInfo, variant: string | undefined): ResourceInfo {
  if (variant === undefined) {
    return info;
  }
  return createResourceInfo({ ...info, url: variantUrl(info, variant) });
}

/**
 * The successfully resolved entry for `id`, if any.
 * Missing and failed entries are both reported as `undefined`.
 */
export function lookupResolved(resources: ResolvedResources, id: string): ResourceInfo | undefined {
  if (id === "") {
    return undefined;
  }
  const info = resources.get(id);
  return info?.success ? info : undefined;
}
