/**
 * In-memory Resolver for @mediaref/fill consumers.
 *
 * Serves pre-configured entries and records every resolve call for
 * assertions.
 */

import {
  createResourceInfo,
  type ResolvedResources,
  type ResolveOptions,
  type Resolver,
  type ResourceInfo,
  type ResourceInfoInit,
} from "@mediaref/fill";

/** A URL string is shorthand for a successful entry */
export type ResolverEntry = string | ResourceInfoInit;

function toResourceInfo(entry: ResolverEntry): ResourceInfo {
  return createResourceInfo(typeof entry === "string" ? { url: entry, success: true } : entry);
}

export class RecordingResolver implements Resolver {
  readonly calls: (readonly string[])[] = [];
  private readonly entries = new Map<string, ResourceInfo>();
  private failure: unknown;
  private hanging = false;

  constructor(entries: Readonly<Record<string, ResolverEntry>> = {}) {
    for (const [id, entry] of Object.entries(entries)) {
      this.entries.set(id, toResourceInfo(entry));
    }
  }

  set(id: string, entry: ResolverEntry): this {
    this.entries.set(id, toResourceInfo(entry));
    return this;
  }

  /** Reject every later call with `error` */
  failWith(error: unknown): this {
    this.failure = error;
    return this;
  }

  /** Never settle later calls on their own; they reject once their signal aborts */
  hang(): this {
    this.hanging = true;
    return this;
  }

  async resolve(ids: readonly string[], options: ResolveOptions = {}): Promise<ResolvedResources> {
    const { signal } = options;
    if (signal?.aborted) {
      throw signal.reason;
    }

    this.calls.push([...ids]);
    if (this.failure !== undefined) {
      throw this.failure;
    }
    if (this.hanging) {
      return new Promise((_resolve, reject) => {
        signal?.addEventListener("abort", () => reject(signal.reason), { once: true });
      });
    }

    const resources = new Map<string, ResourceInfo>();
    for (const id of ids) {
      const info = this.entries.get(id);
      if (info) {
        resources.set(id, info);
      }
    }
    return resources;
  }
}

/**
 * Create a RecordingResolver serving `entries`.
 *
 * @example
 * ```typescript
 * const resolver = createRecordingResolver({
 *   file_1: "https://cdn.test/1.jpg",
 *   file_2: { success: false, error: "deleted" },
 * });
 * const filler = new Filler(resolver);
 * ```
 */
export function createRecordingResolver(
  entries: Readonly<Record<string, ResolverEntry>> = {},
): RecordingResolver {
  return new RecordingResolver(entries);
}
