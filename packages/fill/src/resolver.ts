/**
 * Resolver contract and the directory-backed implementation.
 */

import type { CallOptions, GetFileUrlsParams, GetFileUrlsResponse } from "@mediaref/directory-sdk";
import { parseConfig } from "@mediaref/errors";
import {
  type DirectoryResolverConfig,
  DirectoryResolverConfigSchema,
  type ResolvedDirectoryResolverConfig,
} from "./config.js";
import { createResourceInfo, type ResolvedResources, type ResourceInfo } from "./resource.js";

export interface ResolveOptions {
  readonly signal?: AbortSignal | undefined;
}

/**
 * Batch lookup from identifiers to resolved resources.
 *
 * Identifiers missing from the result are treated as unresolved. A rejected
 * promise aborts the whole fill.
 */
export interface Resolver {
  resolve(ids: readonly string[], options?: ResolveOptions): Promise<ResolvedResources>;
}

/**
 * The part of DirectoryClient the resolver needs
 */
export interface FileUrlSource {
  readonly files: {
    getUrls(params: GetFileUrlsParams, options?: CallOptions): Promise<GetFileUrlsResponse>;
  };
}

/**
 * Resolver backed by the resource directory's batch URL endpoint.
 *
 * @example
 * ```typescript
 * const resolver = new DirectoryResolver(new DirectoryClient({ baseUrl }), { expiresIn: 600 });
 * const filler = new Filler(resolver);
 * ```
 */
export class DirectoryResolver implements Resolver {
  private readonly client: FileUrlSource;
  private readonly config: ResolvedDirectoryResolverConfig;

  constructor(client: FileUrlSource, config: DirectoryResolverConfig = {}) {
    this.client = client;
    this.config = parseConfig("directory resolver", DirectoryResolverConfigSchema, config);
  }

  async resolve(ids: readonly string[], options: ResolveOptions = {}): Promise<ResolvedResources> {
    const resources = new Map<string, ResourceInfo>();
    if (ids.length === 0) {
      return resources;
    }

    const { results } = await this.client.files.getUrls(
      {
        fileIds: ids,
        includeVariants: this.config.includeVariants,
        expiresIn: this.config.expiresIn,
      },
      { signal: options.signal },
    );

    for (const [id, entry] of Object.entries(results)) {
      resources.set(
        id,
        createResourceInfo({
          url: entry.url,
          variants: entry.variantUrls,
          success: entry.success,
          error: entry.error,
        }),
      );
    }
    return resources;
  }
}
