/**
 * Files resource: delivery URLs for stored files
 */

import { DirectoryFileUnavailableError, DirectoryValidationError } from "../errors.js";
import { GetFileUrlsResponseSchema } from "../schemas.js";
import {
  type CallOptions,
  type FileUrlInfo,
  type GetFileUrlsParams,
  type GetFileUrlsResponse,
  MAX_FILE_URL_BATCH,
} from "../types/files.js";
import { BaseResource } from "./base.js";

/**
 * Resource for looking up file URLs via the directory's file API
 */
export class FilesResource extends BaseResource {
  /**
   * Get delivery URLs for a batch of files
   *
   * URL lookup is not tenant-scoped: platform and tenant files may be mixed
   * in one batch.
   *
   * @param params - File IDs (at most 100) and URL options
   * @returns URL information keyed by file ID; unknown IDs are absent
   *
   * @example
   * ```typescript
   * const { results } = await client.files.getUrls({
   *   fileIds: ['file_a', 'file_b'],
   *   includeVariants: true,
   *   expiresIn: 3600,
   * });
   * ```
   */
  async getUrls(params: GetFileUrlsParams, options?: CallOptions): Promise<GetFileUrlsResponse> {
    if (params.fileIds.length === 0) {
      return { results: {} };
    }

    if (params.fileIds.length > MAX_FILE_URL_BATCH) {
      throw new DirectoryValidationError(
        `At most ${MAX_FILE_URL_BATCH} file IDs per request, got ${params.fileIds.length}`,
        "fileIds",
      );
    }

    return this.http.request(
      "/api/v1/files/urls",
      {
        method: "POST",
        body: {
          fileIds: params.fileIds,
          includeVariants: params.includeVariants ?? false,
          ...(params.expiresIn !== undefined ? { expiresIn: params.expiresIn } : {}),
        },
        signal: options?.signal,
      },
      GetFileUrlsResponseSchema,
    );
  }

  /**
   * Get the delivery URL of a single file
   *
   * @throws DirectoryFileUnavailableError when the file is unknown or failed
   */
  async getUrl(fileId: string, options?: CallOptions): Promise<string> {
    const { results } = await this.getUrls({ fileIds: [fileId] }, options);
    const info: FileUrlInfo | undefined = results[fileId];

    if (!info || !info.success) {
      throw new DirectoryFileUnavailableError(fileId, info?.error || "file not found");
    }

    return info.url;
  }
}
