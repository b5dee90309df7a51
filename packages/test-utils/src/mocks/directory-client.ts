import type { FileUrlInfo, FilesResource, GetFileUrlsResponse } from "@mediaref/directory-sdk";
import { type Mock, vi } from "vitest";

export interface MockFilesResource {
  getUrls: Mock<FilesResource["getUrls"]>;
  getUrl: Mock<FilesResource["getUrl"]>;
}

/**
 * Structural stand-in for DirectoryClient. Accepted anywhere a
 * FileUrlSource is expected.
 */
export interface MockDirectoryClient {
  files: MockFilesResource;
}

/**
 * Create a DirectoryClient whose file methods are Vitest mocks.
 *
 * @example
 * ```typescript
 * const client = createMockDirectoryClient();
 * client.files.getUrls.mockResolvedValue(fileUrlsResponse({ file_1: "https://cdn.test/1.jpg" }));
 * const resolver = new DirectoryResolver(client);
 * ```
 */
export function createMockDirectoryClient(): MockDirectoryClient {
  return {
    files: {
      getUrls: vi.fn<FilesResource["getUrls"]>(),
      getUrl: vi.fn<FilesResource["getUrl"]>(),
    },
  };
}

/**
 * Build a getUrls response. A URL string is shorthand for a successful
 * entry without variants.
 */
export function fileUrlsResponse(
  entries: Readonly<Record<string, string | Partial<FileUrlInfo>>>,
): GetFileUrlsResponse {
  const results: Record<string, FileUrlInfo> = {};
  for (const [id, entry] of Object.entries(entries)) {
    const info = typeof entry === "string" ? { url: entry, success: true } : entry;
    results[id] = {
      url: info.url ?? "",
      variantUrls: info.variantUrls ?? {},
      success: info.success ?? false,
      error: info.error ?? "",
    };
  }
  return { results };
}
