import { ConfigValidationError } from "@mediaref/errors";
import { createMockDirectoryClient, fileUrlsResponse } from "@mediaref/test-utils";
import { describe, expect, it } from "vitest";
import { single } from "../bindings.js";
import { Filler } from "../filler.js";
import { cell } from "../ref.js";
import { DirectoryResolver } from "../resolver.js";

describe("DirectoryResolver", () => {
  it("should not call the directory for an empty batch", async () => {
    const client = createMockDirectoryClient();
    const resolver = new DirectoryResolver(client);

    const resources = await resolver.resolve([]);

    expect(resources.size).toBe(0);
    expect(client.files.getUrls).not.toHaveBeenCalled();
  });

  it("should request variants with the default lifetime", async () => {
    const client = createMockDirectoryClient();
    client.files.getUrls.mockResolvedValue(fileUrlsResponse({}));
    const controller = new AbortController();

    await new DirectoryResolver(client).resolve(["a", "b"], { signal: controller.signal });

    expect(client.files.getUrls).toHaveBeenCalledWith(
      { fileIds: ["a", "b"], includeVariants: true, expiresIn: 3600 },
      { signal: controller.signal },
    );
  });

  it("should pass configured options through", async () => {
    const client = createMockDirectoryClient();
    client.files.getUrls.mockResolvedValue(fileUrlsResponse({}));

    await new DirectoryResolver(client, { includeVariants: false, expiresIn: 60 }).resolve(["a"]);

    expect(client.files.getUrls).toHaveBeenCalledWith(
      { fileIds: ["a"], includeVariants: false, expiresIn: 60 },
      { signal: undefined },
    );
  });

  it("should convert directory entries into frozen resources", async () => {
    const client = createMockDirectoryClient();
    client.files.getUrls.mockResolvedValue(
      fileUrlsResponse({
        a: { url: "https://x/a", variantUrls: { thumbnail: "https://x/a_t" }, success: true },
        b: { success: false, error: "not found" },
      }),
    );

    const resources = await new DirectoryResolver(client).resolve(["a", "b", "c"]);

    expect(resources.get("a")).toEqual({
      url: "https://x/a",
      variants: { thumbnail: "https://x/a_t" },
      success: true,
      error: "",
    });
    expect(resources.get("b")).toEqual({ url: "", variants: {}, success: false, error: "not found" });
    expect(resources.has("c")).toBe(false);
    expect(Object.isFrozen(resources.get("a"))).toBe(true);
  });

  it("should propagate directory errors unchanged", async () => {
    const client = createMockDirectoryClient();
    const failure = new Error("directory unavailable");
    client.files.getUrls.mockRejectedValue(failure);

    await expect(new DirectoryResolver(client).resolve(["a"])).rejects.toBe(failure);
  });

  it("should reject invalid options", () => {
    const client = createMockDirectoryClient();

    expect(() => new DirectoryResolver(client, { expiresIn: 0 })).toThrow(ConfigValidationError);
    expect(() => new DirectoryResolver(client, { expiresIn: 0 })).toThrow(
      "Invalid directory resolver configuration: expiresIn: Number must be greater than 0",
    );
  });

  it("should drive a filler end to end", async () => {
    const client = createMockDirectoryClient();
    client.files.getUrls.mockResolvedValue(
      fileUrlsResponse({
        a: { url: "https://x/a", variantUrls: { thumbnail: "https://x/a_t" }, success: true },
      }),
    );
    const filler = new Filler(new DirectoryResolver(client));
    const full = cell("");
    const thumb = cell("");

    await filler.fill([single(cell("a"), full), single(cell("a"), thumb).useVariant("thumbnail")]);

    expect(full.get()).toBe("https://x/a");
    expect(thumb.get()).toBe("https://x/a_t");
    expect(client.files.getUrls).toHaveBeenCalledTimes(1);
  });
});
