import { describe, expect, it } from "vitest";
import { createResourceInfo, lookupResolved, projectVariant, variantUrl } from "../resource.js";

const info = createResourceInfo({
  url: "https://x/full.jpg",
  variants: { thumbnail: "https://x/thumb.jpg", empty: "" },
  success: true,
});

describe("createResourceInfo", () => {
  it("should fill absent fields and freeze the record", () => {
    const failed = createResourceInfo({ success: false });

    expect(failed).toEqual({ url: "", variants: {}, success: false, error: "" });
    expect(Object.isFrozen(failed)).toBe(true);
    expect(Object.isFrozen(failed.variants)).toBe(true);
  });
});

describe("variantUrl", () => {
  it("should return the named variant", () => {
    expect(variantUrl(info, "thumbnail")).toBe("https://x/thumb.jpg");
  });

  it("should return a present variant even when it is empty", () => {
    expect(variantUrl(info, "empty")).toBe("");
  });

  it("should fall back to the primary URL for absent variants", () => {
    expect(variantUrl(info, "large")).toBe("https://x/full.jpg");
    expect(variantUrl(info, "toString")).toBe("https://x/full.jpg");
  });
});

describe("projectVariant", () => {
  it("should return the info itself without a variant", () => {
    expect(projectVariant(info, undefined)).toBe(info);
  });

  it("should expose the variant URL as url", () => {
    expect(projectVariant(info, "thumbnail").url).toBe("https://x/thumb.jpg");
    expect(projectVariant(info, "thumbnail").variants).toEqual(info.variants);
  });
});

describe("lookupResolved", () => {
  const resources = new Map([
    ["ok", info],
    ["bad", createResourceInfo({ success: false, error: "deleted" })],
  ]);

  it("should return successful entries only", () => {
    expect(lookupResolved(resources, "ok")).toBe(info);
    expect(lookupResolved(resources, "bad")).toBeUndefined();
    expect(lookupResolved(resources, "absent")).toBeUndefined();
    expect(lookupResolved(resources, "")).toBeUndefined();
  });
});
