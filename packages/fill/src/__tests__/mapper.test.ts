import { FillAbortedError, MappingUnmappedFieldError } from "@mediaref/errors";
import { createRecordingResolver } from "@mediaref/test-utils";
import { describe, expect, it, vi } from "vitest";
import { Filler } from "../filler.js";
import { defineShape, kind } from "../shape/index.js";

const PostRecord = defineShape("PostRecord", {
  title: kind.string(),
  cover: kind.fileId(),
  gallery: kind.fileIds(),
  body: kind.richText(),
  views: kind.number(),
  published: kind.boolean(),
  createdAt: kind.scalar(),
});

const PostView = defineShape("PostView", {
  title: kind.string(),
  cover: kind.fileId(),
  coverUrl: kind.url(),
  galleryUrls: kind.urls("gallery"),
  body: kind.richText(),
  views: kind.integer(),
  published: kind.boolean(),
  createdAt: kind.scalar(),
});

const ItemRecord = defineShape("ItemRecord", { image: kind.fileId() });
const ItemView = defineShape("ItemView", { image: kind.fileId(), imageUrl: kind.url() });
const OrderRecord = defineShape("OrderRecord", { items: kind.list(ItemRecord) });
const OrderView = defineShape("OrderView", { items: kind.list(ItemView) });

describe("Filler.autoFill", () => {
  it("should copy fields and resolve url, urls and richText fields", async () => {
    const resolver = createRecordingResolver({
      cover_id: "https://x/cover.jpg",
      g1: "https://x/g1.jpg",
      g2: { success: false, error: "expired" },
    });
    const filler = new Filler(resolver, { logger: { warn: vi.fn() } });
    const createdAt = new Date("2024-05-01T00:00:00Z");

    const [view] = await filler.autoFill(PostRecord, PostView, [
      {
        title: "Hi",
        cover: "cover_id",
        gallery: ["g1", "", "g2"],
        body: 'x <img data-href="g1" src="">',
        views: 12.7,
        published: true,
        createdAt,
      },
    ]);

    expect(view).toEqual({
      title: "Hi",
      cover: "cover_id",
      coverUrl: "https://x/cover.jpg",
      galleryUrls: ["https://x/g1.jpg", "", ""],
      body: 'x <img data-href="g1" src="https://x/g1.jpg">',
      views: 12,
      published: true,
      createdAt,
    });
    expect(resolver.calls).toEqual([["cover_id", "g1", "g2"]]);
  });

  it("should keep the identifier beside its resolved URL", async () => {
    const Source = defineShape("CoverSource", { cover: kind.string() });
    const Destination = defineShape("CoverDestination", {
      cover: kind.fileId(),
      coverURL: kind.url("cover"),
    });
    const filler = new Filler(createRecordingResolver({ cover_id: "https://x/c.png" }));

    const result = await filler.autoFillOne(Source, Destination, { cover: "cover_id" });

    expect(result).toEqual({ cover: "cover_id", coverURL: "https://x/c.png" });
  });

  it("should read a url field's identifier from the source field of the same name", async () => {
    const Source = defineShape("AvatarSource", { avatar: kind.string() });
    const Destination = defineShape("AvatarDestination", { avatar: kind.url() });
    const filler = new Filler(createRecordingResolver({ a1: "https://x/a1.png" }));

    const result = await filler.autoFillOne(Source, Destination, { avatar: "a1" });

    expect(result).toEqual({ avatar: "https://x/a1.png" });
  });

  it("should write an empty URL for unresolved identifiers", async () => {
    const filler = new Filler(createRecordingResolver({}));

    const [item] = await filler.autoFill(ItemRecord, ItemView, [{ image: "missing" }]);

    expect(item).toEqual({ image: "missing", imageUrl: "" });
  });

  it("should resolve nested lists with one shared batch", async () => {
    const resolver = createRecordingResolver({ a: "https://x/a", b: "https://x/b" });
    const filler = new Filler(resolver);

    const orders = await filler.autoFill(OrderRecord, OrderView, [
      { items: [{ image: "a" }, { image: "b" }] },
      { items: [{ image: "a" }, null] },
    ]);

    expect(resolver.calls).toEqual([["a", "b"]]);
    expect(orders).toEqual([
      {
        items: [
          { image: "a", imageUrl: "https://x/a" },
          { image: "b", imageUrl: "https://x/b" },
        ],
      },
      { items: [{ image: "a", imageUrl: "https://x/a" }, null] },
    ]);
  });

  it("should allocate a fresh destination per element", async () => {
    const filler = new Filler(createRecordingResolver({ a: "https://x/a" }));

    const [first, second] = await filler.autoFill(ItemRecord, ItemView, [
      { image: "a" },
      { image: "a" },
    ]);

    expect(first).toEqual(second);
    expect(first).not.toBe(second);
  });

  it("should map keyed records and nested records", async () => {
    const Source = defineShape("AlbumRecord", {
      photos: kind.map(ItemRecord),
      featured: kind.record(ItemRecord),
      backup: kind.record(ItemRecord),
    });
    const Destination = defineShape("AlbumView", {
      photos: kind.map(ItemView),
      featured: kind.record(ItemView),
      backup: kind.record(ItemView),
    });
    const filler = new Filler(createRecordingResolver({ p1: "https://x/p1", p2: "https://x/p2" }));

    const album = await filler.autoFillOne(Source, Destination, {
      photos: { front: { image: "p1" }, back: { image: "p2" } },
      featured: { image: "p2" },
      backup: null,
    });

    expect(album).toEqual({
      photos: {
        front: { image: "p1", imageUrl: "https://x/p1" },
        back: { image: "p2", imageUrl: "https://x/p2" },
      },
      featured: { image: "p2", imageUrl: "https://x/p2" },
      backup: null,
    });
  });

  it("should populate scalar sinks of dynamic payloads by external name", async () => {
    const Widget = defineShape("Widget", {
      title: kind.string(),
      html: kind.richText({ name: "content" }),
      count: kind.integer(),
      ratio: kind.number(),
      visible: kind.boolean(),
      icon: kind.fileId({ name: "iconId" }),
      iconUrl: kind.url(),
      tags: kind.strings(),
    });
    const PageRecord = defineShape("PageRecord", { widgets: kind.dynamicMap() });
    const PageView = defineShape("PageView", { widgets: kind.map(Widget) });
    const resolver = createRecordingResolver({ w1: "https://x/w1.png", w2: "https://x/w2.png" });
    const filler = new Filler(resolver);

    const page = await filler.autoFillOne(PageRecord, PageView, {
      widgets: {
        hero: {
          title: "Top",
          content: '<img data-href="w1" src="old">',
          count: 3.9,
          ratio: 0.5,
          visible: true,
          iconId: "w2",
          tags: ["x"],
        },
        footer: { title: 5, count: "7", visible: "yes" },
        broken: "nope",
      },
    });

    expect(page).toEqual({
      widgets: {
        hero: {
          title: "Top",
          html: '<img data-href="w1" src="https://x/w1.png">',
          count: 3,
          ratio: 0.5,
          visible: true,
          icon: "w2",
          iconUrl: "",
          tags: [],
        },
        footer: {
          title: "",
          html: "",
          count: 0,
          ratio: 0,
          visible: false,
          icon: "",
          iconUrl: "",
          tags: [],
        },
        broken: null,
      },
    });
    expect(resolver.calls).toEqual([["w1"]]);
  });

  it("should keep every payload key as an own entry", async () => {
    const Lang = defineShape("Lang", { title: kind.string() });
    const Source = defineShape("LocalizedRecord", { langs: kind.dynamicMap() });
    const Destination = defineShape("LocalizedView", { langs: kind.map(Lang) });
    const filler = new Filler(createRecordingResolver({}));

    const result = await filler.autoFillOne(Source, Destination, {
      langs: JSON.parse('{"__proto__":{"title":"p"},"en":{"title":"e"}}'),
    });

    const langs = result?.langs ?? {};
    expect(Object.keys(langs)).toEqual(["__proto__", "en"]);
    expect(Object.getPrototypeOf(langs)).toBe(Object.prototype);
    expect(Object.getOwnPropertyDescriptor(langs, "__proto__")?.value).toEqual({ title: "p" });
    expect(langs.en).toEqual({ title: "e" });
  });

  it("should treat values of the wrong runtime type as absent", async () => {
    const filler = new Filler(createRecordingResolver({}));
    const decoded = JSON.parse('{"title":42,"cover":["not","an","id"],"published":"yes"}');

    const [view] = await filler.autoFill(PostRecord, PostView, [decoded]);

    expect(view).toEqual({
      title: "",
      cover: "",
      coverUrl: "",
      galleryUrls: [],
      body: "",
      views: 0,
      published: false,
      createdAt: null,
    });
  });

  it("should map null sources to null", async () => {
    const filler = new Filler(createRecordingResolver({}));

    await expect(filler.autoFill(ItemRecord, ItemView, [null, undefined])).resolves.toEqual([
      null,
      null,
    ]);
    await expect(filler.autoFillOne(ItemRecord, ItemView, null)).resolves.toBeUndefined();
  });

  it("should not resolve anything for an empty source list", async () => {
    const resolver = createRecordingResolver({});
    const filler = new Filler(resolver);

    await expect(filler.autoFill(OrderRecord, OrderView, [])).resolves.toEqual([]);
    expect(resolver.calls).toEqual([]);
  });

  it("should derive each plan once per shape pair", async () => {
    const filler = new Filler(createRecordingResolver({ a: "https://x/a" }));

    await filler.autoFill(OrderRecord, OrderView, [{ items: [{ image: "a" }] }]);
    const plan = filler.registry.planFor(OrderRecord, OrderView);
    await filler.autoFill(OrderRecord, OrderView, [{ items: [] }]);

    expect(filler.registry.planFor(OrderRecord, OrderView)).toBe(plan);
    expect(filler.registry.size).toBe(2);
  });

  it("should abort a pending resolve", async () => {
    const filler = new Filler(createRecordingResolver({ a: "https://x/a" }).hang());
    const controller = new AbortController();

    const pending = filler.autoFill(ItemRecord, ItemView, [{ image: "a" }], {
      signal: controller.signal,
    });
    controller.abort(new Error("navigated away"));

    await expect(pending).rejects.toThrow(FillAbortedError);
  });
});

describe("unmapped destination fields", () => {
  const Source = defineShape("ProfileRecord", { name: kind.string(), avatar: kind.number() });
  const Destination = defineShape("ProfileView", {
    name: kind.string(),
    avatarUrl: kind.url(),
    bio: kind.string(),
  });

  it("should be ignored by default", async () => {
    const logger = { warn: vi.fn() };
    const filler = new Filler(createRecordingResolver({}), { logger });

    const [profile] = await filler.autoFill(Source, Destination, [{ name: "Ada", avatar: 1 }]);

    expect(profile).toEqual({ name: "Ada", avatarUrl: "", bio: "" });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("should warn once per plan", async () => {
    const logger = { warn: vi.fn() };
    const filler = new Filler(createRecordingResolver({}), { logger, unmapped: "warn" });

    await filler.autoFill(Source, Destination, [{ name: "Ada" }]);
    await filler.autoFill(Source, Destination, [{ name: "Grace" }]);

    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      "[mediaref-fill] ProfileRecord -> ProfileView: unmapped destination field(s) avatarUrl, bio",
    );
  });

  it("should throw in error mode", async () => {
    const filler = new Filler(createRecordingResolver({}), { unmapped: "error" });

    const error = await filler
      .autoFill(Source, Destination, [{ name: "Ada" }])
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MappingUnmappedFieldError);
    if (!(error instanceof MappingUnmappedFieldError)) return;
    expect(error.fields).toEqual(["avatarUrl", "bio"]);
    expect(error.message).toBe(
      "ProfileRecord -> ProfileView: unmapped destination field(s) avatarUrl, bio",
    );
  });

  it("should report nested fields as paths", async () => {
    const OrderSummary = defineShape("OrderSummary", {
      items: kind.list(defineShape("ItemSummary", { image: kind.fileId(), caption: kind.string() })),
    });
    const filler = new Filler(createRecordingResolver({}), { unmapped: "error" });

    await expect(filler.autoFill(OrderRecord, OrderSummary, [])).rejects.toThrow(
      "OrderRecord -> OrderSummary: unmapped destination field(s) items[].caption",
    );
  });
});
