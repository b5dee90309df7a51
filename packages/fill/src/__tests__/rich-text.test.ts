import { InvalidMarkerPatternError } from "@mediaref/errors";
import { describe, expect, it } from "vitest";
import {
  countCaptureGroups,
  createMarker,
  DEFAULT_MARKER,
  extractMarkerIds,
  replaceSrcAttribute,
  rewriteRichText,
} from "../rich-text.js";

const urls: Record<string, string> = {
  file_1: "https://x/1.jpg",
  file_2: "https://x/2.jpg",
};

const lookup = (id: string): string | undefined => urls[id];

describe("extractMarkerIds", () => {
  it("should return every captured identifier in order", () => {
    const text =
      '<p><img data-href="file_2" src=""> <img data-href="file_1" src="a.jpg"></p>' +
      '<img data-href="file_2" src="b.jpg">';

    expect(extractMarkerIds(text)).toEqual(["file_2", "file_1", "file_2"]);
  });

  it("should ignore markers outside the identifier charset", () => {
    expect(extractMarkerIds('<img data-href="bad id" src="">')).toEqual([]);
  });
});

describe("rewriteRichText", () => {
  it("should rewrite resolved markers and keep the rest byte for byte", () => {
    const text =
      '<figure class="wide"><img data-href="file_1" src="old.jpg" alt="one"></figure>\n' +
      '<img data-href="unknown" src="keep.jpg"><img data-href="file_2" src="">';

    expect(rewriteRichText(text, lookup)).toBe(
      '<figure class="wide"><img data-href="file_1" src="https://x/1.jpg" alt="one"></figure>\n' +
        '<img data-href="unknown" src="keep.jpg"><img data-href="file_2" src="https://x/2.jpg">',
    );
  });

  it("should return text without markers unchanged", () => {
    expect(rewriteRichText("plain <b>text</b>", lookup)).toBe("plain <b>text</b>");
  });

  it("should be idempotent", () => {
    const once = rewriteRichText('<img data-href="file_1" src="">', lookup);

    expect(rewriteRichText(once, lookup)).toBe(once);
  });

  it("should use a custom marker", () => {
    const marker = createMarker(/!\[\]\(media:([\w-]+)\)/, (_span, url) => `![](${url})`);

    expect(rewriteRichText("a ![](media:file_1) b", lookup, marker)).toBe("a ![](https://x/1.jpg) b");
  });
});

describe("replaceSrcAttribute", () => {
  it("should replace only the first src value", () => {
    expect(replaceSrcAttribute('data-src="a" src="b" src="c"', "https://x/y")).toBe(
      'data-src="a" src="https://x/y" src="c"',
    );
  });

  it("should leave spans without a src attribute alone", () => {
    expect(replaceSrcAttribute('data-id="v1"', "https://x/y")).toBe('data-id="v1"');
  });

  it("should insert URLs literally and escape quotes", () => {
    expect(replaceSrcAttribute('src=""', 'https://x/$&"q')).toBe('src="https://x/$&&quot;q"');
  });
});

describe("createMarker", () => {
  it("should count capture groups", () => {
    expect(countCaptureGroups(DEFAULT_MARKER.pattern)).toBe(1);
    expect(countCaptureGroups(/(?:a)(?<id>b)/)).toBe(1);
    expect(countCaptureGroups(/(a)|(b)/)).toBe(2);
    expect(countCaptureGroups(/abc/)).toBe(0);
  });

  it("should make the pattern global", () => {
    const marker = createMarker(/id=([a-z]+)/i);

    expect(marker.pattern.flags).toBe("gi");
    expect(marker.pattern.source).toBe("id=([a-z]+)");
  });

  it("should reject patterns without exactly one capture group", () => {
    expect(() => createMarker(/abc/)).toThrow(InvalidMarkerPatternError);

    const error = (() => {
      try {
        return createMarker(/(a)(b)/g);
      } catch (e) {
        return e;
      }
    })();
    expect(error).toBeInstanceOf(InvalidMarkerPatternError);
    if (!(error instanceof InvalidMarkerPatternError)) return;
    expect(error.groupCount).toBe(2);
    expect(error.code).toBe("MEDIA_INVALID_MARKER_PATTERN");
  });
});
