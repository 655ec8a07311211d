import path from "node:path";
import { describe, expect, test } from "vitest";
import {
  defaultPageFilename,
  mapToPath,
  sanitizePathSegment,
} from "../src/paths.js";

const ROOT = path.join("out", "mirror");

describe("mapToPath", () => {
  test("directory URLs map to index.md", () => {
    expect(mapToPath("https://example.com/api/", ROOT)).toBe(
      path.join(ROOT, "api", "index.md")
    );
    expect(mapToPath("https://example.com/", ROOT)).toBe(
      path.join(ROOT, "index.md")
    );
  });

  test("leaf URLs map to <name>.md with document extensions removed", () => {
    expect(mapToPath("https://example.com/api/foo", ROOT)).toBe(
      path.join(ROOT, "api", "foo.md")
    );
    expect(mapToPath("https://example.com/api/guide.html", ROOT)).toBe(
      path.join(ROOT, "api", "guide.md")
    );
    expect(mapToPath("https://example.com/api/v1.2", ROOT)).toBe(
      path.join(ROOT, "api", "v1.2.md")
    );
  });

  test("scheme and host are not part of the path", () => {
    expect(mapToPath("http://other.org/api/foo", ROOT)).toBe(
      mapToPath("https://example.com/api/foo", ROOT)
    );
  });

  test("percent-encoded segments are decoded then sanitized", () => {
    expect(mapToPath("https://example.com/api/my%20page", ROOT)).toBe(
      path.join(ROOT, "api", "my_page.md")
    );
  });

  test("a last segment that sanitizes to nothing stays inside its directory", () => {
    const expected = path.join(ROOT, "api", "untitled.md");
    expect(mapToPath("https://example.com/api/_", ROOT)).toBe(expected);
    expect(mapToPath("https://example.com/api/%20", ROOT)).toBe(expected);
    expect(mapToPath("https://example.com/api/...", ROOT)).toBe(expected);
    expect(mapToPath("https://example.com/api/_", ROOT)).not.toBe(
      mapToPath("https://example.com/api", ROOT)
    );
  });

  test("query strings are ignored unless the append policy is used", () => {
    expect(mapToPath("https://example.com/api/foo?tab=2", ROOT)).toBe(
      path.join(ROOT, "api", "foo.md")
    );
    expect(mapToPath("https://example.com/api/foo?tab=2", ROOT, "append")).toBe(
      path.join(ROOT, "api", "foo_tab_2.md")
    );
    expect(mapToPath("https://example.com/api/?page=2", ROOT, "append")).toBe(
      path.join(ROOT, "api", "index_page_2.md")
    );
  });

  test("is deterministic", () => {
    const url = "https://example.com/api/extensions/overview";
    expect(mapToPath(url, ROOT)).toBe(mapToPath(url, ROOT));
  });
});

describe("sanitizePathSegment", () => {
  test("replaces unsafe characters and trims edge punctuation", () => {
    expect(sanitizePathSegment('a<b>:c"d')).toBe("a_b_c_d");
    expect(sanitizePathSegment("..hidden..")).toBe("hidden");
    expect(sanitizePathSegment("__x__")).toBe("x");
  });

  test("caps the length", () => {
    expect(sanitizePathSegment("a".repeat(120))).toHaveLength(100);
  });
});

describe("defaultPageFilename", () => {
  test("uses the last segment without its extension", () => {
    expect(defaultPageFilename("https://example.com/docs/intro.html")).toBe(
      "intro.md"
    );
    expect(defaultPageFilename("https://example.com/a/b%20c")).toBe("b_c.md");
  });

  test("falls back to the host for a bare domain", () => {
    expect(defaultPageFilename("https://example.com/")).toBe("example_com.md");
  });
});
