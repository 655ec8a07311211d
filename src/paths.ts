import path from "node:path";
import { splitPath } from "./scope.js";
import type { QueryPolicy } from "./types.js";

const UNSAFE_CHARS_REGEX = /[<>:"/\\|?*\s]/g;
const UNDERSCORE_RUN_REGEX = /_+/g;
const EDGE_PUNCTUATION_REGEX = /^[._]+|[._]+$/g;
const QUERY_SEPARATORS_REGEX = /[=&]/g;
// ".html", ".md", ".aspx"; not "1.2" or "v1.2"
const DOCUMENT_EXTENSION_REGEX = /\.[a-z][a-z0-9]{0,4}$/i;

const MAX_SEGMENT_LENGTH = 100;
const MAX_FILENAME_LENGTH = 150;
const INDEX_NAME = "index";
const FALLBACK_PAGE_NAME = "scraped_page";
const UNNAMED_PAGE_NAME = "untitled";

export function sanitizePathSegment(
  segment: string,
  maxLength = MAX_SEGMENT_LENGTH
): string {
  return segment
    .replace(UNSAFE_CHARS_REGEX, "_")
    .replace(UNDERSCORE_RUN_REGEX, "_")
    .slice(0, maxLength)
    .replace(EDGE_PUNCTUATION_REGEX, "");
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

const toSafeSegment = (segment: string): string =>
  sanitizePathSegment(decodeSegment(segment));

function querySuffix(search: string): string {
  if (search.length <= 1) {
    return "";
  }
  const flattened = decodeSegment(search.slice(1)).replace(
    QUERY_SEPARATORS_REGEX,
    "_"
  );
  return sanitizePathSegment(flattened);
}

/**
 * Map a page URL to the Markdown file that mirrors it under `outputRoot`.
 *
 * `/a/b/` and `/` become `a/b/index.md` and `index.md`; `/a/b` and
 * `/a/b.html` both become `a/b.md`. A last segment with nothing safe left
 * in it (`/a/_`) becomes `a/untitled.md`. Scheme and host are dropped.
 */
export function mapToPath(
  url: string | URL,
  outputRoot: string,
  queryPolicy: QueryPolicy = "ignore"
): string {
  const parsed = new URL(url);
  const rawSegments = parsed.pathname.split("/");
  // The filename comes from the raw last segment; an empty one means a
  // directory URL.
  const rawLast = rawSegments.pop() ?? "";
  const segments = rawSegments
    .map(toSafeSegment)
    .filter((segment) => segment.length > 0);

  const last = toSafeSegment(rawLast);
  let baseName: string;
  if (!rawLast) {
    baseName = INDEX_NAME;
  } else if (!last) {
    baseName = UNNAMED_PAGE_NAME;
  } else {
    baseName = last.replace(DOCUMENT_EXTENSION_REGEX, "") || last;
  }

  if (queryPolicy === "append") {
    const suffix = querySuffix(parsed.search);
    if (suffix) {
      baseName = `${baseName}_${suffix}`;
    }
  }

  return path.join(outputRoot, ...segments, `${baseName}.md`);
}

/**
 * Name for a single scraped page: the last path segment without its
 * extension, or the host with dots as underscores for a bare domain.
 */
export function defaultPageFilename(url: string | URL): string {
  const parsed = new URL(url);
  const last = splitPath(parsed.pathname).map(decodeSegment).at(-1);
  const name = last
    ? path.parse(last).name
    : parsed.hostname.replaceAll(".", "_");
  const safe = sanitizePathSegment(name, MAX_FILENAME_LENGTH);
  return `${safe || FALLBACK_PAGE_NAME}.md`;
}
