import { ASSET_EXTENSIONS_REGEX } from "./constants.js";
import type { QueryPolicy } from "./types.js";

const TRAILING_SLASHES_REGEX = /\/+$/;

export interface CrawlScope {
  /** Host including any port, as `URL#host` reports it. */
  host: string;
  pathSegments: string[];
  queryPolicy: QueryPolicy;
}

export type Candidate =
  | { verdict: "invalid" }
  | {
      verdict: "in-scope" | "out-of-scope" | "not-a-page";
      url: URL;
      key: string;
    };

export function splitPath(pathname: string): string[] {
  return pathname.split("/").filter((segment) => segment.length > 0);
}

export function createScope(
  startUrl: string | URL,
  queryPolicy: QueryPolicy = "ignore"
): CrawlScope {
  const start = new URL(startUrl);
  return {
    host: start.host,
    pathSegments: splitPath(start.pathname),
    queryPolicy,
  };
}

/**
 * Resolve an href found on `base` into the URL the crawl would fetch.
 * Returns null for anchors-only references and non-HTTP(S) schemes.
 */
export function normalizeCandidate(
  href: string,
  base: string | URL,
  queryPolicy: QueryPolicy
): URL | null {
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return null;
  }
  let target: URL;
  try {
    target = new URL(trimmed, base);
  } catch {
    return null;
  }
  if (target.protocol !== "http:" && target.protocol !== "https:") {
    return null;
  }
  target.hash = "";
  if (queryPolicy === "ignore") {
    target.search = "";
  } else {
    target.searchParams.sort();
  }
  return target;
}

/**
 * Deduplication key: host and path without a trailing slash, plus the
 * query when it survived normalization. The scheme is left out.
 */
export function canonicalKey(url: URL): string {
  const pathname = url.pathname.replace(TRAILING_SLASHES_REGEX, "") || "/";
  return `${url.host}${pathname}${url.search}`;
}

export function isInScope(url: URL, scope: CrawlScope): boolean {
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    return false;
  }
  if (url.host !== scope.host) {
    return false;
  }
  const segments = splitPath(url.pathname);
  if (segments.length < scope.pathSegments.length) {
    return false;
  }
  return scope.pathSegments.every((segment, index) => segments[index] === segment);
}

export function classifyCandidate(
  href: string,
  base: string | URL,
  scope: CrawlScope
): Candidate {
  const url = normalizeCandidate(href, base, scope.queryPolicy);
  if (!url) {
    return { verdict: "invalid" };
  }
  const key = canonicalKey(url);
  if (!isInScope(url, scope)) {
    return { verdict: "out-of-scope", url, key };
  }
  if (ASSET_EXTENSIONS_REGEX.test(url.pathname)) {
    return { verdict: "not-a-page", url, key };
  }
  return { verdict: "in-scope", url, key };
}
