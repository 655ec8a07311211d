import { extractPage } from "../src/content.js";
import { FetchError } from "../src/errors.js";
import type { PageFetcher } from "../src/fetcher.js";
import type { PageResult } from "../src/types.js";
import { sleep } from "../src/utils.js";

export type StubResponse = string | FetchError;

/**
 * In-process site: each URL serves an HTML string (run through the real
 * extractPage) or rejects with the given FetchError. Unknown URLs are 404s.
 */
export class StubFetcher implements PageFetcher {
  readonly requested: string[] = [];
  opened = 0;
  closed = 0;
  latencyMs = 0;
  onFetch?: (url: string) => void;

  private readonly site: Map<string, StubResponse>;

  constructor(site: Record<string, StubResponse>) {
    this.site = new Map(Object.entries(site));
  }

  async open(): Promise<void> {
    this.opened += 1;
  }

  async fetch(url: string): Promise<PageResult> {
    this.requested.push(url);
    this.onFetch?.(url);
    if (this.latencyMs > 0) {
      await sleep(this.latencyMs);
    }
    const response = this.site.get(url);
    if (response === undefined) {
      throw new FetchError(url, "http_error", "HTTP 404 Not Found", 404);
    }
    if (response instanceof FetchError) {
      throw response;
    }
    return extractPage(response, url);
  }

  async close(): Promise<void> {
    this.closed += 1;
  }
}

export const linkPage = (title: string, hrefs: string[]): string =>
  `<html><head><title>${title}</title></head><body><main><h1>${title}</h1>${hrefs
    .map((href) => `<p><a href="${href}">${href}</a></p>`)
    .join("")}</main></body></html>`;
