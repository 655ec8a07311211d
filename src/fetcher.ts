import type { Browser, Page } from "playwright";
import { extractPage } from "./content.js";
import { ConfigError, describeError, FetchError } from "./errors.js";
import { logger } from "./logger.js";
import type { FetchSettings, PageResult } from "./types.js";

const HTML_ACCEPT_HEADER =
  "text/html,application/xhtml+xml;q=0.9,text/plain;q=0.5,*/*;q=0.1";
const HTML_CONTENT_TYPE_REGEX = /\b(text\/html|application\/xhtml\+xml)\b/i;

/**
 * Retrieves one page and hands back its Markdown and outbound links.
 * `fetch` rejects with FetchError; a fetcher serves one crawl between
 * `open` and `close`.
 */
export interface PageFetcher {
  open(): Promise<void>;
  fetch(url: string): Promise<PageResult>;
  close(): Promise<void>;
}

type HttpSettings = Pick<FetchSettings, "timeoutMs" | "retries" | "userAgent">;

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

interface FetchedText {
  text: string;
  finalUrl: string;
}

async function fetchTextOnce(
  targetUrl: string,
  timeoutMs: number,
  headers: Record<string, string>,
  requireHtml: boolean
): Promise<FetchedText> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(targetUrl, {
      headers,
      signal: controller.signal,
    });
    if (!response.ok) {
      throw new FetchError(
        targetUrl,
        "http_error",
        `HTTP ${response.status} ${response.statusText}`.trim(),
        response.status
      );
    }
    const contentType = response.headers.get("content-type") ?? "";
    if (
      requireHtml &&
      contentType &&
      !HTML_CONTENT_TYPE_REGEX.test(contentType)
    ) {
      throw new FetchError(
        targetUrl,
        "navigation_error",
        `Unsupported content type ${contentType}`,
        response.status
      );
    }
    const text = await response.text();
    return { text, finalUrl: response.url || targetUrl };
  } catch (error) {
    if (error instanceof FetchError) {
      throw error;
    }
    if (isAbortError(error)) {
      throw new FetchError(
        targetUrl,
        "timeout",
        `Timed out after ${timeoutMs}ms`
      );
    }
    throw new FetchError(targetUrl, "navigation_error", describeError(error));
  } finally {
    clearTimeout(timer);
  }
}

/** Single attempt, any content type. Used for robots.txt. */
export async function fetchWithTimeout(
  targetUrl: string,
  timeoutMs: number,
  userAgent: string
): Promise<string> {
  const { text } = await fetchTextOnce(
    targetUrl,
    timeoutMs,
    { "User-Agent": userAgent },
    false
  );
  return text;
}

// Client errors and wrong content types will not change on a retry.
function isRetryable(error: FetchError): boolean {
  return error.status === undefined || error.status >= 500;
}

export async function fetchHtmlWithRetries(
  targetUrl: string,
  options: HttpSettings
): Promise<FetchedText> {
  const maxAttempts = options.retries + 1;
  let lastError: FetchError | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    logger.logFetch(targetUrl, attempt, maxAttempts);
    try {
      return await fetchTextOnce(
        targetUrl,
        options.timeoutMs,
        { "User-Agent": options.userAgent, Accept: HTML_ACCEPT_HEADER },
        true
      );
    } catch (error) {
      const failure =
        error instanceof FetchError
          ? error
          : new FetchError(targetUrl, "navigation_error", describeError(error));
      lastError = failure;
      logger.logFetchError(targetUrl, attempt, failure.message);
      if (!isRetryable(failure)) {
        break;
      }
    }
  }

  throw (
    lastError ??
    new FetchError(targetUrl, "navigation_error", "Failed to fetch URL")
  );
}

/**
 * Plain HTTP fetcher. No JavaScript runs, so client-rendered pages come
 * back as their server shell.
 */
export class HttpPageFetcher implements PageFetcher {
  private readonly settings: HttpSettings;

  constructor(settings: HttpSettings) {
    this.settings = settings;
  }

  async open(): Promise<void> {
    logger.debug("Using plain HTTP fetcher");
  }

  async fetch(url: string): Promise<PageResult> {
    const { text, finalUrl } = await fetchHtmlWithRetries(url, this.settings);
    return extractPage(text, url, finalUrl);
  }

  async close(): Promise<void> {
    logger.debug("HTTP fetcher closed");
  }
}

/**
 * Headless Chromium through Playwright. Holds `sessions` tabs and lends
 * each one to a single fetch at a time.
 */
export class BrowserPageFetcher implements PageFetcher {
  private readonly settings: Pick<FetchSettings, "timeoutMs" | "userAgent">;
  private readonly sessions: number;
  private browser: Browser | null = null;
  private readonly idle: Page[] = [];
  private readonly waiting: Array<(page: Page) => void> = [];

  constructor(
    settings: Pick<FetchSettings, "timeoutMs" | "userAgent">,
    sessions = 1
  ) {
    this.settings = settings;
    this.sessions = Math.max(1, sessions);
  }

  async open(): Promise<void> {
    if (this.browser) {
      return;
    }
    try {
      const { chromium } = await import("playwright");
      const browser = await chromium.launch({ headless: true });
      this.browser = browser;
      const context = await browser.newContext({
        userAgent: this.settings.userAgent,
      });
      for (let i = 0; i < this.sessions; i += 1) {
        const page = await context.newPage();
        page.setDefaultNavigationTimeout(this.settings.timeoutMs);
        this.idle.push(page);
      }
    } catch (error) {
      await this.close();
      throw new ConfigError(
        `Could not launch headless Chromium (${describeError(error)}). Run "docs-mirror setup" to install it, or pass --no-render.`,
        { cause: error }
      );
    }
    logger.debug(`Browser ready with ${this.sessions} session(s)`);
  }

  private acquire(): Promise<Page> {
    const page = this.idle.pop();
    if (page) {
      return Promise.resolve(page);
    }
    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  private release(page: Page): void {
    const next = this.waiting.shift();
    if (next) {
      next(page);
      return;
    }
    this.idle.push(page);
  }

  async fetch(url: string): Promise<PageResult> {
    if (!this.browser) {
      throw new FetchError(url, "navigation_error", "Browser is not open");
    }
    const page = await this.acquire();
    try {
      logger.logFetch(url, 1, 1);
      const html = await this.navigate(page, url);
      return extractPage(html, url, page.url() || url);
    } finally {
      this.release(page);
    }
  }

  private async navigate(page: Page, url: string): Promise<string> {
    try {
      const response = await page.goto(url, {
        waitUntil: "networkidle",
        timeout: this.settings.timeoutMs,
      });
      if (response && !response.ok()) {
        throw new FetchError(
          url,
          "http_error",
          `HTTP ${response.status()} ${response.statusText()}`.trim(),
          response.status()
        );
      }
      return await page.content();
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }
      if (error instanceof Error && error.name === "TimeoutError") {
        throw new FetchError(
          url,
          "timeout",
          `Page did not settle within ${this.settings.timeoutMs}ms`
        );
      }
      throw new FetchError(url, "navigation_error", describeError(error));
    }
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.idle.length = 0;
    if (browser) {
      await browser.close();
    }
  }
}

export function createPageFetcher(
  settings: FetchSettings,
  sessions: number
): PageFetcher {
  if (settings.render) {
    return new BrowserPageFetcher(settings, sessions);
  }
  return new HttpPageFetcher(settings);
}
