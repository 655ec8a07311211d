import { Readability } from "@mozilla/readability";
import { JSDOM } from "jsdom";
import { CHROME_SELECTORS, turndownService } from "./constants.js";
import type { PageResult } from "./types.js";

export function resolveDocumentBaseUrl(document: Document, base: URL): URL {
  const baseHref = document.querySelector("base[href]")?.getAttribute("href");
  if (!baseHref) {
    return base;
  }
  try {
    return new URL(baseHref, base);
  } catch {
    return base;
  }
}

/**
 * Every anchor's absolute URL in document order. Repeats are kept; the
 * crawl frontier deduplicates.
 */
export function collectLinks(document: Document, pageUrl: URL): string[] {
  const base = resolveDocumentBaseUrl(document, pageUrl);
  const links: string[] = [];
  for (const anchor of document.querySelectorAll("a[href]")) {
    const href = anchor.getAttribute("href")?.trim();
    if (!href) {
      continue;
    }
    const resolved = tryResolve(href, base);
    if (resolved) {
      links.push(resolved);
    }
  }
  return links;
}

function tryResolve(href: string, base: URL): string | null {
  try {
    return new URL(href, base).toString();
  } catch {
    return null;
  }
}

export function stripChrome(document: Document): string {
  for (const selector of CHROME_SELECTORS) {
    for (const element of document.querySelectorAll(selector)) {
      element.remove();
    }
  }
  const main = document.querySelector("main") ?? document.body;
  return main?.innerHTML ?? "";
}

function buildHeader(pageUrl: string, title: string): string {
  return [
    "---",
    `Source: ${pageUrl}`,
    `Fetched: ${new Date().toISOString()}`,
    "---",
    "",
    `# ${title}`,
    "",
    "",
  ].join("\n");
}

/**
 * Turn rendered HTML into a PageResult: Readability picks the article,
 * falling back to the page without navigation chrome, then the raw body.
 *
 * `documentUrl` is where the HTML actually came from after redirects and
 * is what relative links resolve against; `pageUrl` names the result.
 */
export function extractPage(
  html: string,
  pageUrl: string,
  documentUrl: string = pageUrl
): PageResult {
  const readerDom = new JSDOM(html, { url: documentUrl });
  const readerDocument = readerDom.window.document;
  // Readability mutates its document, so links are read first.
  const outboundLinks = collectLinks(readerDocument, new URL(documentUrl));
  const rawBodyHtml = readerDocument.body?.innerHTML ?? "";
  const documentTitle = readerDocument.title.trim();

  const article = new Readability(readerDocument).parse();

  let mainHtml = article?.content ?? "";
  if (mainHtml.trim().length === 0) {
    const cleaningDocument = new JSDOM(html, { url: documentUrl }).window
      .document;
    const cleaned = stripChrome(cleaningDocument);
    mainHtml = cleaned.trim().length > 0 ? cleaned : rawBodyHtml;
  }

  const title = article?.title?.trim() || documentTitle || pageUrl;
  const body = turndownService.turndown(mainHtml).trim();

  return {
    url: pageUrl,
    title,
    markdown: `${buildHeader(pageUrl, title)}${body}\n`,
    outboundLinks,
  };
}
