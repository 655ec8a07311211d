import path from "node:path";
import { ConfigError } from "./errors.js";
import type { PageFetcher } from "./fetcher.js";
import { logger } from "./logger.js";
import { defaultPageFilename } from "./paths.js";
import type { ConflictPolicy, PageCliOptions, PageResult } from "./types.js";
import { fileExists } from "./utils.js";
import { writeMarkdown } from "./writer.js";

const MARKDOWN_EXTENSION_REGEX = /\.md$/i;

export interface PageScrapeResult {
  filePath: string;
  page: PageResult;
}

/**
 * Decide where a single page goes when `filePath` is taken: overwrite it,
 * pick the first free `name_N.md`, or refuse.
 */
export async function resolveConflict(
  filePath: string,
  policy: ConflictPolicy
): Promise<string> {
  if (policy === "overwrite" || !(await fileExists(filePath))) {
    return filePath;
  }
  if (policy === "abort") {
    throw new ConfigError(`File "${filePath}" already exists`);
  }
  const { dir, name, ext } = path.parse(filePath);
  for (let counter = 1; ; counter += 1) {
    const candidate = path.join(dir, `${name}_${counter}${ext}`);
    if (!(await fileExists(candidate))) {
      return candidate;
    }
  }
}

export function resolveOutputFile(options: PageCliOptions, url: URL): string {
  const requested =
    options.output ?? path.join(options.outDir, defaultPageFilename(url));
  return MARKDOWN_EXTENSION_REGEX.test(requested)
    ? requested
    : `${requested}.md`;
}

export async function scrapePage(
  options: PageCliOptions,
  fetcher: PageFetcher
): Promise<PageScrapeResult> {
  if (!options.url) {
    throw new ConfigError("Provide a URL to scrape");
  }
  let url: URL;
  try {
    url = new URL(options.url);
  } catch {
    throw new ConfigError(`"${options.url}" is not a valid URL`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ConfigError(`URL must use http or https (got ${url.protocol})`);
  }
  url.hash = "";

  const filePath = await resolveConflict(
    resolveOutputFile(options, url),
    options.onExists
  );

  await fetcher.open();
  let page: PageResult;
  try {
    page = await fetcher.fetch(url.toString());
  } finally {
    await fetcher.close();
  }

  await writeMarkdown(filePath, page.markdown);
  if (!options.quiet) {
    logger.success(`Saved ${url.toString()} -> ${filePath}`);
  }
  return { filePath, page };
}
