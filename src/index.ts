export { parseArgs, type ParseResult } from "./args.js";
export { main, run, runCrawl } from "./cli.js";
export { extractPage } from "./content.js";
export { Crawler, crawlSite, type CrawlerOptions } from "./crawler.js";
export { ConfigError, FetchError, WriteError } from "./errors.js";
export {
  BrowserPageFetcher,
  createPageFetcher,
  HttpPageFetcher,
  type PageFetcher,
} from "./fetcher.js";
export { Frontier } from "./frontier.js";
export { defaultPageFilename, mapToPath, sanitizePathSegment } from "./paths.js";
export { scrapePage } from "./page.js";
export { loadRobotsPolicy, parseRobotsTxt } from "./robots.js";
export {
  canonicalKey,
  classifyCandidate,
  createScope,
  isInScope,
  normalizeCandidate,
} from "./scope.js";
export type * from "./types.js";
export { ensureWritableRoot, writeMarkdown } from "./writer.js";
