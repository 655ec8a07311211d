import path from "node:path";
import { DEFAULT_CRAWL_OPTIONS } from "./constants.js";
import {
  ConfigError,
  describeError,
  FetchError,
  WriteError,
} from "./errors.js";
import type { PageFetcher } from "./fetcher.js";
import { Frontier } from "./frontier.js";
import { logger } from "./logger.js";
import { mapToPath } from "./paths.js";
import { buildAllowAllPolicy } from "./robots.js";
import {
  type CrawlScope,
  canonicalKey,
  classifyCandidate,
  createScope,
  normalizeCandidate,
} from "./scope.js";
import type {
  CrawlFailure,
  CrawlLimits,
  CrawlReport,
  CrawlState,
  CrawlTarget,
  FailureReason,
  FrontierEntry,
  PageResult,
  RobotsPolicy,
  SkipCounts,
  StopReason,
} from "./types.js";
import { sleep } from "./utils.js";
import { ensureWritableRoot, writeMarkdown } from "./writer.js";

const IDLE_POLL_MS = 5;

export interface CrawlerOptions {
  target: CrawlTarget;
  fetcher: PageFetcher;
  limits?: Partial<CrawlLimits>;
  robots?: RobotsPolicy;
  /** Aborting starts a graceful drain. */
  signal?: AbortSignal;
  writePage?: (filePath: string, content: string) => Promise<void>;
}

const DEFAULT_LIMITS: CrawlLimits = {
  concurrency: DEFAULT_CRAWL_OPTIONS.concurrency,
  maxPages: DEFAULT_CRAWL_OPTIONS.maxPages,
  timeBudgetMs: DEFAULT_CRAWL_OPTIONS.timeBudgetMs,
  delayMs: DEFAULT_CRAWL_OPTIONS.delayMs,
  queryPolicy: DEFAULT_CRAWL_OPTIONS.queryPolicy,
};

const isCountAtLeast = (value: number, minimum: number): boolean =>
  Number.isInteger(value) && value >= minimum;

/**
 * Reject a target the crawl could never start from.
 */
export function validateTarget(target: CrawlTarget): URL {
  if (!isCountAtLeast(target.maxDepth, 0)) {
    throw new ConfigError(
      `Depth must be a non-negative integer (got ${target.maxDepth})`
    );
  }
  if (!target.outputRoot.trim()) {
    throw new ConfigError("An output directory is required");
  }
  let start: URL;
  try {
    start = new URL(target.startUrl);
  } catch {
    throw new ConfigError(`"${target.startUrl}" is not a valid URL`);
  }
  if (start.protocol !== "http:" && start.protocol !== "https:") {
    throw new ConfigError(
      `Start URL must use http or https (got ${start.protocol})`
    );
  }
  return start;
}

function validateLimits(limits: CrawlLimits): void {
  if (!isCountAtLeast(limits.concurrency, 1)) {
    throw new ConfigError("Concurrency must be a positive integer");
  }
  if (!isCountAtLeast(limits.maxPages, 1)) {
    throw new ConfigError("maxPages must be a positive integer");
  }
  if (!(isCountAtLeast(limits.timeBudgetMs, 0) && limits.delayMs >= 0)) {
    throw new ConfigError("Time budget and delay must not be negative");
  }
}

/**
 * Breadth-first, depth-bounded mirror of one site subtree.
 *
 * idle -> running -> (draining) -> done, or idle -> aborted -> done when
 * the output root or the fetcher cannot be set up. Page-level fetch and
 * write failures are counted and never end the crawl.
 */
export class Crawler {
  readonly target: CrawlTarget;
  readonly limits: CrawlLimits;
  private readonly scope: CrawlScope;
  private readonly startUrl: URL;
  private readonly fetcher: PageFetcher;
  private readonly robots: RobotsPolicy;
  private readonly signal?: AbortSignal;
  private readonly writePage: (
    filePath: string,
    content: string
  ) => Promise<void>;

  private readonly frontier = new Frontier();
  private currentState: CrawlState = "idle";
  private stopReason: StopReason | undefined;
  private startedAt = 0;
  private inFlight = 0;
  private pagesWritten = 0;
  private readonly files: string[] = [];
  private readonly failures: CrawlFailure[] = [];
  private readonly skippedKeys = {
    outOfScope: new Set<string>(),
    depthExceeded: new Set<string>(),
  };
  private robotsSkipped = 0;

  private throttle: Promise<void> = Promise.resolve();
  private nextRequestAt = 0;

  constructor(options: CrawlerOptions) {
    this.target = Object.freeze({ ...options.target });
    this.limits = { ...DEFAULT_LIMITS, ...options.limits };
    validateLimits(this.limits);
    const start = validateTarget(this.target);
    const normalizedStart = normalizeCandidate(
      start.toString(),
      start,
      this.limits.queryPolicy
    );
    this.startUrl = normalizedStart ?? start;
    this.scope = createScope(this.startUrl, this.limits.queryPolicy);
    this.fetcher = options.fetcher;
    this.robots = options.robots ?? buildAllowAllPolicy();
    this.signal = options.signal;
    this.writePage = options.writePage ?? writeMarkdown;
  }

  get state(): CrawlState {
    return this.currentState;
  }

  async run(): Promise<CrawlReport> {
    if (this.currentState !== "idle") {
      throw new Error("A crawler can only run once");
    }
    const previousQuiet = logger.quiet;
    logger.configure({ quiet: this.target.quiet });
    try {
      return await this.execute();
    } finally {
      logger.configure({ quiet: previousQuiet });
    }
  }

  private async execute(): Promise<CrawlReport> {
    this.startedAt = Date.now();
    this.frontier.enqueue(
      { url: this.startUrl.toString(), depth: 0 },
      canonicalKey(this.startUrl)
    );

    try {
      await ensureWritableRoot(this.target.outputRoot);
      await this.fetcher.open();
    } catch (error) {
      return this.finish(describeError(error));
    }

    this.currentState = "running";
    logger.logCrawlStart(this.startUrl.toString(), {
      outputRoot: this.target.outputRoot,
      maxDepth: this.target.maxDepth,
      concurrency: this.limits.concurrency,
      maxPages: this.limits.maxPages,
      queryPolicy: this.limits.queryPolicy,
      robots: this.robots.source,
    });
    logger.startProgress(1);

    try {
      const workers: Promise<void>[] = [];
      for (let i = 0; i < this.limits.concurrency; i += 1) {
        workers.push(this.worker());
      }
      await Promise.all(workers);
    } finally {
      logger.endProgress();
      await this.closeFetcher();
    }

    return this.finish();
  }

  private async closeFetcher(): Promise<void> {
    try {
      await this.fetcher.close();
    } catch (error) {
      logger.warn(`Could not close page fetcher: ${describeError(error)}`);
    }
  }

  private finish(abortReason?: string): CrawlReport {
    if (abortReason !== undefined) {
      this.currentState = "aborted";
      logger.error(`Crawl aborted: ${abortReason}`);
    }
    const aborted = this.currentState === "aborted";
    this.currentState = "done";

    const failureCounts: Partial<Record<FailureReason, number>> = {};
    for (const failure of this.failures) {
      failureCounts[failure.reason] = (failureCounts[failure.reason] ?? 0) + 1;
    }
    const skipped: SkipCounts = {
      outOfScope: this.skippedKeys.outOfScope.size,
      depthExceeded: this.skippedKeys.depthExceeded.size,
      robots: this.robotsSkipped,
    };

    const report: CrawlReport = {
      state: this.currentState,
      startUrl: this.startUrl.toString(),
      outputRoot: this.target.outputRoot,
      pagesWritten: this.pagesWritten,
      files: [...this.files],
      failures: [...this.failures],
      failureCounts,
      skipped,
      partial:
        !aborted &&
        (this.stopReason === "cancelled" || this.frontier.pending > 0),
      stopReason: this.stopReason,
      aborted,
      abortReason,
      durationMs: Date.now() - this.startedAt,
    };
    logger.printCrawlSummary(report);
    return report;
  }

  /**
   * Checked before each entry is taken, and again by a worker holding an
   * entry just before it fetches. Once a stop condition holds the crawl
   * drains: nothing new starts, in-flight pages finish.
   *
   * A worker holding an entry already counts in `inFlight`, so the page
   * budget is only checked when taking entries.
   */
  private shouldStop(holdingEntry = false): boolean {
    if (this.stopReason) {
      return true;
    }
    let reason: StopReason | undefined;
    const hasWork = holdingEntry || this.frontier.pending > 0;
    if (this.signal?.aborted) {
      reason = "cancelled";
    } else if (
      hasWork &&
      this.limits.timeBudgetMs > 0 &&
      Date.now() - this.startedAt >= this.limits.timeBudgetMs
    ) {
      reason = "time-budget";
    } else if (
      !holdingEntry &&
      hasWork &&
      this.pagesWritten + this.inFlight >= this.limits.maxPages
    ) {
      reason = "page-budget";
    }
    if (!reason) {
      return false;
    }
    this.stopReason = reason;
    this.currentState = "draining";
    if (this.inFlight > 0 || this.frontier.pending > 0) {
      logger.warn(
        `Stopping (${reason}); letting ${this.inFlight} in-flight page(s) finish`
      );
    }
    return true;
  }

  private async worker(): Promise<void> {
    while (!this.shouldStop()) {
      const entry = this.frontier.next();
      if (!entry) {
        if (this.inFlight === 0) {
          return;
        }
        await sleep(IDLE_POLL_MS);
        continue;
      }
      this.inFlight += 1;
      try {
        await this.process(entry);
      } finally {
        this.inFlight -= 1;
        this.reportProgress(entry.url);
      }
    }
  }

  private reportProgress(url: string): void {
    const done = this.pagesWritten + this.failures.length;
    logger.updateProgress(
      done,
      done + this.inFlight + this.frontier.pending,
      url
    );
  }

  private async rateLimit(): Promise<void> {
    const delay = Math.max(this.limits.delayMs, this.robots.crawlDelayMs ?? 0);
    if (delay <= 0) {
      return;
    }
    let release: () => void = () => undefined;
    const previous = this.throttle;
    this.throttle = new Promise((resolve) => {
      release = resolve;
    });
    await previous;
    const now = Date.now();
    const wait = Math.max(0, this.nextRequestAt - now);
    this.nextRequestAt = Math.max(now, this.nextRequestAt) + delay;
    release();
    if (wait > 0) {
      await sleep(wait);
    }
  }

  private async process(entry: FrontierEntry): Promise<void> {
    if (entry.depth > this.target.maxDepth) {
      this.skipDepth(canonicalKey(new URL(entry.url)), entry.url);
      return;
    }
    const url = new URL(entry.url);
    if (!this.robots.isAllowed(url.pathname)) {
      this.robotsSkipped += 1;
      logger.logSkipped(entry.url, "robots.txt");
      return;
    }

    await this.rateLimit();
    if (this.shouldStop(true)) {
      this.frontier.putBack(entry);
      return;
    }
    this.reportProgress(entry.url);

    let page: PageResult;
    try {
      page = await this.fetcher.fetch(entry.url);
    } catch (error) {
      this.recordFailure(entry.url, error, "navigation_error");
      return;
    }

    const filePath = mapToPath(
      entry.url,
      this.target.outputRoot,
      this.limits.queryPolicy
    );
    try {
      await this.writePage(filePath, page.markdown);
      this.pagesWritten += 1;
      this.files.push(path.relative(this.target.outputRoot, filePath));
      logger.logPageSaved(entry.url, entry.depth, filePath);
    } catch (error) {
      this.recordFailure(entry.url, error, "invalid_path");
    }

    this.expand(page, entry.depth);
  }

  private expand(page: PageResult, depth: number): void {
    const childDepth = depth + 1;
    for (const link of page.outboundLinks) {
      if (this.stopReason) {
        return;
      }
      const candidate = classifyCandidate(link, page.url, this.scope);
      if (candidate.verdict === "invalid") {
        continue;
      }
      if (candidate.verdict !== "in-scope") {
        this.skipOutOfScope(candidate.key, link, candidate.verdict);
        continue;
      }
      if (this.frontier.hasSeen(candidate.key)) {
        continue;
      }
      if (childDepth > this.target.maxDepth) {
        this.skipDepth(candidate.key, link);
        continue;
      }
      this.frontier.enqueue(
        { url: candidate.url.toString(), depth: childDepth },
        candidate.key
      );
    }
  }

  private skipOutOfScope(key: string, url: string, verdict: string): void {
    if (this.skippedKeys.outOfScope.has(key)) {
      return;
    }
    this.skippedKeys.outOfScope.add(key);
    logger.logSkipped(url, verdict);
  }

  private skipDepth(key: string, url: string): void {
    if (this.skippedKeys.depthExceeded.has(key)) {
      return;
    }
    this.skippedKeys.depthExceeded.add(key);
    logger.logSkipped(url, `beyond depth ${this.target.maxDepth}`);
  }

  private recordFailure(
    url: string,
    error: unknown,
    fallback: FailureReason
  ): void {
    const reason =
      error instanceof FetchError || error instanceof WriteError
        ? error.reason
        : fallback;
    const message = describeError(error);
    this.failures.push({ url, reason, message });
    logger.recordFailure();
    logger.logPageFailed(url, reason, message);
  }
}

/**
 * Convenience wrapper: build a crawler and run it once.
 */
export async function crawlSite(options: CrawlerOptions): Promise<CrawlReport> {
  return await new Crawler(options).run();
}
