export type QueryPolicy = "ignore" | "append";

export type ConflictPolicy = "overwrite" | "rename" | "abort";

export interface CrawlTarget {
  readonly startUrl: string;
  readonly outputRoot: string;
  readonly maxDepth: number;
  readonly quiet: boolean;
}

export interface CrawlLimits {
  concurrency: number;
  maxPages: number;
  timeBudgetMs: number;
  delayMs: number;
  queryPolicy: QueryPolicy;
}

export interface FetchSettings {
  timeoutMs: number;
  retries: number;
  userAgent: string;
  render: boolean;
}

export interface CrawlCliOptions extends CrawlLimits, FetchSettings {
  startUrl?: string;
  outDir: string;
  maxDepth: number;
  quiet: boolean;
  verbose: boolean;
  respectRobots: boolean;
}

export interface PageCliOptions extends FetchSettings {
  url?: string;
  outDir: string;
  output?: string;
  onExists: ConflictPolicy;
  quiet: boolean;
  verbose: boolean;
}

export interface FrontierEntry {
  url: string;
  depth: number;
}

export interface PageResult {
  url: string;
  title: string;
  markdown: string;
  outboundLinks: string[];
}

export interface RobotsPolicy {
  isAllowed: (pathname: string) => boolean;
  crawlDelayMs?: number;
  source: string;
}

export type CrawlState = "idle" | "running" | "draining" | "aborted" | "done";

export type StopReason = "cancelled" | "time-budget" | "page-budget";

export type FailureReason =
  | "timeout"
  | "http_error"
  | "navigation_error"
  | "permission_denied"
  | "disk_full"
  | "invalid_path";

export interface CrawlFailure {
  url: string;
  reason: FailureReason;
  message: string;
}

export interface SkipCounts {
  outOfScope: number;
  depthExceeded: number;
  robots: number;
}

export interface CrawlReport {
  state: CrawlState;
  startUrl: string;
  outputRoot: string;
  pagesWritten: number;
  files: string[];
  failures: CrawlFailure[];
  failureCounts: Partial<Record<FailureReason, number>>;
  skipped: SkipCounts;
  partial: boolean;
  stopReason?: StopReason;
  aborted: boolean;
  abortReason?: string;
  durationMs: number;
}
