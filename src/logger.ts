/**
 * Centralized console logging with an optional progress bar.
 *
 * `verbose` adds timestamps and debug lines. `quiet` hides per-page
 * progress (saved, failed, skipped lines and the progress bar); errors,
 * warnings and the final crawl summary always print.
 */

import type { CrawlReport } from "./types.js";

const ANSI = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",

  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",

  clearLine: "\x1b[2K",
  cursorToStart: "\x1b[0G",
  hideCursor: "\x1b[?25l",
  showCursor: "\x1b[?25h",
} as const;

export type LogLevel = "debug" | "info" | "success" | "warn" | "error";

interface LoggerConfig {
  verbose: boolean;
  quiet: boolean;
}

interface ProgressState {
  done: number;
  total: number;
  currentUrl: string;
  failures: number;
  startTime: number;
}

const PROGRESS_BAR_WIDTH = 30;
const MIN_TERMINAL_WIDTH = 80;
const PROGRESS_FIXED_WIDTH = 60;

const levelStyles: Record<LogLevel, { color: string; prefix: string }> = {
  debug: { color: ANSI.gray, prefix: "DEBUG" },
  info: { color: ANSI.blue, prefix: "INFO" },
  success: { color: ANSI.green, prefix: "OK" },
  warn: { color: ANSI.yellow, prefix: "WARN" },
  error: { color: ANSI.red, prefix: "ERROR" },
};

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) {
    return `${seconds}s`;
  }
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${seconds % 60}s`;
}

class Logger {
  private config: LoggerConfig = { verbose: false, quiet: false };
  private progress: ProgressState | null = null;
  private lastProgressLine = "";
  private readonly isTerminal = process.stdout.isTTY ?? false;

  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  get verbose(): boolean {
    return this.config.verbose;
  }

  get quiet(): boolean {
    return this.config.quiet;
  }

  private formatMessage(level: LogLevel, message: string): string {
    const style = levelStyles[level];
    const timestamp = this.config.verbose
      ? `${ANSI.dim}[${new Date().toISOString().slice(11, 23)}]${ANSI.reset} `
      : "";
    return `${timestamp}${style.color}${ANSI.bold}[${style.prefix}]${ANSI.reset} ${message}`;
  }

  private clearProgressLine(): void {
    if (this.isTerminal && this.lastProgressLine) {
      process.stdout.write(`${ANSI.cursorToStart}${ANSI.clearLine}`);
      this.lastProgressLine = "";
    }
  }

  private writeLog(level: LogLevel, message: string): void {
    this.clearProgressLine();
    const formatted = this.formatMessage(level, message);

    if (level === "error") {
      console.error(formatted);
    } else if (level === "warn") {
      console.warn(formatted);
    } else {
      console.info(formatted);
    }

    this.renderProgress();
  }

  debug(message: string): void {
    if (this.config.verbose) {
      this.writeLog("debug", message);
    }
  }

  info(message: string): void {
    this.writeLog("info", message);
  }

  success(message: string): void {
    this.writeLog("success", message);
  }

  warn(message: string): void {
    this.writeLog("warn", message);
  }

  error(message: string): void {
    this.writeLog("error", message);
  }

  startProgress(total: number): void {
    if (this.config.quiet) {
      return;
    }
    this.progress = {
      done: 0,
      total,
      currentUrl: "",
      failures: 0,
      startTime: Date.now(),
    };
    if (this.isTerminal) {
      process.stdout.write(ANSI.hideCursor);
    }
    this.renderProgress();
  }

  /**
   * Move the bar; `total` changes as the frontier grows.
   */
  updateProgress(done: number, total: number, url: string): void {
    if (!this.progress) {
      return;
    }
    this.progress.done = done;
    this.progress.total = total;
    this.progress.currentUrl = url;
    this.renderProgress();
  }

  recordFailure(): void {
    if (!this.progress) {
      return;
    }
    this.progress.failures += 1;
    this.renderProgress();
  }

  endProgress(): void {
    this.clearProgressLine();
    if (this.progress && this.isTerminal) {
      process.stdout.write(ANSI.showCursor);
    }
    this.progress = null;
  }

  /** Restore the cursor if the process dies with the bar on screen. */
  restoreTerminal(): void {
    this.clearProgressLine();
    if (this.isTerminal && this.progress) {
      process.stdout.write(ANSI.showCursor);
    }
  }

  private renderProgress(): void {
    if (!(this.progress && this.isTerminal)) {
      return;
    }

    const { done, total, currentUrl, failures, startTime } = this.progress;
    const ratio = total > 0 ? Math.min(1, done / total) : 0;
    const filled = Math.round(ratio * PROGRESS_BAR_WIDTH);
    const bar = `${ANSI.green}${"█".repeat(filled)}${ANSI.gray}${"░".repeat(PROGRESS_BAR_WIDTH - filled)}${ANSI.reset}`;
    const failureText =
      failures > 0 ? ` ${ANSI.red}(${failures} failed)${ANSI.reset}` : "";
    const elapsed = formatDuration(Date.now() - startTime);
    const width = process.stdout.columns ?? MIN_TERMINAL_WIDTH;
    const displayUrl = truncateUrl(
      currentUrl,
      Math.max(20, width - PROGRESS_FIXED_WIDTH)
    );

    const line = `${ANSI.cursorToStart}${ANSI.clearLine}${bar} ${ANSI.bold}${Math.round(ratio * 100)}%${ANSI.reset} ${ANSI.dim}(${done}/${total})${ANSI.reset}${failureText} ${ANSI.dim}${elapsed}${ANSI.reset} ${ANSI.cyan}${displayUrl}${ANSI.reset}`;
    this.lastProgressLine = line;
    process.stdout.write(line);
  }

  logFetch(url: string, attempt: number, maxAttempts: number): void {
    this.debug(`Fetching (${attempt}/${maxAttempts}): ${url}`);
  }

  logFetchError(url: string, attempt: number, error: unknown): void {
    this.debug(`Fetch attempt ${attempt} failed for ${url}: ${String(error)}`);
  }

  logPageSaved(url: string, depth: number, filePath: string): void {
    if (this.config.quiet) {
      return;
    }
    this.success(
      `Saved ${ANSI.cyan}${url}${ANSI.reset} ${ANSI.dim}(depth ${depth}) -> ${filePath}${ANSI.reset}`
    );
  }

  logPageFailed(url: string, reason: string, message: string): void {
    if (this.config.quiet) {
      return;
    }
    this.error(`Failed ${url} [${reason}]: ${message}`);
  }

  logSkipped(url: string, reason: string): void {
    if (this.config.quiet) {
      return;
    }
    this.debug(`Skipped ${url} ${ANSI.dim}(${reason})${ANSI.reset}`);
  }

  logCrawlStart(startUrl: string, settings: Record<string, unknown>): void {
    if (this.config.quiet) {
      return;
    }
    console.info(`\n${ANSI.cyan}${ANSI.bold}Crawl configuration:${ANSI.reset}`);
    console.info(`  ${ANSI.dim}Start URL:${ANSI.reset} ${startUrl}`);
    for (const [key, value] of Object.entries(settings)) {
      console.info(`  ${ANSI.dim}${key}:${ANSI.reset} ${String(value)}`);
    }
    console.info("");
  }

  /**
   * Final report. Printed even in quiet mode.
   */
  printCrawlSummary(report: CrawlReport): void {
    this.clearProgressLine();
    const status = report.aborted
      ? `${ANSI.red}${ANSI.bold}[ABORTED]${ANSI.reset}`
      : report.partial
        ? `${ANSI.yellow}${ANSI.bold}[PARTIAL]${ANSI.reset}`
        : `${ANSI.cyan}${ANSI.bold}[DONE]${ANSI.reset}`;
    const failed = report.failures.length;
    const { outOfScope, depthExceeded, robots } = report.skipped;

    console.info(
      `${status} ${report.pagesWritten} written, ${failed} failed, ${outOfScope + depthExceeded + robots} skipped in ${formatDuration(report.durationMs)} -> ${report.outputRoot}`
    );
    if (report.abortReason) {
      console.error(`  ${ANSI.red}${report.abortReason}${ANSI.reset}`);
    }
    console.info(
      `  ${ANSI.dim}skipped: ${outOfScope} out of scope, ${depthExceeded} beyond depth, ${robots} by robots.txt${ANSI.reset}`
    );
    if (failed === 0) {
      return;
    }
    const byReason = Object.entries(report.failureCounts)
      .map(([reason, count]) => `${reason}=${count}`)
      .join(", ");
    console.warn(
      `\n${ANSI.yellow}${ANSI.bold}Failures (${failed}): ${byReason}${ANSI.reset}`
    );
    for (const failure of report.failures) {
      console.warn(
        `  ${ANSI.dim}•${ANSI.reset} ${failure.url} [${failure.reason}] ${failure.message}`
      );
    }
  }
}

export function truncateUrl(url: string, maxLength: number): string {
  if (url.length <= maxLength) {
    return url;
  }
  try {
    const parsed = new URL(url);
    const path = parsed.pathname + parsed.search;
    if (path.length > maxLength - 3) {
      return `...${path.slice(-(maxLength - 3))}`;
    }
    return `${`${parsed.hostname}${path}`.slice(0, maxLength - 3)}...`;
  } catch {
    return `${url.slice(0, maxLength - 3)}...`;
  }
}

export const logger = new Logger();
