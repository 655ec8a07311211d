#!/usr/bin/env node
import { parseArgs, printHelp, printPageHelp } from "./args.js";
import { DEFAULT_CRAWL_OPTIONS } from "./constants.js";
import { crawlSite, validateTarget } from "./crawler.js";
import { ConfigError, describeError } from "./errors.js";
import { createPageFetcher, type PageFetcher } from "./fetcher.js";
import { logger } from "./logger.js";
import { scrapePage } from "./page.js";
import { buildAllowAllPolicy, loadRobotsPolicy } from "./robots.js";
import { isMainModule, packageVersion } from "./runtime.js";
import { runBrowserSetup } from "./setup.js";
import type { CrawlCliOptions, CrawlTarget, FetchSettings } from "./types.js";

export const EXIT_OK = 0;
export const EXIT_ABORTED = 1;
export const EXIT_USAGE = 2;

const SIGNAL_EXIT_CODES: Record<"SIGINT" | "SIGTERM", number> = {
  SIGINT: 130,
  SIGTERM: 143,
};

export type FetcherFactory = (
  settings: FetchSettings,
  sessions: number
) => PageFetcher;

/**
 * Mirror one site subtree and map the outcome to an exit code.
 * Per-page failures still exit 0; only an aborted crawl does not.
 */
export async function runCrawl(
  options: CrawlCliOptions,
  signal?: AbortSignal,
  makeFetcher: FetcherFactory = createPageFetcher
): Promise<number> {
  if (!options.startUrl) {
    throw new ConfigError("Provide a start URL to crawl");
  }
  const target: CrawlTarget = {
    startUrl: options.startUrl,
    outputRoot: options.outDir,
    maxDepth: options.maxDepth,
    quiet: options.quiet,
  };
  const startUrl = validateTarget(target);
  const robots = options.respectRobots
    ? await loadRobotsPolicy(startUrl, options)
    : buildAllowAllPolicy();

  const report = await crawlSite({
    target,
    fetcher: makeFetcher(options, options.concurrency),
    limits: {
      concurrency: options.concurrency,
      maxPages: options.maxPages,
      timeBudgetMs: options.timeBudgetMs,
      delayMs: options.delayMs,
      queryPolicy: options.queryPolicy,
    },
    robots,
    signal,
  });
  return report.aborted ? EXIT_ABORTED : EXIT_OK;
}

/**
 * Programmatic entry with the classic positional signature.
 */
export async function run(
  startUrl: string,
  outputDir: string,
  maxDepth = DEFAULT_CRAWL_OPTIONS.maxDepth,
  quiet = false
): Promise<number> {
  try {
    return await runCrawl({
      ...DEFAULT_CRAWL_OPTIONS,
      startUrl,
      outDir: outputDir,
      maxDepth,
      quiet,
    });
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      return EXIT_USAGE;
    }
    throw error;
  }
}

/**
 * First signal drains the crawl; a second one exits on the spot.
 */
function installSignalHandlers(controller: AbortController): () => void {
  const handler = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      logger.restoreTerminal();
      process.exit(
        signal === "SIGTERM"
          ? SIGNAL_EXIT_CODES.SIGTERM
          : SIGNAL_EXIT_CODES.SIGINT
      );
    }
    logger.warn(
      `Received ${signal}; finishing in-flight pages (repeat to quit now)`
    );
    controller.abort();
  };
  process.on("SIGINT", handler);
  process.on("SIGTERM", handler);
  return () => {
    process.off("SIGINT", handler);
    process.off("SIGTERM", handler);
  };
}

export async function main(argv: string[]): Promise<number> {
  let result: ReturnType<typeof parseArgs>;
  try {
    result = parseArgs(argv);
  } catch (error) {
    logger.error(describeError(error));
    logger.info("Run docs-mirror --help for usage.");
    return EXIT_USAGE;
  }

  try {
    switch (result.command) {
      case "version":
        console.info(packageVersion);
        return EXIT_OK;

      case "setup":
        if (result.showHelp) {
          console.info(
            "Usage: docs-mirror setup [playwright install args]  (default: --with-deps chromium)"
          );
          return EXIT_OK;
        }
        await runBrowserSetup(result.extraArgs);
        logger.success("Browser installed");
        return EXIT_OK;

      case "page":
        if (result.showHelp) {
          printPageHelp();
          return EXIT_OK;
        }
        logger.configure({
          verbose: result.options.verbose,
          quiet: result.options.quiet,
        });
        await scrapePage(
          result.options,
          createPageFetcher(result.options, 1)
        );
        return EXIT_OK;

      case "crawl": {
        if (result.showHelp) {
          printHelp();
          return EXIT_OK;
        }
        logger.configure({
          verbose: result.options.verbose,
          quiet: result.options.quiet,
        });
        const controller = new AbortController();
        const removeHandlers = installSignalHandlers(controller);
        try {
          return await runCrawl(result.options, controller.signal);
        } finally {
          removeHandlers();
        }
      }
    }
  } catch (error) {
    logger.error(describeError(error));
    return error instanceof ConfigError ? EXIT_USAGE : EXIT_ABORTED;
  }
}

if (isMainModule(import.meta.url)) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.error(describeError(error));
      process.exitCode = EXIT_ABORTED;
    }
  );
}
