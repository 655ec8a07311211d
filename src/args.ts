import { DEFAULT_CRAWL_OPTIONS, DEFAULT_PAGE_OPTIONS } from "./constants.js";
import { ConfigError } from "./errors.js";
import { logger } from "./logger.js";
import type {
  ConflictPolicy,
  CrawlCliOptions,
  FetchSettings,
  PageCliOptions,
} from "./types.js";
import { parseNonNegativeInt } from "./utils.js";

export type ParseResult =
  | { command: "crawl"; options: CrawlCliOptions; showHelp: boolean }
  | { command: "page"; options: PageCliOptions; showHelp: boolean }
  | { command: "setup"; extraArgs: string[]; showHelp: boolean }
  | { command: "version" };

type CommandKeyword = "crawl" | "page" | "setup" | "version" | "help";

type FlagHandler = (valueFromEq: string | undefined) => void;

const COMMAND_KEYWORDS = new Set<string>([
  "crawl",
  "page",
  "setup",
  "version",
  "help",
]);

const CONFLICT_POLICIES: ConflictPolicy[] = ["overwrite", "rename", "abort"];

export function printHelp(): void {
  const lines = [
    "Usage:",
    "  docs-mirror [crawl] <url> [outputDir] [options]   (default)",
    "  docs-mirror page <url> [options]                  (single page)",
    "  docs-mirror setup [playwright install args]       (install Chromium)",
    "  docs-mirror version",
    "",
    "Crawl options:",
    "  -d, --depth <n>         Max link depth from the start URL (default 3)",
    "  -o, --outDir <path>     Output directory (default .docs)",
    "  -q, --quiet             Only print the final summary",
    "  --concurrency <n>       Parallel fetches (default 1, strict breadth-first)",
    "  --maxPages <n>          Stop after writing this many pages (default 1000)",
    "  --time-budget <ms>      Stop starting new pages after this long (default off)",
    "  --delay <ms>            Minimum gap between requests (default 0)",
    "  --keep-query            Give each query string its own file",
    "  --robots                Honour robots.txt",
    "",
    "Shared options:",
    "  --timeout <ms>          Page load timeout (default 15000)",
    "  --retries <n>           Extra attempts for plain HTTP fetches (default 2)",
    "  --userAgent <string>    Custom User-Agent",
    "  --no-render             Fetch with plain HTTP instead of headless Chromium",
    "  --verbose               Debug logging",
    "  --help                  Show this help",
    "",
    "Examples:",
    "  docs-mirror https://code.visualstudio.com/api vscode_docs",
    "  docs-mirror crawl https://example.com/docs -d 2 -q",
  ];
  console.info(lines.join("\n"));
}

export function printPageHelp(): void {
  const lines = [
    "Usage: docs-mirror page <url> [options]",
    "",
    "  --output <file>                       Output file (default: named after the URL)",
    "  -o, --outDir <path>                   Directory for the default name (default .)",
    "  --on-exists overwrite|rename|abort    When the file exists (default overwrite)",
    "  --timeout <ms>  --retries <n>  --userAgent <s>  --no-render  -q  --verbose",
  ];
  console.info(lines.join("\n"));
}

function parsePositiveCount(raw: string | undefined, flag: string): number {
  const value = parseNonNegativeInt(raw, flag);
  if (value === 0) {
    throw new ConfigError(`${flag} must be at least 1`);
  }
  return value;
}

function splitFlag(arg: string): [string, string | undefined] {
  if (!arg.startsWith("--")) {
    return [arg, undefined];
  }
  const eq = arg.indexOf("=");
  return eq === -1 ? [arg, undefined] : [arg.slice(0, eq), arg.slice(eq + 1)];
}

function ensureHttpUrl(value: string): string {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new ConfigError(`"${value}" is not a valid URL`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigError(`"${value}" is not an http(s) URL`);
  }
  return value;
}

type ConsumeNext = (valueFromEq: string | undefined) => string | undefined;

/**
 * Walk the arguments, dispatching flags to `handlers` and collecting the
 * rest as positionals.
 */
function walkArgs(
  args: string[],
  buildHandlers: (consumeNext: ConsumeNext) => Record<string, FlagHandler>
): string[] {
  const iterator = args[Symbol.iterator]();
  const positionals: string[] = [];

  const consumeNext: ConsumeNext = (valueFromEq) => {
    if (valueFromEq !== undefined) {
      return valueFromEq;
    }
    const next = iterator.next();
    return next.done ? undefined : next.value;
  };
  const handlers = buildHandlers(consumeNext);

  for (const arg of iterator) {
    const [flag, valueFromEq] = splitFlag(arg);
    const handler = handlers[flag];
    if (handler) {
      handler(valueFromEq);
    } else if (arg.startsWith("-") && arg.length > 1) {
      throw new ConfigError(`Unknown option ${flag}`);
    } else {
      positionals.push(arg);
    }
  }
  return positionals;
}

function fetchHandlers(
  opts: FetchSettings & { verbose: boolean; quiet: boolean },
  consumeNext: ConsumeNext
): Record<string, FlagHandler> {
  return {
    "--timeout": (valueFromEq) => {
      opts.timeoutMs = parsePositiveCount(consumeNext(valueFromEq), "--timeout");
    },
    "--retries": (valueFromEq) => {
      opts.retries = parseNonNegativeInt(consumeNext(valueFromEq), "--retries");
    },
    "--userAgent": (valueFromEq) => {
      const value = consumeNext(valueFromEq);
      if (!value) {
        throw new ConfigError("--userAgent needs a value");
      }
      opts.userAgent = value;
    },
    "--render": () => {
      opts.render = true;
    },
    "--no-render": () => {
      opts.render = false;
    },
    "--verbose": () => {
      opts.verbose = true;
    },
    "--quiet": () => {
      opts.quiet = true;
    },
    "-q": () => {
      opts.quiet = true;
    },
  };
}

function warnExtraArgs(extras: string[]): void {
  if (extras.length > 0) {
    logger.warn(`Ignoring extra positional arguments: ${extras.join(", ")}`);
  }
}

function parseCrawlArgs(args: string[]): ParseResult {
  const opts: CrawlCliOptions = { ...DEFAULT_CRAWL_OPTIONS };
  let showHelp = false;
  let outDirFlag: string | undefined;

  const positionals = walkArgs(args, (consumeNext) => {
    const setDepth: FlagHandler = (valueFromEq) => {
      opts.maxDepth = parseNonNegativeInt(consumeNext(valueFromEq), "--depth");
    };
    const setOutDir: FlagHandler = (valueFromEq) => {
      outDirFlag = consumeNext(valueFromEq);
      if (!outDirFlag) {
        throw new ConfigError("--outDir needs a value");
      }
    };
    return {
      ...fetchHandlers(opts, consumeNext),
      "--depth": setDepth,
      "--maxDepth": setDepth,
      "-d": setDepth,
      "--outDir": setOutDir,
      "-o": setOutDir,
      "--concurrency": (valueFromEq) => {
        opts.concurrency = parsePositiveCount(
          consumeNext(valueFromEq),
          "--concurrency"
        );
      },
      "--maxPages": (valueFromEq) => {
        opts.maxPages = parsePositiveCount(
          consumeNext(valueFromEq),
          "--maxPages"
        );
      },
      "--time-budget": (valueFromEq) => {
        opts.timeBudgetMs = parseNonNegativeInt(
          consumeNext(valueFromEq),
          "--time-budget"
        );
      },
      "--delay": (valueFromEq) => {
        opts.delayMs = parseNonNegativeInt(consumeNext(valueFromEq), "--delay");
      },
      "--keep-query": () => {
        opts.queryPolicy = "append";
      },
      "--robots": () => {
        opts.respectRobots = true;
      },
      "--no-robots": () => {
        opts.respectRobots = false;
      },
      "--help": () => {
        showHelp = true;
      },
      "-h": () => {
        showHelp = true;
      },
    };
  });

  const [startUrl, outDirPositional, ...rest] = positionals;
  if (!startUrl) {
    return { command: "crawl", options: opts, showHelp: true };
  }
  opts.startUrl = ensureHttpUrl(startUrl);
  opts.outDir = outDirFlag ?? outDirPositional ?? opts.outDir;
  warnExtraArgs(outDirFlag && outDirPositional ? [outDirPositional, ...rest] : rest);
  return { command: "crawl", options: opts, showHelp };
}

function parsePageArgs(args: string[]): ParseResult {
  const opts: PageCliOptions = { ...DEFAULT_PAGE_OPTIONS };
  let showHelp = false;

  const positionals = walkArgs(args, (consumeNext) => {
    const setOutDir: FlagHandler = (valueFromEq) => {
      opts.outDir = consumeNext(valueFromEq) ?? DEFAULT_PAGE_OPTIONS.outDir;
    };
    return {
      ...fetchHandlers(opts, consumeNext),
      "--output": (valueFromEq) => {
        opts.output = consumeNext(valueFromEq);
      },
      "--outDir": setOutDir,
      "-o": setOutDir,
      "--on-exists": (valueFromEq) => {
        const value = consumeNext(valueFromEq);
        const policy = CONFLICT_POLICIES.find((candidate) => candidate === value);
        if (!policy) {
          throw new ConfigError(
            `--on-exists must be one of ${CONFLICT_POLICIES.join(", ")}`
          );
        }
        opts.onExists = policy;
      },
      "--help": () => {
        showHelp = true;
      },
      "-h": () => {
        showHelp = true;
      },
    };
  });

  const [url, ...rest] = positionals;
  if (!url) {
    return { command: "page", options: opts, showHelp: true };
  }
  opts.url = ensureHttpUrl(url);
  warnExtraArgs(rest);
  return { command: "page", options: opts, showHelp };
}

const isCommandKeyword = (value: string): value is CommandKeyword =>
  COMMAND_KEYWORDS.has(value);

/**
 * Throws ConfigError for malformed input: unknown options, bad URLs,
 * negative or non-numeric counts.
 */
export function parseArgs(args: string[]): ParseResult {
  const [first = "", ...rest] = args;
  const keyword = first.toLowerCase();

  if (first === "--version" || first === "-v") {
    return { command: "version" };
  }
  if (!isCommandKeyword(keyword)) {
    return parseCrawlArgs(args);
  }

  switch (keyword) {
    case "version":
      return { command: "version" };
    case "help":
      return {
        command: "crawl",
        options: { ...DEFAULT_CRAWL_OPTIONS },
        showHelp: true,
      };
    case "setup": {
      const showHelp = rest.includes("--help") || rest.includes("-h");
      return { command: "setup", extraArgs: rest, showHelp };
    }
    case "page":
      return parsePageArgs(rest);
    case "crawl":
      return parseCrawlArgs(rest);
  }
}
