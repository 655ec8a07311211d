import { describe, expect, test } from "vitest";
import { type ParseResult, parseArgs } from "../src/args.js";
import { ConfigError } from "../src/errors.js";

const ensureCrawl = (
  result: ParseResult
): Extract<ParseResult, { command: "crawl" }> => {
  if (result.command !== "crawl") {
    throw new Error(`Expected crawl command, got ${result.command}`);
  }
  return result;
};

const ensurePage = (
  result: ParseResult
): Extract<ParseResult, { command: "page" }> => {
  if (result.command !== "page") {
    throw new Error(`Expected page command, got ${result.command}`);
  }
  return result;
};

describe("parseArgs: crawl", () => {
  test("a bare URL crawls with defaults", () => {
    const { options, showHelp } = ensureCrawl(
      parseArgs(["https://example.com/api"])
    );
    expect(showHelp).toBe(false);
    expect(options).toMatchObject({
      startUrl: "https://example.com/api",
      outDir: ".docs",
      maxDepth: 3,
      quiet: false,
      concurrency: 1,
      maxPages: 1000,
      queryPolicy: "ignore",
      respectRobots: false,
      render: true,
    });
  });

  test("positional output directory and short flags", () => {
    const { options } = ensureCrawl(
      parseArgs(["crawl", "https://example.com/api", "mirror", "-d", "1", "-q"])
    );
    expect(options.outDir).toBe("mirror");
    expect(options.maxDepth).toBe(1);
    expect(options.quiet).toBe(true);
  });

  test("long flags with and without =", () => {
    const { options } = ensureCrawl(
      parseArgs([
        "https://example.com/api",
        "--depth=0",
        "--outDir",
        "out",
        "--concurrency",
        "4",
        "--maxPages=10",
        "--time-budget",
        "5000",
        "--delay",
        "100",
        "--keep-query",
        "--robots",
        "--no-render",
        "--retries",
        "0",
        "--timeout",
        "2000",
        "--userAgent=test-agent",
        "--verbose",
      ])
    );
    expect(options).toMatchObject({
      maxDepth: 0,
      outDir: "out",
      concurrency: 4,
      maxPages: 10,
      timeBudgetMs: 5000,
      delayMs: 100,
      queryPolicy: "append",
      respectRobots: true,
      render: false,
      retries: 0,
      timeoutMs: 2000,
      userAgent: "test-agent",
      verbose: true,
    });
  });

  test("no arguments shows help", () => {
    expect(ensureCrawl(parseArgs([])).showHelp).toBe(true);
    expect(ensureCrawl(parseArgs(["help"])).showHelp).toBe(true);
  });

  test.each([
    [["https://example.com", "-d", "-1"]],
    [["https://example.com", "--depth", "abc"]],
    [["https://example.com", "--concurrency", "0"]],
    [["https://example.com", "--bogus"]],
    [["not a url"]],
    [["ftp://example.com/files"]],
  ])("rejects %j", (argv) => {
    expect(() => parseArgs(argv)).toThrow(ConfigError);
  });
});

describe("parseArgs: other commands", () => {
  test("page takes an output file and conflict policy", () => {
    const { options } = ensurePage(
      parseArgs([
        "page",
        "https://example.com/docs/intro",
        "--output",
        "intro-copy.md",
        "--on-exists",
        "rename",
      ])
    );
    expect(options).toMatchObject({
      url: "https://example.com/docs/intro",
      output: "intro-copy.md",
      onExists: "rename",
      outDir: ".",
    });
  });

  test("page rejects an unknown conflict policy", () => {
    expect(() =>
      parseArgs(["page", "https://example.com", "--on-exists", "skip"])
    ).toThrow(ConfigError);
  });

  test("setup passes its arguments through", () => {
    expect(parseArgs(["setup", "--force"])).toEqual({
      command: "setup",
      extraArgs: ["--force"],
      showHelp: false,
    });
  });

  test("version", () => {
    expect(parseArgs(["version"])).toEqual({ command: "version" });
    expect(parseArgs(["--version"])).toEqual({ command: "version" });
  });
});
