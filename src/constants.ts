import TurndownService from "turndown";
import type { CrawlCliOptions, PageCliOptions } from "./types.js";

const FETCH_DEFAULTS = {
  timeoutMs: 15_000,
  retries: 2,
  userAgent: "docs-mirror/0.1",
  render: true,
};

export const DEFAULT_CRAWL_OPTIONS: CrawlCliOptions = {
  ...FETCH_DEFAULTS,
  outDir: ".docs",
  maxDepth: 3,
  quiet: false,
  verbose: false,
  concurrency: 1,
  maxPages: 1000,
  timeBudgetMs: 0,
  delayMs: 0,
  queryPolicy: "ignore",
  respectRobots: false,
};

export const DEFAULT_PAGE_OPTIONS: PageCliOptions = {
  ...FETCH_DEFAULTS,
  outDir: ".",
  onExists: "overwrite",
  quiet: false,
  verbose: false,
};

// Chrome removed when Readability finds no article.
export const CHROME_SELECTORS = [
  "nav",
  "header",
  "footer",
  "aside",
  "script",
  "style",
  "iframe",
  "svg",
  "noscript",
  "template",
  "form",
  "button",
  "input",
  "[role='navigation']",
  "[role='banner']",
  "[aria-label='skip to content']",
];

export const ASSET_EXTENSIONS_REGEX =
  /\.(png|jpe?g|gif|svg|webp|avif|ico|bmp|pdf|zip|tar|gz|tgz|7z|rar|mp4|webm|mp3|wav|woff2?|ttf|otf|eot|css|js|mjs|map|json|xml|rss|atom)$/i;

export const LINE_SPLIT_REGEX = /\r?\n/;
export const WRITE_PROBE_FILENAME = ".write_test";

const WHITESPACE_RUN_REGEX = /\s+/g;
const PIPE_REGEX = /\|/g;
const TABLE_SECTION_TAGS = new Set(["THEAD", "TBODY", "TFOOT"]);
const TABLE_CELL_TAGS = new Set(["TD", "TH"]);

export const turndownService = new TurndownService({
  headingStyle: "atx",
  bulletListMarker: "-",
  codeBlockStyle: "fenced",
});

turndownService.remove(["script", "style", "noscript", "template"]);

/** The slice of a DOM node the custom rules read. */
interface MarkupNode {
  readonly nodeName: string;
  readonly textContent: string | null;
  readonly childNodes: ArrayLike<MarkupNode>;
}

const collapseWhitespace = (value: string): string =>
  value.replace(WHITESPACE_RUN_REGEX, " ").trim();

const hasAttributes = <T extends object>(
  node: T
): node is T & Pick<Element, "getAttribute"> =>
  "getAttribute" in node && typeof node.getAttribute === "function";

turndownService.addRule("singleLineAnchors", {
  filter: "a",
  replacement(content, node): string {
    const href = hasAttributes(node) ? node.getAttribute("href") : null;
    const text = collapseWhitespace(content);
    if (!href) {
      return text;
    }
    return `[${text}](${href})`;
  },
});

const collectRows = (node: MarkupNode, rows: MarkupNode[]): MarkupNode[] => {
  for (const child of Array.from(node.childNodes)) {
    if (child.nodeName === "TR") {
      rows.push(child);
    } else if (TABLE_SECTION_TAGS.has(child.nodeName)) {
      collectRows(child, rows);
    }
  }
  return rows;
};

const readCells = (row: MarkupNode): string[] =>
  Array.from(row.childNodes)
    .filter((cell) => TABLE_CELL_TAGS.has(cell.nodeName))
    .map((cell) =>
      collapseWhitespace(cell.textContent ?? "").replace(PIPE_REGEX, "\\|")
    );

const formatRow = (cells: string[], width: number): string => {
  const padded = [...cells];
  while (padded.length < width) {
    padded.push("");
  }
  return `| ${padded.join(" | ")} |`;
};

turndownService.addRule("tables", {
  filter: "table",
  replacement(content, node): string {
    const rows = collectRows(node, [])
      .map(readCells)
      .filter((cells) => cells.length > 0);
    const [header, ...body] = rows;
    if (!header) {
      return content;
    }
    const width = Math.max(...rows.map((cells) => cells.length));
    const separator = new Array<string>(width).fill("---");
    const lines = [
      formatRow(header, width),
      formatRow(separator, width),
      ...body.map((cells) => formatRow(cells, width)),
    ];
    return `\n\n${lines.join("\n")}\n\n`;
  },
});

turndownService.addRule("strikethrough", {
  filter: ["del", "s"],
  replacement(content): string {
    return `~~${content}~~`;
  },
});
