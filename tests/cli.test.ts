import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, test } from "vitest";
import { EXIT_ABORTED, EXIT_OK, EXIT_USAGE, main, run } from "../src/cli.js";

const START = "https://example.com/api/";

const withTempDir = async (
  fn: (dir: string) => Promise<void>
): Promise<void> => {
  const dir = await mkdtemp(path.join(os.tmpdir(), "docs-mirror-cli-"));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
};

const blockedRoot = async (dir: string): Promise<string> => {
  const blocker = path.join(dir, "blocker");
  await writeFile(blocker, "file");
  return path.join(blocker, "mirror");
};

describe("run", () => {
  test("a malformed start URL resolves to the usage exit code", async () => {
    await withTempDir(async (dir) => {
      await expect(run("not a url", dir)).resolves.toBe(EXIT_USAGE);
      await expect(run("mailto:team@example.com", dir)).resolves.toBe(
        EXIT_USAGE
      );
    });
  });

  test("a negative depth resolves to the usage exit code", async () => {
    await withTempDir(async (dir) => {
      await expect(run(START, dir, -1, true)).resolves.toBe(EXIT_USAGE);
    });
  });

  test("an unwritable output root aborts with exit code 1", async () => {
    await withTempDir(async (dir) => {
      await expect(run(START, await blockedRoot(dir), 1, true)).resolves.toBe(
        EXIT_ABORTED
      );
    });
  });
});

describe("main", () => {
  test("version and help exit 0", async () => {
    await expect(main(["version"])).resolves.toBe(EXIT_OK);
    await expect(main(["--help"])).resolves.toBe(EXIT_OK);
  });

  test("invalid arguments exit 2", async () => {
    await expect(main(["not a url"])).resolves.toBe(EXIT_USAGE);
    await expect(main([START, "--depth", "-1"])).resolves.toBe(EXIT_USAGE);
    await expect(main([START, "--bogus"])).resolves.toBe(EXIT_USAGE);
  });

  test("an unwritable output root exits 1", async () => {
    await withTempDir(async (dir) => {
      const code = await main([
        START,
        await blockedRoot(dir),
        "--no-render",
        "-q",
      ]);
      expect(code).toBe(EXIT_ABORTED);
    });
  });

  test("page refuses to replace a file under --on-exists abort", async () => {
    await withTempDir(async (dir) => {
      const existing = path.join(dir, "intro.md");
      await writeFile(existing, "kept");
      const code = await main([
        "page",
        "https://example.com/docs/intro",
        "--output",
        existing,
        "--on-exists",
        "abort",
        "--no-render",
        "-q",
      ]);
      expect(code).toBe(EXIT_USAGE);
    });
  });
});
