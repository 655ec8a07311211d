import { describe, expect, test } from "vitest";
import { Frontier } from "../src/frontier.js";

describe("Frontier", () => {
  test("hands out entries first in, first out", () => {
    const frontier = new Frontier();
    frontier.enqueue({ url: "https://example.com/a", depth: 0 }, "a");
    frontier.enqueue({ url: "https://example.com/b", depth: 1 }, "b");

    expect(frontier.next()?.url).toBe("https://example.com/a");
    expect(frontier.next()?.url).toBe("https://example.com/b");
    expect(frontier.next()).toBeNull();
  });

  test("refuses a key it has already seen, even after dequeue", () => {
    const frontier = new Frontier();
    expect(frontier.enqueue({ url: "https://example.com/a", depth: 0 }, "a")).toBe(true);
    frontier.next();
    expect(frontier.enqueue({ url: "https://example.com/a/", depth: 1 }, "a")).toBe(false);
    expect(frontier.pending).toBe(0);
    expect(frontier.seen).toBe(1);
    expect(frontier.hasSeen("a")).toBe(true);
  });

  test("putBack returns an entry to the front of the queue", () => {
    const frontier = new Frontier();
    frontier.enqueue({ url: "https://example.com/a", depth: 0 }, "a");
    frontier.enqueue({ url: "https://example.com/b", depth: 0 }, "b");

    const taken = frontier.next();
    expect(taken?.url).toBe("https://example.com/a");
    if (taken) {
      frontier.putBack(taken);
    }

    expect(frontier.pending).toBe(2);
    expect(frontier.next()?.url).toBe("https://example.com/a");
    expect(frontier.enqueue({ url: "https://example.com/a", depth: 1 }, "a")).toBe(false);
  });

  test("keeps order across compaction", () => {
    const frontier = new Frontier();
    const total = 3000;
    for (let i = 0; i < total; i += 1) {
      frontier.enqueue({ url: `https://example.com/${i}`, depth: 0 }, String(i));
    }
    const seen: string[] = [];
    for (let entry = frontier.next(); entry; entry = frontier.next()) {
      seen.push(entry.url);
    }
    expect(seen).toHaveLength(total);
    expect(seen[0]).toBe("https://example.com/0");
    expect(seen[2000]).toBe("https://example.com/2000");
    expect(frontier.pending).toBe(0);
  });
});
