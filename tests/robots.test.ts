import { describe, expect, test } from "vitest";
import { parseRobotsTxt } from "../src/robots.js";

const USER_AGENT = "docs-mirror/0.1";

describe("parseRobotsTxt", () => {
  test("longest matching rule wins and crawl-delay becomes milliseconds", () => {
    const policy = parseRobotsTxt(
      [
        "User-agent: *",
        "Disallow: /api/private",
        "Allow: /api/private/open",
        "Crawl-delay: 2",
      ].join("\n"),
      USER_AGENT
    );
    expect(policy.source).toBe("robots.txt");
    expect(policy.crawlDelayMs).toBe(2000);
    expect(policy.isAllowed("/api/private/secret")).toBe(false);
    expect(policy.isAllowed("/api/private/open/page")).toBe(true);
    expect(policy.isAllowed("/api/public")).toBe(true);
  });

  test("a group naming the agent beats the wildcard group", () => {
    const robots = [
      "User-agent: docs-mirror",
      "Disallow: /",
      "",
      "User-agent: *",
      "Disallow:",
    ].join("\n");

    expect(parseRobotsTxt(robots, USER_AGENT).isAllowed("/api")).toBe(false);
    expect(parseRobotsTxt(robots, "other-bot").isAllowed("/api")).toBe(true);
  });

  test("consecutive user-agent lines share their rules", () => {
    const policy = parseRobotsTxt(
      "User-agent: alpha\nUser-agent: beta\nDisallow: /x",
      "beta"
    );
    expect(policy.isAllowed("/x/y")).toBe(false);
    expect(policy.isAllowed("/y")).toBe(true);
  });

  test("ignores comments and CRLF line endings", () => {
    const policy = parseRobotsTxt(
      "# site rules\r\nUser-agent: *\r\nDisallow: /tmp # scratch\r\n",
      USER_AGENT
    );
    expect(policy.isAllowed("/tmp/file")).toBe(false);
    expect(policy.isAllowed("/docs")).toBe(true);
  });

  test("an empty file allows everything", () => {
    const policy = parseRobotsTxt("", USER_AGENT);
    expect(policy.source).toBe("allow-all");
    expect(policy.isAllowed("/anything")).toBe(true);
  });
});
