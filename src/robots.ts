import { LINE_SPLIT_REGEX } from "./constants.js";
import { describeError } from "./errors.js";
import { fetchWithTimeout } from "./fetcher.js";
import { logger } from "./logger.js";
import type { FetchSettings, RobotsPolicy } from "./types.js";

interface AgentRules {
  allow: string[];
  disallow: string[];
  crawlDelayMs?: number;
}

export function buildAllowAllPolicy(): RobotsPolicy {
  return {
    isAllowed: () => true,
    source: "allow-all",
  };
}

export function normalizeRulePath(rule: string): string {
  return rule.startsWith("/") ? rule : `/${rule}`;
}

/**
 * Exact agent name first, then a group whose name the user agent
 * contains, then `*`.
 */
export function selectAgentRules(
  groups: Map<string, AgentRules>,
  userAgent: string
): AgentRules | undefined {
  const agent = userAgent.toLowerCase();
  const exact = groups.get(agent);
  if (exact) {
    return exact;
  }
  for (const [name, rules] of groups) {
    if (name !== "*" && agent.includes(name)) {
      return rules;
    }
  }
  return groups.get("*");
}

function longestMatch(rules: string[], pathname: string): number {
  let longest = 0;
  for (const rule of rules) {
    if (pathname.startsWith(rule) && rule.length > longest) {
      longest = rule.length;
    }
  }
  return longest;
}

export function parseRobotsTxt(
  robotsText: string,
  userAgent: string
): RobotsPolicy {
  const groups = new Map<string, AgentRules>();
  let currentAgents: AgentRules[] = [];
  let collectingAgents = false;

  const rulesFor = (agent: string): AgentRules => {
    const existing = groups.get(agent);
    if (existing) {
      return existing;
    }
    const created: AgentRules = { allow: [], disallow: [] };
    groups.set(agent, created);
    return created;
  };

  for (const rawLine of robotsText.split(LINE_SPLIT_REGEX)) {
    const line = rawLine.split("#", 1)[0]?.trim();
    if (!line) {
      continue;
    }
    const separator = line.indexOf(":");
    if (separator === -1) {
      continue;
    }
    const directive = line.slice(0, separator).trim().toLowerCase();
    const value = line.slice(separator + 1).trim();

    if (directive === "user-agent") {
      // Consecutive User-agent lines share one group.
      if (!collectingAgents) {
        currentAgents = [];
      }
      currentAgents.push(rulesFor(value.toLowerCase()));
      collectingAgents = true;
      continue;
    }

    collectingAgents = false;
    if (currentAgents.length === 0) {
      currentAgents = [rulesFor("*")];
    }

    if (directive === "allow" && value) {
      for (const rules of currentAgents) {
        rules.allow.push(normalizeRulePath(value));
      }
    } else if (directive === "disallow" && value) {
      for (const rules of currentAgents) {
        rules.disallow.push(normalizeRulePath(value));
      }
    } else if (directive === "crawl-delay") {
      const seconds = Number.parseFloat(value);
      if (Number.isFinite(seconds) && seconds >= 0) {
        for (const rules of currentAgents) {
          rules.crawlDelayMs = seconds * 1000;
        }
      }
    }
  }

  const rules = selectAgentRules(groups, userAgent);
  if (!rules) {
    return buildAllowAllPolicy();
  }

  return {
    isAllowed: (pathname: string): boolean => {
      const allow = longestMatch(rules.allow, pathname);
      const disallow = longestMatch(rules.disallow, pathname);
      return allow >= disallow;
    },
    crawlDelayMs: rules.crawlDelayMs,
    source: "robots.txt",
  };
}

export async function loadRobotsPolicy(
  startUrl: URL,
  options: Pick<FetchSettings, "timeoutMs" | "userAgent">
): Promise<RobotsPolicy> {
  const robotsUrl = new URL("/robots.txt", startUrl.origin).toString();
  try {
    const text = await fetchWithTimeout(
      robotsUrl,
      options.timeoutMs,
      options.userAgent
    );
    logger.debug(`Loaded robots.txt from ${robotsUrl}`);
    return parseRobotsTxt(text, options.userAgent);
  } catch (error) {
    logger.debug(
      `Could not load robots.txt from ${robotsUrl}: ${describeError(error)}`
    );
    return buildAllowAllPolicy();
  }
}
