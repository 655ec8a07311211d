import { stat } from "node:fs/promises";
import { ConfigError } from "./errors.js";

const INTEGER_REGEX = /^\d+$/;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

/**
 * Parse a count the user must get right (depth, budgets, delays).
 */
export function parseNonNegativeInt(
  raw: string | undefined,
  flag: string
): number {
  const trimmed = raw?.trim() ?? "";
  if (!INTEGER_REGEX.test(trimmed)) {
    throw new ConfigError(
      `${flag} must be a non-negative integer (got "${raw ?? ""}")`
    );
  }
  return Number.parseInt(trimmed, 10);
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch {
    return false;
  }
}
