import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";

const readPackageVersion = (): string => {
  try {
    const raw = readFileSync(
      fileURLToPath(new URL("../package.json", import.meta.url)),
      "utf8"
    );
    const parsed: unknown = JSON.parse(raw);
    if (
      typeof parsed === "object" &&
      parsed !== null &&
      "version" in parsed &&
      typeof parsed.version === "string"
    ) {
      return parsed.version;
    }
  } catch {
    // Running from an unusual layout; fall through to the placeholder.
  }
  return "0.0.0";
};

export const packageVersion = readPackageVersion();

export const isMainModule = (metaUrl: string): boolean => {
  if (!process.argv[1]) {
    return false;
  }

  const mainPath = resolve(process.argv[1]);
  const selfPath = fileURLToPath(metaUrl);

  return mainPath === selfPath;
};
