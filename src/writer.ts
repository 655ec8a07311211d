import type { FileHandle } from "node:fs/promises";
import { mkdir, open, rm } from "node:fs/promises";
import path from "node:path";
import { WRITE_PROBE_FILENAME } from "./constants.js";
import {
  ConfigError,
  classifyWriteError,
  describeError,
  WriteError,
} from "./errors.js";

function toWriteError(filePath: string, error: unknown): WriteError {
  return new WriteError(
    filePath,
    classifyWriteError(error),
    `Could not write ${filePath}: ${describeError(error)}`
  );
}

/**
 * Create parent directories and replace the file's contents. The handle
 * is closed on every path, including a failed write. A failed close is a
 * WriteError too; when the write already failed, that error is reported.
 */
export async function writeMarkdown(
  filePath: string,
  content: string
): Promise<void> {
  let handle: FileHandle | undefined;
  let failure: { error: unknown } | undefined;
  try {
    await mkdir(path.dirname(filePath), { recursive: true });
    handle = await open(filePath, "w");
    await handle.writeFile(content, "utf8");
  } catch (error) {
    failure = { error };
  }
  try {
    await handle?.close();
  } catch (error) {
    failure ??= { error };
  }
  if (failure) {
    throw toWriteError(filePath, failure.error);
  }
}

/**
 * Create the output root and prove it accepts files.
 */
export async function ensureWritableRoot(outputRoot: string): Promise<void> {
  const probe = path.join(outputRoot, WRITE_PROBE_FILENAME);
  try {
    await mkdir(outputRoot, { recursive: true });
    await writeMarkdown(probe, "");
    await rm(probe, { force: true });
  } catch (error) {
    throw new ConfigError(
      `Output directory "${outputRoot}" is not writable: ${describeError(error)}`,
      { cause: error }
    );
  }
}
