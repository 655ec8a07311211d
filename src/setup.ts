import { spawn } from "node:child_process";

const WITH_DEPS_FLAG = "--with-deps";
const DEFAULT_BROWSER = "chromium";

/**
 * Arguments for `playwright install`; system dependencies are always
 * requested, and Chromium is the default browser.
 */
export function buildInstallArgs(extraArgs: string[]): string[] {
  const args = ["playwright", "install"];
  if (!extraArgs.includes(WITH_DEPS_FLAG)) {
    args.push(WITH_DEPS_FLAG);
  }
  const namesBrowser = extraArgs.some((arg) => !arg.startsWith("-"));
  return namesBrowser
    ? [...args, ...extraArgs]
    : [...args, ...extraArgs, DEFAULT_BROWSER];
}

export async function runBrowserSetup(extraArgs: string[]): Promise<void> {
  const args = buildInstallArgs(extraArgs);

  await new Promise<void>((resolve, reject) => {
    const child = spawn("npx", args, {
      stdio: "inherit",
      shell: process.platform === "win32",
    });

    child.on("error", (error) => {
      reject(error);
    });

    child.on("exit", (code) => {
      if (code === 0) {
        resolve();
        return;
      }
      reject(new Error(`Browser install failed with exit code ${code}`));
    });
  });
}
