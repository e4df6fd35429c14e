import { spawn } from "node:child_process";
import { stat } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { ValidationError, errorMessage } from "@idmatch/core/errors";
import type { Logger } from "@idmatch/core/logger";

/** Starts `command` detached; resolves once it has spawned. */
export type Launcher = (command: string, args: readonly string[]) => Promise<void>;

export interface RevealCommand {
  command: string;
  args: string[];
}

export interface RevealOptions {
  logger: Logger;
  /** Default: process.platform */
  platform?: NodeJS.Platform;
  /** Default: spawnDetached */
  launcher?: Launcher;
}

export type RevealResult =
  | { ok: true; command: string }
  | { ok: false; message: string };

const LINUX_FILE_MANAGERS = ["xdg-open", "nautilus", "dolphin", "thunar", "nemo"];

export const spawnDetached: Launcher = (command, args) =>
  new Promise((resolvePromise, reject) => {
    const child = spawn(command, [...args], {
      detached: true,
      stdio: "ignore",
    });
    child.once("error", reject);
    child.once("spawn", () => {
      child.unref();
      resolvePromise();
    });
  });

/**
 * Commands to try, in order, to show `path` in the platform file manager.
 * Windows and macOS select the file; elsewhere its directory is opened.
 */
export function revealCommands(
  path: string,
  platform: NodeJS.Platform,
): RevealCommand[] {
  switch (platform) {
    case "win32":
      return [{ command: "explorer", args: ["/select,", path] }];
    case "darwin":
      return [{ command: "open", args: ["-R", path] }];
    default:
      return LINUX_FILE_MANAGERS.map((command) => ({
        command,
        args: [dirname(path)],
      }));
  }
}

/**
 * Shows a file in the system file manager. A missing file throws
 * ValidationError; a launcher failure is logged and reported in the result.
 */
export async function revealFile(
  path: string,
  options: RevealOptions,
): Promise<RevealResult> {
  const target = resolve(path);
  const logger = options.logger.child({ component: "reveal" });
  const launch = options.launcher ?? spawnDetached;

  try {
    await stat(target);
  } catch {
    throw new ValidationError(`File does not exist: ${target}`, {
      path: target,
    });
  }

  const failures: string[] = [];
  for (const { command, args } of revealCommands(
    target,
    options.platform ?? process.platform,
  )) {
    try {
      await launch(command, args);
      logger.info({ path: target, command }, "Revealed file");
      return { ok: true, command };
    } catch (err) {
      logger.debug({ command, err }, "File manager failed to start");
      failures.push(`${command}: ${errorMessage(err)}`);
    }
  }

  const message = `Failed to open file location for ${target} (${failures.join("; ")})`;
  logger.warn({ path: target }, message);
  return { ok: false, message };
}
