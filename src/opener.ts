/**
 * External Opener
 *
 * Hands a file to the platform's "open with default application" command.
 * The child is detached; only a failure to launch it is reported.
 */

import { spawn } from "node:child_process";
import { createLogger } from "./logger.js";

const log = createLogger("Opener");

export type Opener = (path: string) => Promise<void>;

/**
 * Command and leading arguments for the current platform.
 */
export function defaultOpenerCommand(platform: NodeJS.Platform = process.platform): string[] {
  switch (platform) {
    case "darwin":
      return ["open"];
    case "win32":
      return ["cmd", "/c", "start", ""];
    default:
      return ["xdg-open"];
  }
}

/**
 * Splits a configured opener such as "code --reuse-window" into argv parts.
 */
export function parseOpenerCommand(command: string): string[] {
  return command.split(/\s+/).filter((part) => part.length > 0);
}

/**
 * Creates an opener that spawns `command` with the file path appended.
 * Resolves once the process has started; rejects if it cannot be launched.
 */
export function createSystemOpener(command: string[] = defaultOpenerCommand()): Opener {
  const [program, ...baseArgs] = command;
  if (program === undefined) {
    throw new Error("Opener command is empty");
  }

  return (path: string) =>
    new Promise<void>((resolve, reject) => {
      log.debug(`Launching ${program} for ${path}`);
      const child = spawn(program, [...baseArgs, path], {
        detached: true,
        stdio: "ignore",
      });
      child.once("error", (error) => {
        log.warn(`Failed to launch ${program}`, error);
        reject(error);
      });
      child.once("spawn", () => {
        child.unref();
        resolve();
      });
    });
}
