/**
 * Runtime configuration
 *
 * Read from environment variables. Unset or invalid values fall back to
 * the defaults: working directory on the left, home directory on the right.
 */

import { homedir } from "node:os";
import { z } from "zod";
import { defaultOpenerCommand, parseOpenerCommand } from "./opener.js";
import { appLog as log } from "./logger.js";

export const ENV_LEFT = "TWINPANE_LEFT";
export const ENV_RIGHT = "TWINPANE_RIGHT";
export const ENV_OPENER = "TWINPANE_OPENER";
export const ENV_LOG_FILE = "TWINPANE_LOG_FILE";

const NonEmptyValueSchema = z.string().trim().min(1, "Value must not be empty");

export const AppConfigSchema = z.object({
  leftDirectory: NonEmptyValueSchema,
  rightDirectory: NonEmptyValueSchema,
  openerCommand: z.array(z.string().min(1)).min(1, "Opener command is required"),
  logFile: NonEmptyValueSchema.nullable(),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

type Env = Record<string, string | undefined>;

/**
 * Reads one variable, warning and returning undefined if it is set but invalid.
 */
function readEnvValue(env: Env, name: string): string | undefined {
  const raw = env[name];
  if (raw === undefined) {
    return undefined;
  }
  const parsed = NonEmptyValueSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn(`Invalid ${name} "${raw}", using default`);
    return undefined;
  }
  return parsed.data;
}

/**
 * Builds the configuration from the environment.
 *
 * @param env - Variables to read (defaults to process.env)
 * @param cwd - Working directory used for the left pane default
 */
export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): AppConfig {
  const opener = readEnvValue(env, ENV_OPENER);

  return AppConfigSchema.parse({
    leftDirectory: readEnvValue(env, ENV_LEFT) ?? cwd,
    rightDirectory: readEnvValue(env, ENV_RIGHT) ?? homedir(),
    openerCommand: opener !== undefined ? parseOpenerCommand(opener) : defaultOpenerCommand(),
    logFile: readEnvValue(env, ENV_LOG_FILE) ?? null,
  });
}
