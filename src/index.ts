#!/usr/bin/env node
/**
 * Twinpane
 *
 * Entry point: reads the environment, takes over the terminal and runs
 * the two-pane browser until the user quits.
 */

import { loadConfig } from "./config.js";
import { runApp } from "./app.js";
import { NavigationController } from "./navigation-controller.js";
import { createSystemOpener } from "./opener.js";
import { createBlessedSurface } from "./terminal/blessed-surface.js";
import type { TerminalSurface } from "./terminal/types.js";
import { appLog as log, createFileSink, setLogSink, silentSink } from "./logger.js";

async function main(): Promise<number> {
  const config = loadConfig();
  setLogSink(config.logFile !== null ? createFileSink(config.logFile) : silentSink);
  log.info(`Starting with ${config.leftDirectory} | ${config.rightDirectory}`);

  const controller = new NavigationController({
    leftDirectory: config.leftDirectory,
    rightDirectory: config.rightDirectory,
    opener: createSystemOpener(config.openerCommand),
  });

  let surface: TerminalSurface;
  try {
    surface = createBlessedSurface();
  } catch (error) {
    console.error("Failed to initialize the terminal:", error instanceof Error ? error.message : error);
    return 1;
  }

  try {
    await runApp(controller, surface);
  } finally {
    surface.destroy();
  }
  return 0;
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(1);
  }
);
