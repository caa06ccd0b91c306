/**
 * Application loop
 *
 * Draw, read one key, handle it, repeat. The next key is not read until
 * the controller has finished with the previous one.
 */

import type { NavigationController } from "./navigation-controller.js";
import { renderFrame, visibleEntryRows } from "./renderer.js";
import type { TerminalSurface } from "./terminal/types.js";
import { appLog as log } from "./logger.js";

export async function runApp(controller: NavigationController, surface: TerminalSurface): Promise<void> {
  await controller.start();
  log.info("Event loop started");

  while (!controller.isFinished) {
    const size = surface.size();
    controller.setPageSize(visibleEntryRows(size.height));
    surface.draw(renderFrame(controller.state, size));

    const key = await surface.readKey();
    log.debug(`Key: ${key.name}`);
    await controller.handleKey(key);
  }

  log.info("Event loop finished");
}
