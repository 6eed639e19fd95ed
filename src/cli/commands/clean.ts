/**
 * Clean command - Removes the destination directory
 */

import { Site } from "../../site";
import { fail, setupCommand } from "../options";

export async function cleanCommand(opts: unknown): Promise<void> {
  try {
    const { config, logger } = await setupCommand(opts);
    await new Site(config, logger).clean();
  } catch (error) {
    fail(error);
  }
}
