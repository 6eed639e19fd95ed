/**
 * Build command - Loads config and runs the build pipeline
 */

import ora from "ora";
import { Site } from "../../site";
import { stats } from "../../modules";
import { fail, setupCommand } from "../options";

const STAGE_TEXT = {
  scan: "Scanning files...",
  assets: "Copying assets...",
  parse: "Parsing posts...",
  assemble: "Assembling collection...",
  render: "Rendering pages...",
} as const;

export async function buildCommand(opts: unknown): Promise<void> {
  try {
    const { config, logger } = await setupCommand(opts);

    // The spinner would interleave with log lines, so it only runs when quiet
    const quiet = config.logging.level === "warn" || config.logging.level === "error";
    const spinner = ora({ text: "Initializing...", indent: 2, isEnabled: quiet }).start();

    try {
      const ctx = await new Site(config, logger).build({
        onStage: (stage) => {
          spinner.text = STAGE_TEXT[stage];
        },
      });

      spinner.stop();
      await stats(ctx);
    } catch (error) {
      spinner.fail("Build failed");
      throw error;
    }
  } catch (error) {
    fail(error);
  }
}
