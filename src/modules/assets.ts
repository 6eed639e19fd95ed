/**
 * Assets Module
 * Copies non-hidden files under the source assets directory verbatim
 */

import path from "node:path";
import { copyFile, mkdir } from "fs/promises";
import { io } from "../errors";
import type { BuildContext } from "../types";

/**
 * Reads from context:
 * - files.assets
 */
export async function copyAssets(ctx: BuildContext): Promise<void> {
  if (!ctx.files) {
    throw new Error("Scanner must run before assets");
  }

  const { config, reporter, stats } = ctx;
  const assetsDir = path.resolve(config.source, config.directories.assets);
  const destination = path.resolve(config.destination);

  await io(mkdir(destination, { recursive: true }));

  for (const file of ctx.files.assets) {
    const target = path.join(destination, path.relative(assetsDir, file));
    reporter.info(`Copying ${file} to ${target}`);
    await io(mkdir(path.dirname(target), { recursive: true }));
    await io(copyFile(file, target));
    stats.assets++;
  }
}
