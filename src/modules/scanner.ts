/**
 * Scanner Module
 * Discovers post, template and asset files and compiles the templates
 */

import glob from "fast-glob";
import path from "node:path";
import { stat } from "fs/promises";
import { io } from "../errors";
import { TemplateRegistry } from "../templates";
import { directoryExists } from "../utils";
import type { BuildContext } from "../types";

/**
 * List non-hidden files under a directory, sorted by relative path
 */
async function listFiles(directory: string, pattern = "**/*"): Promise<string[]> {
  const relative = await glob(pattern, {
    cwd: directory,
    onlyFiles: true,
    dot: false,
  });

  return relative.sort().map((file) => path.join(directory, file));
}

/**
 * Scans the source directory and populates context
 *
 * Writes to context:
 * - files: post, template and asset paths
 * - templates: compiled template registry
 */
export async function scan(ctx: BuildContext): Promise<void> {
  const { config, reporter } = ctx;
  const sourceDir = path.resolve(config.source);
  const postsDir = path.join(sourceDir, config.directories.posts);
  const templatesDir = path.join(sourceDir, config.directories.templates);
  const assetsDir = path.join(sourceDir, config.directories.assets);

  // 1. The posts directory is required; a missing one surfaces as IoError
  await io(stat(postsDir));
  const posts = await listFiles(postsDir);
  reporter.debug(`Found ${posts.length} posts in ${postsDir}`);

  // 2. Templates: "<name><extension>" anywhere under the templates directory
  const extension = config.templates.extension;
  const templates = (await directoryExists(templatesDir))
    ? await listFiles(templatesDir, `**/*${extension}`)
    : [];

  reporter.info(`Registering templates in directory ${templatesDir}`);
  const registry = await TemplateRegistry.load(templatesDir, templates, extension);
  reporter.debug(`Registered templates: ${registry.names.join(", ")}`);

  // 3. Assets are optional
  const assets = (await directoryExists(assetsDir))
    ? await listFiles(assetsDir)
    : [];

  ctx.files = { posts, templates, assets };
  ctx.templates = registry;
}
