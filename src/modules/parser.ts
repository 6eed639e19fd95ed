/**
 * Parser Module
 * Reads every post file into a normalized Post
 */

import path from "node:path";
import { loadPost } from "../utils";
import type { BuildContext, Post } from "../types";

/**
 * Parses posts in discovery order. The first failure aborts the build.
 *
 * Reads from context:
 * - files.posts
 *
 * Writes to context:
 * - posts
 */
export async function parse(ctx: BuildContext): Promise<void> {
  if (!ctx.files) {
    throw new Error("Scanner must run before parser");
  }

  const { config, reporter } = ctx;
  const postsRoot = path.resolve(config.source, config.directories.posts);
  const posts: Post[] = [];

  for (const file of ctx.files.posts) {
    reporter.debug(`Parsing ${file}`);
    posts.push(await loadPost(file, { postsRoot, baseUrl: config.baseUrl }));
  }

  ctx.posts = posts;
  ctx.stats.posts = posts.length;
}
