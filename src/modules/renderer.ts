/**
 * Renderer Module
 * Writes the site index, tag indexes, tag feeds, post pages and site feed
 */

import path from "node:path";
import { mkdir, writeFile } from "fs/promises";
import { TagPathError, io } from "../errors";
import { generateAtomFeed } from "../feed/atom";
import { asString, mapValue, toPlain, type PlainValue } from "../value";
import type { BuildContext, IndexView, Post, TagIndex } from "../types";

export const INDEX_TEMPLATE = "index";
export const DEFAULT_LAYOUT = "default";

/**
 * Write a file, creating its parent directories first
 */
async function writeOutput(file: string, content: string): Promise<void> {
  await io(mkdir(path.dirname(file), { recursive: true }));
  await io(writeFile(file, content, "utf-8"));
}

function plainPosts(posts: readonly Post[]): PlainValue[] {
  return posts.map((post) => toPlain(mapValue(post)));
}

/**
 * Build the `index` template context
 */
export function indexView(
  posts: readonly Post[],
  tagIndex: TagIndex,
  tag: string | null,
): IndexView {
  return {
    posts: plainPosts(posts),
    tags: [...tagIndex.keys()].sort(),
    tag,
  };
}

/**
 * Destination of a post page: its `path` with the extension forced to .html
 */
export function postOutputPath(destination: string, post: Post): string | undefined {
  const relative = asString(post.get("path"));
  if (relative === undefined) return undefined;

  const { dir, name } = path.parse(relative);
  return path.join(destination, dir, `${name}.html`);
}

/**
 * Directory of a tag's index and feed. The tag must resolve to a directory
 * strictly inside the destination.
 */
export function tagDirectory(destination: string, tag: string): string {
  const directory = path.resolve(destination, tag);
  const relative = path.relative(destination, directory);

  if (
    relative === "" ||
    relative === ".." ||
    relative.startsWith(`..${path.sep}`) ||
    path.isAbsolute(relative)
  ) {
    throw new TagPathError(tag, destination);
  }

  return directory;
}

/**
 * Reads from context:
 * - templates
 * - collection
 * - tagIndex
 */
export async function render(ctx: BuildContext): Promise<void> {
  if (!ctx.templates || !ctx.collection || !ctx.tagIndex) {
    throw new Error("Scanner and assembler must run before renderer");
  }

  const { config, reporter, templates, collection, tagIndex, stats } = ctx;
  const destination = path.resolve(config.destination);

  // Checked before anything is written
  const tagPages = [...tagIndex].map(([tag, posts]) => ({
    tag,
    posts,
    tagDir: tagDirectory(destination, tag),
  }));

  // 1. Site index
  const indexPath = path.join(destination, "index.html");
  reporter.info(`Rendering index to ${indexPath}`);
  await writeOutput(
    indexPath,
    templates.render(INDEX_TEMPLATE, indexView(collection, tagIndex, null)),
  );
  stats.pages++;

  // 2. Tag indexes and tag feeds
  for (const { tag, posts, tagDir } of tagPages) {
    reporter.info(`Rendering tag "${tag}" to ${tagDir}`);

    await writeOutput(
      path.join(tagDir, "index.html"),
      templates.render(INDEX_TEMPLATE, indexView(posts, tagIndex, tag)),
    );
    stats.pages++;

    await writeOutput(path.join(tagDir, "atom.xml"), generateAtomFeed(posts));
    stats.feeds++;
  }

  // 3. Post pages
  for (const post of collection) {
    const outputPath = postOutputPath(destination, post);
    if (outputPath === undefined) continue;

    const layout = asString(post.get("layout")) ?? DEFAULT_LAYOUT;
    reporter.info(`Rendering post to ${outputPath}`);
    await writeOutput(outputPath, templates.render(layout, toPlain(mapValue(post))));
    stats.pages++;
  }

  // 4. Site feed
  await writeOutput(path.join(destination, "atom.xml"), generateAtomFeed(collection));
  stats.feeds++;
}
