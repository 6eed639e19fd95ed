/**
 * Post Normalizer
 * Turns a parsed document into a Post with its derived fields
 */

import path from "node:path";
import { readFile } from "fs/promises";
import { PathPrefixError, io } from "../errors";
import { stringValue } from "../value";
import { parseFrontMatter, type FrontMatterDocument } from "./parse-front-matter";
import { extractDateFromPath } from "./post-date";
import { isMarkdownExtension, renderMarkdown } from "./render-markdown";
import type { Post } from "../types";

export interface NormalizeOptions {
  postsRoot: string; // Directory the destination path is made relative to
  baseUrl: string;
}

/**
 * Compute the destination path of a post: relative to the posts root, with
 * forward slashes and an `.html` extension
 *
 * @example
 * destinationPath("/site/posts/2024/hello.md", "/site/posts") // "2024/hello.html"
 */
export function destinationPath(sourcePath: string, postsRoot: string): string {
  const relative = path.relative(path.resolve(postsRoot), path.resolve(sourcePath));

  if (
    relative === "" ||
    relative === ".." ||
    relative.startsWith(`..${path.sep}`) ||
    path.isAbsolute(relative)
  ) {
    throw new PathPrefixError(sourcePath, postsRoot);
  }

  const { dir, name } = path.parse(relative);
  return path.join(dir, `${name}.html`).split(path.sep).join("/");
}

/**
 * Inject `text`, `path`, `url` and a derived `date` into parsed front matter
 */
export function normalizePost(
  document: FrontMatterDocument,
  sourcePath: string,
  options: NormalizeOptions,
): Post {
  const post = document.frontMatter;

  const text = isMarkdownExtension(path.extname(sourcePath))
    ? renderMarkdown(document.body)
    : document.body;
  post.insert("text", stringValue(text));

  const destination = destinationPath(sourcePath, options.postsRoot);
  post.insert("path", stringValue(destination));
  post.insert("url", stringValue(`${options.baseUrl}/${destination}`));

  if (!post.has("date")) {
    const date = extractDateFromPath(destination);
    if (date !== undefined) {
      post.insert("date", stringValue(date));
    }
  }

  return post;
}

/**
 * Read, parse and normalize one post file
 */
export async function loadPost(
  sourcePath: string,
  options: NormalizeOptions,
): Promise<Post> {
  const content = await io(readFile(sourcePath, "utf-8"));
  const document = parseFrontMatter(content, sourcePath);
  return normalizePost(document, sourcePath, options);
}
