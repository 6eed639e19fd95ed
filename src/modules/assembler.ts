/**
 * Assembler Module
 * Orders the collection newest first and indexes it by tag
 */

import { asArray, asString } from "../value";
import { UNIX_EPOCH, parsePostDate } from "../utils";
import type { BuildContext, Post, TagIndex } from "../types";

/**
 * Sort key of a post: its parsed `date`, or the Unix epoch
 */
export function postTimestamp(post: Post): number {
  const date = asString(post.get("date"));
  const parsed = date === undefined ? undefined : parsePostDate(date);
  return (parsed ?? UNIX_EPOCH).getTime();
}

/**
 * Return a new array sorted by date, newest first. The sort is stable, so
 * posts with equal dates keep their input order.
 */
export function sortCollection(posts: readonly Post[]): Post[] {
  return posts
    .map((post) => ({ post, timestamp: postTimestamp(post) }))
    .sort((a, b) => b.timestamp - a.timestamp)
    .map(({ post }) => post);
}

/**
 * Tag names of a post: `tags` as a single string, or the string elements of
 * a `tags` array. Repeats are kept.
 */
export function postTags(post: Post): string[] {
  const tags = post.get("tags");

  const single = asString(tags);
  if (single !== undefined) return [single];

  return (asArray(tags) ?? []).flatMap((item) => {
    const tag = asString(item);
    return tag === undefined ? [] : [tag];
  });
}

/**
 * Group posts by tag in one pass, so each bucket keeps collection order
 */
export function buildTagIndex(collection: readonly Post[]): TagIndex {
  const index: TagIndex = new Map();

  for (const post of collection) {
    for (const tag of postTags(post)) {
      const bucket = index.get(tag);
      if (bucket) {
        bucket.push(post);
      } else {
        index.set(tag, [post]);
      }
    }
  }

  return index;
}

/**
 * Reads from context:
 * - posts
 *
 * Writes to context:
 * - collection
 * - tagIndex
 */
export async function assemble(ctx: BuildContext): Promise<void> {
  if (!ctx.posts) {
    throw new Error("Parser must run before assembler");
  }

  ctx.collection = sortCollection(ctx.posts);
  ctx.tagIndex = buildTagIndex(ctx.collection);
  ctx.stats.tags = ctx.tagIndex.size;
  ctx.reporter.debug(
    `Assembled ${ctx.collection.length} posts under ${ctx.tagIndex.size} tags`,
  );
}
