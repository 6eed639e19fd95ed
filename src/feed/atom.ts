/**
 * Atom Feed Emitter
 *
 * Writes a deliberately minimal Atom document: one <entry> per post with
 * <title>, <published> and <link> when the post has `title`, `date` and
 * `url`. The feed-level <id>, <title> and <updated> elements that RFC 4287
 * requires are not emitted, so the output is not a conforming Atom feed.
 */

import { asString } from "../value";
import type { Post } from "../types";

const XML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&apos;",
};

export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => XML_ESCAPES[char] ?? char);
}

/**
 * Serialize posts, in the given order, as an Atom feed
 */
export function generateAtomFeed(posts: readonly Post[]): string {
  const lines = [
    '<?xml version="1.0" encoding="utf-8"?>',
    '<feed xmlns="http://www.w3.org/2005/Atom">',
  ];

  for (const post of posts) {
    lines.push("  <entry>");

    const title = asString(post.get("title"));
    if (title !== undefined) {
      lines.push(`    <title>${escapeXml(title)}</title>`);
    }

    const date = asString(post.get("date"));
    if (date !== undefined) {
      lines.push(`    <published>${escapeXml(date)}</published>`);
    }

    const url = asString(post.get("url"));
    if (url !== undefined) {
      lines.push(`    <link href="${escapeXml(url)}" />`);
    }

    lines.push("  </entry>");
  }

  lines.push("</feed>");
  return lines.join("\n") + "\n";
}
