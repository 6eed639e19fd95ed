/**
 * Post and collection types
 */

import type { PlainValue, ValueMap } from "../value";

/**
 * A normalized post: front matter plus the derived `text`, `path`, `url`
 * and (when derivable) `date` fields
 */
export type Post = ValueMap;

/**
 * Maps a tag name to the posts carrying it, in collection order
 */
export type TagIndex = Map<string, Post[]>;

/**
 * Data handed to the `index` template for the site index and every tag index
 */
export interface IndexView {
  posts: PlainValue[];
  tags: string[];
  tag: string | null;
}
