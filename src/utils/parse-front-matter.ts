/**
 * Front Matter Parser
 * Splits a document into its YAML metadata block and its raw body
 */

import {
  FrontMatterError,
  UnexpectedEofError,
} from "../errors";
import { parseYaml, type ValueMap } from "../value";

export const FRONT_MATTER_DELIMITER = "---";

export interface FrontMatterDocument {
  frontMatter: ValueMap;
  body: string;
}

/**
 * Line reader over a string. Lines keep their terminator; null marks the end.
 */
function lineReader(text: string): () => string | null {
  let offset = 0;

  return () => {
    if (offset >= text.length) return null;
    const newline = text.indexOf("\n", offset);
    const end = newline === -1 ? text.length : newline + 1;
    const line = text.slice(offset, end);
    offset = end;
    return line;
  };
}

/**
 * Parse a document that starts with a `---` delimited YAML block
 *
 * @param text - Full document text
 * @param source - Identifier used in errors (usually the file path)
 * @returns The decoded front matter map and the unconsumed body
 *
 * @example
 * parseFrontMatter("---\ntitle: Hi\n---\nBody\n", "post.md")
 * // { frontMatter: ValueMap { title: "Hi" }, body: "Body\n" }
 */
export function parseFrontMatter(
  text: string,
  source: string,
): FrontMatterDocument {
  const readLine = lineReader(text);

  const first = readLine();
  if (first === null) {
    throw new UnexpectedEofError(source);
  }
  if (!first.startsWith(FRONT_MATTER_DELIMITER)) {
    throw FrontMatterError.missing();
  }

  let block = "";
  let consumed = first.length;
  for (;;) {
    const line = readLine();
    if (line === null) {
      throw new UnexpectedEofError(source);
    }
    consumed += line.length;
    if (line.startsWith(FRONT_MATTER_DELIMITER)) break;
    block += line;
  }

  const value = parseYaml(block);
  if (value.kind !== "map") {
    throw FrontMatterError.notAMapping();
  }

  return { frontMatter: value.entries, body: text.slice(consumed) };
}
