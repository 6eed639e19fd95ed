/**
 * Markdown to HTML conversion (remark + rehype)
 */

import { unified } from "unified";
import remarkParse from "remark-parse";
import remarkGfm from "remark-gfm";
import remarkRehype from "remark-rehype";
import rehypeStringify from "rehype-stringify";

const MARKDOWN_EXTENSIONS = new Set([".md", ".markdown"]);

const processor = unified()
  .use(remarkParse)
  .use(remarkGfm)
  .use(remarkRehype, { allowDangerousHtml: true })
  .use(rehypeStringify, { allowDangerousHtml: true });

/**
 * Check whether a file extension denotes Markdown content
 */
export function isMarkdownExtension(extension: string): boolean {
  return MARKDOWN_EXTENSIONS.has(extension.toLowerCase());
}

/**
 * Render Markdown to HTML. Raw HTML in the source is passed through.
 */
export function renderMarkdown(markdown: string): string {
  return String(processor.processSync(markdown));
}
