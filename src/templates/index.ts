/**
 * Template registry
 * Compiles every template under the source templates directory and renders
 * them by name
 */

import Handlebars from "handlebars";
import path from "node:path";
import { readFile } from "fs/promises";
import { TemplateError, io } from "../errors";
import { registerHelpers } from "./helpers";

export { registerHelpers, formatDateTime, join } from "./helpers";

/**
 * Derive a template name from its path relative to the templates directory
 *
 * @example
 * templateName("blog/post.html.hbs", ".html.hbs") // "blog/post"
 */
export function templateName(relativePath: string, extension: string): string {
  const normalized = relativePath.split(path.sep).join("/");
  return normalized.endsWith(extension)
    ? normalized.slice(0, -extension.length)
    : normalized;
}

export class TemplateRegistry {
  private readonly hbs = Handlebars.create();
  private readonly templates = new Map<string, HandlebarsTemplateDelegate>();

  constructor() {
    registerHelpers(this.hbs);
  }

  /**
   * Load every template file, naming each by its relative path minus the
   * extension. Each template is also registered as a partial.
   */
  static async load(
    directory: string,
    files: string[],
    extension: string,
  ): Promise<TemplateRegistry> {
    const registry = new TemplateRegistry();

    for (const file of files) {
      const name = templateName(path.relative(directory, file), extension);
      const source = await io(readFile(file, "utf-8"));
      registry.register(name, source);
    }

    return registry;
  }

  get names(): string[] {
    return [...this.templates.keys()].sort();
  }

  has(name: string): boolean {
    return this.templates.has(name);
  }

  /**
   * Compile and register a template. Syntax errors surface here rather than
   * at first render.
   */
  register(name: string, source: string): void {
    try {
      this.hbs.parse(source);
    } catch (error) {
      throw TemplateError.fromCompile(name, error);
    }

    this.templates.set(name, this.hbs.compile(source));
    this.hbs.registerPartial(name, source);
  }

  /**
   * Render a registered template. Missing variables render as empty.
   */
  render(name: string, context: unknown): string {
    const template = this.templates.get(name);
    if (!template) {
      throw TemplateError.notFound(name);
    }

    try {
      return template(context);
    } catch (error) {
      throw TemplateError.fromRender(name, error);
    }
  }
}
