/**
 * Error taxonomy
 * Every failure raised by the pipeline is a SiteError with a stable `kind`.
 * Nothing is recovered locally: the first error aborts the build and the CLI
 * prints its message.
 */

export type SiteErrorKind =
  | "io"
  | "template"
  | "unexpected-eof"
  | "deserialization"
  | "other";

/**
 * Base error class with a kind discriminant
 */
export abstract class SiteError extends Error {
  abstract readonly kind: SiteErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * Underlying filesystem failure (open, read, write, mkdir, copy)
 */
export class IoError extends SiteError {
  readonly kind = "io";
  readonly code: string;

  constructor(error: NodeJS.ErrnoException) {
    super(error.message, { cause: error });
    this.code = error.code ?? "EIO";
  }
}

/**
 * Template not found, failed to compile, or failed while rendering
 */
export class TemplateError extends SiteError {
  readonly kind = "template";
  readonly template: string;

  constructor(template: string, message: string, cause?: unknown) {
    super(message, { cause });
    this.template = template;
  }

  static notFound(template: string): TemplateError {
    return new TemplateError(template, `Template not found: ${template}`);
  }

  static fromCompile(template: string, error: unknown): TemplateError {
    const reason = error instanceof Error ? error.message : String(error);
    return new TemplateError(
      template,
      `Error compiling "${template}": ${reason}`,
      error,
    );
  }

  static fromRender(template: string, error: unknown): TemplateError {
    const reason = error instanceof Error ? error.message : String(error);
    return new TemplateError(
      template,
      `Error rendering "${template}": ${reason}`,
      error,
    );
  }
}

/**
 * Input ended before the front matter block was complete
 */
export class UnexpectedEofError extends SiteError {
  readonly kind = "unexpected-eof";
  readonly source: string;

  constructor(source: string) {
    super(`Unexpected end of file: ${source}`);
    this.source = source;
  }
}

/**
 * The YAML decoder rejected the front matter block
 */
export class DeserializationError extends SiteError {
  readonly kind = "deserialization";
  readonly reason: string;

  constructor(reason: string, cause?: unknown) {
    super(`YAML deserialization failure: ${reason}`, { cause });
    this.reason = reason;
  }
}

/**
 * Domain invariant violations
 */
export class OtherError extends SiteError {
  readonly kind = "other";
}

export class FrontMatterError extends OtherError {
  static missing(): FrontMatterError {
    return new FrontMatterError("Missing front matter.");
  }

  static notAMapping(): FrontMatterError {
    return new FrontMatterError("Parsed YAML is not a mapping.");
  }
}

export class UnrepresentableNumberError extends OtherError {
  readonly literal: string;

  constructor(literal: string) {
    super(`Unknown number format while parsing YAML: ${literal}`);
    this.literal = literal;
  }
}

export class PathPrefixError extends OtherError {
  readonly path: string;
  readonly root: string;

  constructor(path: string, root: string) {
    super(`Path "${path}" is not under "${root}"`);
    this.path = path;
    this.root = root;
  }
}

export class TagPathError extends OtherError {
  readonly tag: string;

  constructor(tag: string, destination: string) {
    super(`Tag "${tag}" does not name a directory under "${destination}"`);
    this.tag = tag;
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string"
  );
}

/**
 * Wrap filesystem errors as IoError, pass everything else through
 */
export function toSiteError(error: unknown): unknown {
  if (error instanceof SiteError) return error;
  if (isErrnoException(error)) return new IoError(error);
  return error;
}

/**
 * Run a filesystem operation, rethrowing its failure as IoError
 */
export async function io<T>(operation: Promise<T>): Promise<T> {
  try {
    return await operation;
  } catch (error) {
    throw toSiteError(error);
  }
}
