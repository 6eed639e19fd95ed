/**
 * Utility exports
 */

// Front matter and posts
export { parseFrontMatter, FRONT_MATTER_DELIMITER } from "./parse-front-matter";
export type { FrontMatterDocument } from "./parse-front-matter";
export { normalizePost, loadPost, destinationPath } from "./normalize-post";
export type { NormalizeOptions } from "./normalize-post";
export { extractDateFromPath, parsePostDate, UNIX_EPOCH } from "./post-date";
export { renderMarkdown, isMarkdownExtension } from "./render-markdown";

// Filesystem utilities
export { directoryExists } from "./directory-exists";

// Config utilities
export {
  loadConfig,
  loadConfigFile,
  loadDefaultConfig,
  mergeConfig,
  configFromEnv,
  getUserConfigPath,
  ENV,
} from "./load-config";

// Classes
export { Logger } from "./logger";
