/**
 * Central type exports
 */

// Configuration
export type {
  SiteConfig,
  PartialSiteConfig,
  DirectoriesConfig,
  TemplatesConfig,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export {
  SiteConfigSchema,
  PartialSiteConfigSchema,
  LogLevelSchema,
} from "./config";

// Posts
export type { Post, TagIndex, IndexView } from "./post";

// Context
export type {
  BuildContext,
  BuildStats,
  Reporter,
  SourceFiles,
} from "./context";
