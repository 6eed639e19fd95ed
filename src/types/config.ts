/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const DirectoriesConfigSchema = z.object({
  posts: z.string().min(1),
  templates: z.string().min(1),
  assets: z.string().min(1),
});

export const TemplatesConfigSchema = z.object({
  // Suffix stripped from template file names to form the template name
  extension: z.string().min(1),
});

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema,
});

export const SiteConfigSchema = z.object({
  source: z.string().min(1),
  destination: z.string().min(1),
  baseUrl: z.string(),
  directories: DirectoriesConfigSchema,
  templates: TemplatesConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialSiteConfigSchema = SiteConfigSchema.partial().extend({
  directories: DirectoriesConfigSchema.partial().optional(),
  templates: TemplatesConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type DirectoriesConfig = z.infer<typeof DirectoriesConfigSchema>;
export type TemplatesConfig = z.infer<typeof TemplatesConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type SiteConfig = z.infer<typeof SiteConfigSchema>;
export type PartialSiteConfig = z.infer<typeof PartialSiteConfigSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}
