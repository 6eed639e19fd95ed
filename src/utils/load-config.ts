/**
 * Configuration Loader
 * Loads and merges configuration from defaults, config files and environment
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type { ConfigError, PartialSiteConfig, SiteConfig } from "../types";
import {
  LogLevelSchema,
  PartialSiteConfigSchema,
  SiteConfigSchema,
} from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("inkpost", { suffix: "" });

/**
 * Environment variables read by loadConfig
 */
export const ENV = {
  source: "INKPOST_SOURCE",
  destination: "INKPOST_DEST",
  baseUrl: "INKPOST_BASE_URL",
  logLevel: "INKPOST_LOG",
} as const;

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/inkpost or ~/.config/inkpost
 * - macOS: ~/Library/Preferences/inkpost
 * - Windows: %APPDATA%\inkpost
 */
function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<SiteConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return SiteConfigSchema.parse(JSON.parse(content));
}

/**
 * Load a partial configuration file with Zod validation
 * Throws if the file is unreadable, not JSON, or fails the schema
 */
export async function loadConfigFile(
  configPath: string,
): Promise<PartialSiteConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialSiteConfigSchema.parse(JSON.parse(content));
}

/**
 * Deep merge a partial config over a complete one
 */
export function mergeConfig(
  base: SiteConfig,
  override: PartialSiteConfig,
): SiteConfig {
  return {
    ...base,
    ...override,
    directories: { ...base.directories, ...override.directories },
    templates: { ...base.templates, ...override.templates },
    logging: { ...base.logging, ...override.logging },
  };
}

/**
 * Read overrides from environment variables. Unset or empty variables are
 * ignored. An unknown log level is recorded in `errors` and skipped; the
 * other variables still apply.
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv,
  errors: ConfigError[] = [],
): PartialSiteConfig {
  const override: PartialSiteConfig = {};

  const source = env[ENV.source];
  if (source) override.source = source;

  const destination = env[ENV.destination];
  if (destination) override.destination = destination;

  const baseUrl = env[ENV.baseUrl];
  if (baseUrl !== undefined) override.baseUrl = baseUrl;

  const level = env[ENV.logLevel];
  if (level) {
    const parsed = LogLevelSchema.safeParse(level);
    if (parsed.success) {
      override.logging = { level: parsed.data };
    } else {
      errors.push({ path: ENV.logLevel, error: parsed.error });
    }
  }

  return override;
}

interface LoadConfigResult {
  config: SiteConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: environment > custom path > user config > default config
 * A config file that fails to load is reported and skipped
 */
export async function loadConfig(
  custom?: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
  if (existsSync(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadConfigFile(userConfigPath));
    } catch (error) {
      errors.push({ path: userConfigPath, error });
    }
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadConfigFile(custom));
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  config = mergeConfig(config, configFromEnv(env, errors));

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
