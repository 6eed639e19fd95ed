/**
 * Shared CLI option handling
 * Resolves configuration: flag > environment > config files > defaults
 */

import { z } from "zod";
import { loadConfig, Logger } from "../utils";
import type { LogLevel, SiteConfig } from "../types";

export const GlobalOptionsSchema = z.object({
  source: z.string().optional(),
  dest: z.string().optional(),
  baseUrl: z.string().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * The more verbose of two log levels
 */
function moreVerbose(a: LogLevel, b: LogLevel): LogLevel {
  return LOG_LEVELS.indexOf(a) <= LOG_LEVELS.indexOf(b) ? a : b;
}

/**
 * Override a config with explicit command-line flags. `--verbose` raises the
 * log level to at least info and never lowers it.
 */
export function applyOptions(config: SiteConfig, options: GlobalOptions): SiteConfig {
  return {
    ...config,
    source: options.source ?? config.source,
    destination: options.dest ?? config.destination,
    baseUrl: options.baseUrl ?? config.baseUrl,
    logging: options.verbose
      ? { level: moreVerbose(config.logging.level, "info") }
      : config.logging,
  };
}

interface CommandSetup {
  config: SiteConfig;
  logger: Logger;
}

/**
 * Validate options, load configuration and create the process-wide logger
 */
export async function setupCommand(opts: unknown): Promise<CommandSetup> {
  const options = GlobalOptionsSchema.parse(opts);
  const { config: loaded, errors } = await loadConfig(options.config);
  const config = applyOptions(loaded, options);
  const logger = new Logger(config.logging.level);

  for (const { path, error } of errors) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`Ignoring configuration from ${path}: ${message}`);
  }

  return { config: Object.freeze(config), logger };
}

/**
 * Print an error's display text and exit nonzero
 */
export function fail(error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);
  new Logger().error(message);
  process.exit(1);
}
