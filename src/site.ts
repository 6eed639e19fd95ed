/**
 * Site - Pipeline orchestrator
 * Coordinates the build pipeline with zero business logic
 */

import path from "node:path";
import { rm } from "fs/promises";
import { io } from "./errors";
import * as modules from "./modules";
import type { BuildContext, BuildStats, Reporter, SiteConfig } from "./types";

export type BuildStage = "scan" | "assets" | "parse" | "assemble" | "render";

export interface BuildHooks {
  // Called before each stage starts
  onStage?: (stage: BuildStage) => void;
}

const silentReporter: Reporter = {
  debug: () => {},
  info: () => {},
  warn: () => {},
};

export class Site {
  constructor(
    private readonly config: Readonly<SiteConfig>,
    private readonly reporter: Reporter = silentReporter,
  ) {}

  /**
   * Remove the destination directory. A missing directory is not an error.
   */
  async clean(): Promise<void> {
    const destination = path.resolve(this.config.destination);
    this.reporter.info(`Cleaning build directory: ${destination}`);
    await io(rm(destination, { recursive: true, force: true }));
  }

  /**
   * Run the build pipeline
   * Every stage runs to completion before the next starts; the first error
   * aborts the build and files already written stay on disk
   */
  async build(hooks: BuildHooks = {}): Promise<BuildContext> {
    const ctx: BuildContext = {
      config: this.config,
      reporter: this.reporter,
      stats: newStats(),
    };

    this.reporter.info(
      `Building from ${this.config.source} to ${this.config.destination}`,
    );

    hooks.onStage?.("scan");
    await modules.scan(ctx);

    hooks.onStage?.("assets");
    await modules.copyAssets(ctx);

    hooks.onStage?.("parse");
    await modules.parse(ctx);

    hooks.onStage?.("assemble");
    await modules.assemble(ctx);

    hooks.onStage?.("render");
    await modules.render(ctx);

    ctx.stats.endTime = new Date();
    return ctx;
  }
}

function newStats(): BuildStats {
  return {
    posts: 0,
    tags: 0,
    pages: 0,
    feeds: 0,
    assets: 0,
    startTime: new Date(),
  };
}
