/**
 * Build context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { SiteConfig } from "./config";
import type { Post, TagIndex } from "./post";
import type { TemplateRegistry } from "../templates";

/**
 * Progress reporting consumed by the pipeline. The CLI passes a Logger.
 */
export interface Reporter {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

export interface SourceFiles {
  posts: string[]; // Absolute paths, sorted by path relative to the posts root
  templates: string[];
  assets: string[];
}

export interface BuildStats {
  posts: number;
  tags: number;
  pages: number;
  feeds: number;
  assets: number;
  startTime: Date;
  endTime?: Date;
}

export interface BuildContext {
  // Input - provided at initialization
  config: Readonly<SiteConfig>;
  reporter: Reporter;
  stats: BuildStats;

  files?: SourceFiles; // Scanner
  templates?: TemplateRegistry; // Scanner
  posts?: Post[]; // Parser, discovery order
  collection?: Post[]; // Assembler, newest first
  tagIndex?: TagIndex; // Assembler
}
