#!/usr/bin/env node

/**
 * CLI entry point for the inkpost static site generator
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { buildCommand } from "./commands/build";
import { cleanCommand } from "./commands/clean";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("inkpost")
  .description("Merge front-matter posts into Handlebars templates and emit a static site")
  .version("0.1.0");

// Global options shared by every command
program
  .option("-s, --source <dir>", "Directory containing posts, templates and assets")
  .option("-o, --dest <dir>", "Directory where output will be stored")
  .option("-u, --base-url <url>", "Base URL prepended to post links")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "Verbose output");

program
  .command("build")
  .description("Build static site pages")
  .action(() => buildCommand(program.opts()));

program
  .command("clean")
  .description("Clean destination directory")
  .action(() => cleanCommand(program.opts()));

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
