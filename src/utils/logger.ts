/**
 * Logger Utility
 * Handles console output with different log levels
 */

import chalk from "chalk";
import type { LogLevel, Reporter } from "../types";

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export class Logger implements Reporter {
  constructor(private level: LogLevel = "warn") {}

  private enabled(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  debug(message: string): void {
    if (this.enabled("debug")) {
      console.log(`${chalk.dim("[DEBUG]")} ${message}`);
    }
  }

  info(message: string): void {
    if (this.enabled("info")) {
      console.log(`${chalk.cyan("[INFO]")} ${message}`);
    }
  }

  warn(message: string): void {
    if (this.enabled("warn")) {
      console.warn(`${chalk.yellow("[WARN]")} ${message}`);
    }
  }

  error(message: string): void {
    console.error(`${chalk.red("[ERROR]")} ${message}`);
  }
}
