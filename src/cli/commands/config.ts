/**
 * Config command - Show configuration file location
 */

import { ENV, getUserConfigPath } from "../../utils";

export function configCommand(): void {
  console.log("User configuration file location:");
  console.log(getUserConfigPath());
  console.log("\nCreate this file to customize build settings.");
  console.log("See src/config/default.json for available options.");
  console.log(
    `\nEnvironment overrides: ${Object.values(ENV).join(", ")}`,
  );
}
