/**
 * Warden CLI — Program Definition
 *
 * Builds the commander program. Kept apart from the entry point so tests
 * can inspect the command tree without parsing argv.
 */

import { Command } from "commander";
import { registerSyncCommand } from "./commands/sync";
import { registerCheckCommand } from "./commands/check";
import { registerWhereCommand } from "./commands/where";
import { setDebugMode } from "./output";

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("winget-warden")
    .description("Keep winget installed and at its latest release")
    .version("0.1.0")
    .option("--config <file>", "Path to a YAML config file")
    .option("--debug", "Show debug output and engine logs", false)
    .hook("preAction", (thisCommand) => {
      setDebugMode(Boolean(thisCommand.opts().debug));
    });

  registerSyncCommand(program);
  registerCheckCommand(program);
  registerWhereCommand(program);

  return program;
}
