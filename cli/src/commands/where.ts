/**
 * Warden CLI — Where Command
 *
 * Prints the executable path the reconciler would use.
 *
 * Usage:
 *   winget-warden where
 */

import { Command } from "commander";
import { createReconciler } from "../context";
import { EXIT_CODES } from "../exit-codes";
import { printError, printInfo, colors } from "../output";

export function registerWhereCommand(program: Command): void {
  program
    .command("where")
    .description("Print the path of the installed tool")
    .action(async (_opts: Record<string, never>, cmd: Command) => {
      const reconciler = createReconciler(cmd);
      const exe = await reconciler.locateInstalledTool();

      if (!exe) {
        printError(`${reconciler.toolName} was not found on PATH or at its install location.`);
        printInfo(`Run ${colors.bold("winget-warden sync")} to install it.`);
        process.exit(EXIT_CODES.FAILURE);
      }

      console.log(exe);
    });
}
