/**
 * Warden CLI — Command Context
 *
 * Turns the global flags (--config, --debug) plus a command's own flags
 * into a ready Reconciler. Config problems end the process here, before
 * any command output starts.
 */

import { Command } from "commander";
import { Reconciler } from "@winget-warden/engine";
import { getReconcilerOptions, RunFlags } from "./config";
import { EXIT_CODES } from "./exit-codes";
import { colors, isDebugMode, printError, printInfo } from "./output";

export type GlobalOptions = {
  config?: string;
  debug?: boolean;
};

export function createReconciler(
  cmd: Command,
  flags: Partial<RunFlags> = {},
): Reconciler {
  const globals = cmd.optsWithGlobals<GlobalOptions>();

  try {
    const options = getReconcilerOptions(globals.config, {
      dryRun: flags.dryRun ?? false,
      force: flags.force ?? false,
      verbose: (flags.verbose ?? false) || isDebugMode(),
    });
    return new Reconciler(options);
  } catch (err: unknown) {
    printError(err instanceof Error ? err.message : String(err));
    printInfo(`Fix the file or pass another with ${colors.bold("--config <file>")}.`);
    process.exit(EXIT_CODES.FAILURE);
  }
}
