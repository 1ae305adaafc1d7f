/**
 * Warden CLI -- Sync Command
 *
 * Brings the managed tool to its latest release: installs it when absent,
 * updates it when stale, does nothing when current.
 *
 * Usage:
 *   winget-warden sync             Reconcile (default command)
 *   winget-warden sync --dry-run   Read everything, change nothing
 *   winget-warden sync --force     Reinstall even when current
 *
 * Output:
 *
 *   Reconciling winget
 *
 *     ✔ Host supported
 *     ✔ Runtime present
 *     ✔ Located winget
 *     ✔ Read installed version
 *     ✔ Resolved latest release
 *     ✔ Compared versions
 *     ✔ Downloaded bundle
 *     ✔ Provisioned bundle
 *     ✔ Package registered
 *     ✔ Confirmed version
 *
 *   ✔ Updated winget to 1.9.25200 in 41.3s
 */

import { Command } from "commander";
import { ReconcileEvent, ReconcileResult, ReconcileState } from "@winget-warden/engine";
import { createReconciler } from "../context";
import { EXIT_CODES, exitCodeForResult } from "../exit-codes";
import {
  printSuccess,
  printError,
  printDryRun,
  printInfo,
  printHeader,
  printStageSuccess,
  printStageError,
  printDetail,
  printBlank,
  printDebug,
  isDebugMode,
  createSpinner,
  formatState,
  formatBytes,
  formatDuration,
  formatErrorCategory,
  colors,
} from "../output";

/** Spinner text while a stage runs */
const STAGE_MESSAGES: Partial<Record<ReconcileState, string>> = {
  CHECKING_HOST: "Checking Windows build and permissions...",
  CHECKING_RUNTIME: "Checking the Visual C++ runtime...",
  LOCATING: "Locating the tool...",
  READING_VERSION: "Reading the installed version...",
  RESOLVING: "Querying the latest release...",
  COMPARING: "Comparing versions...",
  DOWNLOADING: "Downloading bundle...",
  INSTALLING: "Provisioning bundle...",
  REGISTERING: "Waiting for Windows to register the package...",
  CONFIRMING: "Confirming the installed version...",
};

/** Check-marked line printed once a stage is left */
const STAGE_DONE: Partial<Record<ReconcileState, string>> = {
  CHECKING_HOST: "Host supported",
  CHECKING_RUNTIME: "Runtime present",
  LOCATING: "Located tool",
  READING_VERSION: "Read installed version",
  RESOLVING: "Resolved latest release",
  COMPARING: "Compared versions",
  DOWNLOADING: "Downloaded bundle",
  INSTALLING: "Provisioned bundle",
  REGISTERING: "Package registered",
  CONFIRMING: "Confirmed version",
};

interface SyncOptions {
  dryRun: boolean;
  force: boolean;
  verbose: boolean;
}

/**
 * One-line summary of a finished run, without colors.
 */
export function describeOutcome(result: ReconcileResult, toolName: string): string {
  const installed = result.installation?.version ?? "unknown";
  const latest = result.release?.version ?? "unknown";

  if (result.final_state === "FAILED") {
    return `Could not bring ${toolName} up to date`;
  }
  if (result.dry_run) {
    if (result.action === "installed") return `Would install ${toolName} ${latest}`;
    if (result.action === "updated") return `Would update ${toolName} from ${installed} to ${latest}`;
  }
  if (result.action === "installed") return `Installed ${toolName} ${installed}`;
  if (result.action === "updated") return `Updated ${toolName} to ${installed}`;
  return `${toolName} ${installed} is up to date`;
}

export function registerSyncCommand(program: Command): void {
  program
    .command("sync", { isDefault: true })
    .description("Install or update the tool to its latest release")
    .option("--dry-run", "Show what would change without changing it", false)
    .option("--force", "Reinstall even when the installed version is current", false)
    .option("--verbose", "Write engine logs to stderr", false)
    .action(async (opts: SyncOptions, cmd: Command) => {
      const reconciler = createReconciler(cmd, {
        dryRun: opts.dryRun,
        force: opts.force,
        verbose: opts.verbose,
      });
      const name = reconciler.toolName;

      if (opts.dryRun) {
        printDryRun(`Checking what would change for ${colors.tool(name)}`);
      } else {
        printHeader(`Reconciling ${colors.tool(name)}`);
      }

      // ─── Progress display ───
      const spinner = createSpinner("Starting...");
      let lastState: ReconcileState | "" = "";

      reconciler.on((event: ReconcileEvent) => {
        if (event.type === "state_change") {
          const { state, message } = event.data;
          if (message) printDebug(`${state}: ${message}`);
          if (state === lastState) return;

          const done = lastState ? STAGE_DONE[lastState] : undefined;
          if (done && state !== "FAILED") {
            spinner.stop();
            printStageSuccess(done);
            spinner.start();
          }

          lastState = state;
          const stageMsg = STAGE_MESSAGES[state];
          if (stageMsg) spinner.text = stageMsg;
          return;
        }

        const { progress_percent, bytes_downloaded } = event.data;
        spinner.text = `Downloading... ${progress_percent}% (${formatBytes(bytes_downloaded)})`;
      });

      spinner.start();
      const startTime = Date.now();

      try {
        const result = await reconciler.reconcile();
        spinner.stop();
        const elapsed = Date.now() - startTime;

        if (result.final_state === "COMPLETED") {
          printBlank();
          const summary = describeOutcome(result, name);
          if (result.dry_run) {
            printDryRun(summary);
          } else if (result.action === "none") {
            printSuccess(summary);
          } else {
            printSuccess(`${summary} in ${formatDuration(elapsed)}`);
          }
          return;
        }

        // ─── Failure output ───
        if (result.error) {
          printStageError(formatState(result.error.state));
        }
        printBlank();
        printError(describeOutcome(result, name));

        if (result.error) {
          printDetail("Reason", formatErrorCategory(result.error.category));
          printDetail("Details", result.error.message);
          printDetail("Stage", formatState(result.error.state));

          if (result.error.category === "PERMISSION_ERROR") {
            printBlank();
            printInfo("Open the terminal with \"Run as administrator\" and try again.");
          }
        }

        process.exit(exitCodeForResult(result));
      } catch (err: unknown) {
        spinner.stop();
        printBlank();
        printError("Unexpected error during reconciliation");

        if (isDebugMode()) {
          console.error(err);
        } else {
          printDetail("Message", err instanceof Error ? err.message : String(err));
          printInfo(`Use ${colors.bold("--debug")} to see the full stack trace.`);
        }

        process.exit(EXIT_CODES.FAILURE);
      }
    });
}
