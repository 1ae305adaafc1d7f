/**
 * Warden CLI — Check Command
 *
 * Reports installed vs. latest without changing anything.
 * Exits 3 when the tool is missing or stale, so scripts can branch on it.
 *
 * Usage:
 *   winget-warden check
 */

import { Command } from "commander";
import { InspectionResult } from "@winget-warden/engine";
import { createReconciler } from "../context";
import { exitCodeForInspection, EXIT_CODES } from "../exit-codes";
import {
  printError,
  printDetail,
  printInfo,
  printTable,
  createSpinner,
  formatErrorCategory,
  colors,
} from "../output";

/** Plain-text status for the table's last column */
export function freshnessLabel(report: InspectionResult): string {
  if (report.error) return "unknown";
  if (!report.installation.executable_path) return "not installed";
  return report.freshness === "up-to-date" ? "up to date" : "update available";
}

export function inspectionRow(report: InspectionResult, toolName: string): string[] {
  const label = freshnessLabel(report);
  const paint =
    label === "up to date" ? colors.success : label === "unknown" ? colors.dim : colors.warn;
  return [
    colors.tool(toolName),
    report.installation.version ? colors.version(report.installation.version) : colors.dim("-"),
    report.release ? colors.version(report.release.version) : colors.dim("-"),
    paint(label),
  ];
}

export function registerCheckCommand(program: Command): void {
  program
    .command("check")
    .description("Compare the installed version with the latest release")
    .action(async (_opts: Record<string, never>, cmd: Command) => {
      const reconciler = createReconciler(cmd);
      const spinner = createSpinner(`Checking ${reconciler.toolName}...`);
      spinner.start();

      let report: InspectionResult;
      try {
        report = await reconciler.inspect();
      } catch (err: unknown) {
        spinner.stop();
        printError(`Check failed: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(EXIT_CODES.FAILURE);
      }
      spinner.stop();

      printTable({
        head: ["Tool", "Installed", "Latest", "Status"],
        rows: [inspectionRow(report, reconciler.toolName)],
      });

      if (report.installation.executable_path) {
        printDetail("Path", report.installation.executable_path);
      }
      if (report.error) {
        printError(formatErrorCategory(report.error.category));
        printDetail("Details", report.error.message);
      } else if (freshnessLabel(report) !== "up to date") {
        printInfo(`Run ${colors.bold("winget-warden sync")} to bring it up to date.`);
      }

      const code = exitCodeForInspection(report);
      if (code !== EXIT_CODES.SUCCESS) process.exit(code);
    });
}
