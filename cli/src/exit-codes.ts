/**
 * Warden CLI — Exit Codes
 *
 * The engine reports outcomes as values; only the CLI maps them to a
 * process exit code.
 */

import { InspectionResult, ReconcileError, ReconcileResult } from "@winget-warden/engine";

export const EXIT_CODES = {
  /** Tool present and current (or brought current) */
  SUCCESS: 0,
  /** A step failed; a later run may succeed */
  FAILURE: 1,
  /** Host or runtime prerequisites are not met */
  FATAL: 2,
  /** `check` found the tool stale or missing */
  OUTDATED: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeForError(error: ReconcileError): ExitCode {
  return error.fatal ? EXIT_CODES.FATAL : EXIT_CODES.FAILURE;
}

export function exitCodeForResult(result: ReconcileResult): ExitCode {
  if (result.final_state === "COMPLETED") return EXIT_CODES.SUCCESS;
  return result.error ? exitCodeForError(result.error) : EXIT_CODES.FAILURE;
}

export function exitCodeForInspection(report: InspectionResult): ExitCode {
  if (report.error) return exitCodeForError(report.error);
  if (!report.installation.executable_path) return EXIT_CODES.OUTDATED;
  return report.freshness === "up-to-date" ? EXIT_CODES.SUCCESS : EXIT_CODES.OUTDATED;
}
