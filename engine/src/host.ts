/**
 * Warden Engine — Host Adapter
 *
 * Everything the reconciler needs from the operating system, behind one
 * interface. The Windows implementation lives in ./windows; tests pass
 * in-process fakes.
 */

import { Architecture } from "./types";

export interface InstallerRunResult {
  success: boolean;
  exitCode: number;
  rebootRequired: boolean;
  message: string;
}

export type VersionReadMode = "capture" | "redirect";

export interface HostAdapter {
  /** Build number of the running OS (e.g. 22631), null if unknown */
  getOsBuild(): number | null;

  getArchitecture(): Architecture;

  isElevated(): Promise<boolean>;

  /**
   * Search installed-software records for a DisplayName containing any
   * of the patterns. Returns the matching name, or null.
   */
  findInstalledSoftware(namePatterns: string[]): Promise<string | null>;

  /** Run a downloaded installer executable and wait for it */
  runInstaller(filePath: string, args: string[]): Promise<InstallerRunResult>;

  /**
   * Provision a package bundle for all users, skipping the license prompt.
   * Rejects when the OS refuses the package.
   */
  provisionPackage(bundlePath: string): Promise<void>;

  /** Resolve a command through the OS lookup; null when not on PATH */
  resolveCommand(command: string): Promise<string | null>;

  /** First existing path matching a wildcard pattern, or null */
  expandPathPattern(pattern: string): string | null;

  /**
   * Run `executable args` and return what it printed.
   *
   * "capture" reads stdout directly; "redirect" runs the command through
   * the shell with stdout redirected to `scratchDir`, then reads the file.
   */
  readCommandOutput(
    executable: string,
    args: string[],
    mode: VersionReadMode,
    scratchDir: string,
  ): Promise<string>;
}
