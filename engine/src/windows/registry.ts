/**
 * Warden Engine — Installed Software Lookup
 *
 * Searches the Windows Uninstall registry keys for a DisplayName, the same
 * records "Apps & features" lists. Used to tell whether the runtime
 * redistributable is already present.
 */

import { exec } from "child_process";
import { promisify } from "util";
import { Logger } from "../utils/logger";

const execAsync = promisify(exec);

/**
 * Registry paths where Windows tracks installed software.
 */
export const UNINSTALL_KEYS = [
  "HKLM\\Software\\Microsoft\\Windows\\CurrentVersion\\Uninstall",
  "HKLM\\Software\\Wow6432Node\\Microsoft\\Windows\\CurrentVersion\\Uninstall",
  "HKCU\\Software\\Microsoft\\Windows\\CurrentVersion\\Uninstall",
];

/**
 * Pull every DisplayName value out of `reg query` output.
 *
 *     DisplayName    REG_SZ    Microsoft Visual C++ 2015-2022 Redistributable (x64) - 14.38.33135
 */
export function parseDisplayNames(stdout: string): string[] {
  const names: string[] = [];
  for (const line of stdout.split(/\r?\n/)) {
    const match = line.match(/^\s*DisplayName\s+REG_(?:EXPAND_)?SZ\s+(.+?)\s*$/i);
    if (match) names.push(match[1]);
  }
  return names;
}

/**
 * First name containing any of the patterns (case-insensitive), or null.
 */
export function matchDisplayName(
  names: string[],
  patterns: string[],
): string | null {
  const lowered = patterns.map((p) => p.toLowerCase());
  for (const name of names) {
    const candidate = name.toLowerCase();
    if (lowered.some((p) => candidate.includes(p))) return name;
  }
  return null;
}

/**
 * Look for an installed product whose DisplayName contains one of the
 * patterns. Returns the DisplayName found, or null.
 */
export async function findInstalledSoftware(
  patterns: string[],
  logger: Logger,
): Promise<string | null> {
  for (const pattern of patterns) {
    for (const key of UNINSTALL_KEYS) {
      try {
        const { stdout } = await execAsync(
          `reg query "${key}" /s /f "${pattern.replace(/"/g, "")}" /d`,
          { windowsHide: true, timeout: 15000 },
        );
        const found = matchDisplayName(parseDisplayNames(stdout), patterns);
        if (found) {
          logger.debug({ registryKey: key, displayName: found }, "Installed software found");
          return found;
        }
      } catch {
        // reg exits 1 when nothing matches; also covers missing keys
        continue;
      }
    }
  }

  logger.debug({ patterns }, "No installed software matched");
  return null;
}
