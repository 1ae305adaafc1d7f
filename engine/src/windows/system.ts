/**
 * Warden Engine — Windows System Facts
 *
 * OS build number and CPU architecture, as the prerequisite checks and
 * the redistributable download need them.
 */

import * as os from "os";
import { Architecture } from "../types";

/**
 * Extract the build number from an `os.release()` string.
 *
 *   "10.0.22631" -> 22631
 *   "6.3.9600"   -> 9600
 *
 * Returns null for anything without a numeric third component.
 */
export function parseOsBuild(release: string): number | null {
  const match = release.trim().match(/^\d+\.\d+\.(\d+)/);
  if (!match) return null;
  return parseInt(match[1], 10);
}

export function getOsBuild(): number | null {
  return parseOsBuild(os.release());
}

/**
 * Architecture of the OS, not of the Node binary.
 *
 * A 32-bit process on 64-bit Windows sees PROCESSOR_ARCHITECTURE=x86 and
 * gets the real value in PROCESSOR_ARCHITEW6432.
 */
export function detectArchitecture(
  env: NodeJS.ProcessEnv = process.env,
  nodeArch: string = process.arch,
): Architecture {
  const reported = (
    env.PROCESSOR_ARCHITEW6432 ||
    env.PROCESSOR_ARCHITECTURE ||
    ""
  ).toUpperCase();

  if (reported === "ARM64") return "arm64";
  if (reported === "AMD64" || reported === "IA64") return "x64";
  if (reported === "X86") return "x86";

  if (nodeArch === "arm64") return "arm64";
  if (nodeArch === "x64") return "x64";
  return "x86";
}
