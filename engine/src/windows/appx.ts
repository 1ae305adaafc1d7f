/**
 * Warden Engine — Package Provisioning
 *
 * Installs an .msixbundle for every user of the machine:
 *
 *   Add-AppxProvisionedPackage -Online -PackagePath '<file>' -SkipLicense
 *
 * The script is passed with -EncodedCommand so paths with spaces or
 * quotes survive without shell escaping.
 */

import { execFile } from "child_process";
import { promisify } from "util";
import { Logger } from "../utils/logger";

const execFileAsync = promisify(execFile);

/** Quote a value as a PowerShell single-quoted string */
export function quotePowerShell(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function buildProvisionScript(bundlePath: string): string {
  return [
    "$ErrorActionPreference = 'Stop'",
    `Add-AppxProvisionedPackage -Online -PackagePath ${quotePowerShell(bundlePath)} -SkipLicense | Out-Null`,
  ].join("; ");
}

/** UTF-16LE base64, the format -EncodedCommand expects */
export function encodePowerShell(script: string): string {
  return Buffer.from(script, "utf16le").toString("base64");
}

/**
 * Provision the bundle. Rejects with PowerShell's error text on failure.
 */
export async function provisionPackage(
  bundlePath: string,
  logger: Logger,
  timeoutMs: number = 600_000,
): Promise<void> {
  const script = buildProvisionScript(bundlePath);
  logger.info({ bundle: bundlePath }, "Provisioning package for all users");
  logger.debug({ script }, "PowerShell provisioning script");

  try {
    await execFileAsync(
      "powershell.exe",
      [
        "-NoProfile",
        "-NonInteractive",
        "-ExecutionPolicy",
        "Bypass",
        "-EncodedCommand",
        encodePowerShell(script),
      ],
      { windowsHide: true, timeout: timeoutMs },
    );
  } catch (err: unknown) {
    let message = err instanceof Error ? err.message : String(err);
    if (err && typeof err === "object" && "stderr" in err) {
      const stderr = String(err.stderr).trim();
      if (stderr) message = stderr;
    }
    logger.error({ bundle: bundlePath, error: message }, "Provisioning failed");
    throw new Error(`Add-AppxProvisionedPackage failed: ${message}`);
  }

  logger.info({ bundle: bundlePath }, "Package provisioned");
}
