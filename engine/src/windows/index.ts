/**
 * Warden Engine — Windows Host (Barrel Export)
 *
 * WindowsHost wires the individual Windows modules into the HostAdapter
 * the reconciler consumes.
 */

import { HostAdapter, InstallerRunResult, VersionReadMode } from "../host";
import { Architecture } from "../types";
import { Logger } from "../utils/logger";
import { expandPathPattern } from "../utils/path-pattern";
import { getOsBuild, detectArchitecture } from "./system";
import { checkElevation } from "./elevate";
import { findInstalledSoftware } from "./registry";
import { runInstaller } from "./installer";
import { provisionPackage } from "./appx";
import { resolveCommand } from "./locate";
import { readCommandOutput } from "./version";

export class WindowsHost implements HostAdapter {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  getOsBuild(): number | null {
    return getOsBuild();
  }

  getArchitecture(): Architecture {
    return detectArchitecture();
  }

  isElevated(): Promise<boolean> {
    return checkElevation(this.logger);
  }

  findInstalledSoftware(namePatterns: string[]): Promise<string | null> {
    return findInstalledSoftware(namePatterns, this.logger);
  }

  runInstaller(filePath: string, args: string[]): Promise<InstallerRunResult> {
    return runInstaller(filePath, args, this.logger);
  }

  provisionPackage(bundlePath: string): Promise<void> {
    return provisionPackage(bundlePath, this.logger);
  }

  resolveCommand(command: string): Promise<string | null> {
    return resolveCommand(command, this.logger);
  }

  expandPathPattern(pattern: string): string | null {
    return expandPathPattern(pattern);
  }

  readCommandOutput(
    executable: string,
    args: string[],
    mode: VersionReadMode,
    scratchDir: string,
  ): Promise<string> {
    return readCommandOutput(executable, args, mode, scratchDir, this.logger);
  }
}

export { parseOsBuild, detectArchitecture } from "./system";
export { checkElevation } from "./elevate";
export { parseDisplayNames, matchDisplayName, UNINSTALL_KEYS } from "./registry";
export { buildProvisionScript, encodePowerShell, quotePowerShell } from "./appx";
export { parseWhereOutput } from "./locate";
export { buildRedirectCommandLine, cleanRedirectedText } from "./version";
export {
  lookupInstallerExitCode,
  INSTALLER_EXIT_CODES,
  type InstallerExitCodeInfo,
} from "./types";
