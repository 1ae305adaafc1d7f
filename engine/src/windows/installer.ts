/**
 * Warden Engine — Silent Installer Runner
 *
 * Runs a downloaded bootstrapper (e.g. vc_redist.x64.exe) with its
 * silent flags and maps the exit code to a structured result.
 */

import { spawn } from "child_process";
import { InstallerRunResult } from "../host";
import { Logger } from "../utils/logger";
import { lookupInstallerExitCode } from "./types";

export async function runInstaller(
  filePath: string,
  args: string[],
  logger: Logger,
): Promise<InstallerRunResult> {
  logger.info({ file: filePath, args }, "Running installer");
  const startMs = Date.now();

  return new Promise<InstallerRunResult>((resolve) => {
    const child = spawn(filePath, args, {
      stdio: "ignore",
      windowsHide: true,
    });

    child.on("close", (code) => {
      const exitCode = code ?? 1;
      const info = lookupInstallerExitCode(exitCode);
      const durationMs = Date.now() - startMs;

      if (info.ok) {
        logger.info({ exitCode, exitCodeName: info.name, durationMs }, "Installer finished");
      } else {
        logger.error(
          { exitCode, exitCodeName: info.name, category: info.category, durationMs },
          `Installer failed: ${info.message}`,
        );
      }

      resolve({
        success: info.ok,
        exitCode,
        rebootRequired: exitCode === 3010 || exitCode === 1641,
        message: info.ok
          ? info.message
          : `Installer failed [${info.name}]: ${info.message}`,
      });
    });

    child.on("error", (err) => {
      logger.error({ error: err.message }, "Failed to launch installer");
      resolve({
        success: false,
        exitCode: -1,
        rebootRequired: false,
        message: `Failed to launch installer: ${err.message}`,
      });
    });
  });
}
