/**
 * Warden Engine — Windows Elevation Check
 *
 * Provisioning a package for all users needs administrator rights.
 * The engine never elevates itself; it only reports the current status
 * so the caller can stop early with a clear message.
 */

import { exec } from "child_process";
import { promisify } from "util";
import { Logger } from "../utils/logger";

const execAsync = promisify(exec);

/**
 * Whether the current process runs with administrator privileges.
 * Uses `net session`, which only succeeds when elevated.
 */
export async function checkElevation(logger: Logger): Promise<boolean> {
  try {
    await execAsync("net session", { windowsHide: true, timeout: 5000 });
    logger.debug("Process is running elevated (admin)");
    return true;
  } catch {
    logger.debug("Process is NOT running elevated");
    return false;
  }
}
