/**
 * Warden Engine — Command Lookup
 *
 * Resolves a command name through `where.exe`, which honours PATH and
 * PATHEXT the same way the shell does.
 */

import { execFile } from "child_process";
import { promisify } from "util";
import { Logger } from "../utils/logger";

const execFileAsync = promisify(execFile);

/**
 * First path printed by `where.exe`. It prints one match per line,
 * in PATH order.
 */
export function parseWhereOutput(stdout: string): string | null {
  const first = stdout
    .split(/\r?\n/)
    .map((line) => line.trim())
    .find((line) => line.length > 0);
  return first ?? null;
}

export async function resolveCommand(
  command: string,
  logger: Logger,
): Promise<string | null> {
  try {
    const { stdout } = await execFileAsync("where.exe", [command], {
      windowsHide: true,
      timeout: 10000,
    });
    const resolved = parseWhereOutput(stdout);
    logger.debug({ command, resolved }, "Command lookup");
    return resolved;
  } catch {
    // where.exe exits 1 when nothing is found
    logger.debug({ command }, "Command not found on PATH");
    return null;
  }
}
