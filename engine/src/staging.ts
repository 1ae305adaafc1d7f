/**
 * Warden Engine — Staging Directory
 *
 * Downloaded installers live in the staging directory only for as long as
 * the install that needs them. `withStagedFile` removes the file on every
 * exit path, whether the body resolves or throws.
 */

import * as fs from "fs";
import { Logger } from "./utils/logger";

export function ensureStagingDir(dir: string): void {
  fs.mkdirSync(dir, { recursive: true });
}

/**
 * Delete a staged file if present. A failed delete is logged, not thrown,
 * so it never masks the install outcome.
 */
export function removeStagedFile(filePath: string, logger: Logger): void {
  try {
    fs.rmSync(filePath, { force: true });
    logger.debug({ path: filePath }, "Removed staged file");
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    logger.warn({ path: filePath, error: msg }, "Could not remove staged file");
  }
}

export async function withStagedFile<T>(
  filePath: string,
  logger: Logger,
  body: () => Promise<T>,
): Promise<T> {
  try {
    return await body();
  } finally {
    removeStagedFile(filePath, logger);
  }
}

/** True when the download left a non-empty regular file behind */
export function isUsableFile(filePath: string): boolean {
  try {
    const stat = fs.statSync(filePath);
    return stat.isFile() && stat.size > 0;
  } catch {
    return false;
  }
}
