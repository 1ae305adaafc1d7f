/**
 * Warden Engine — Bundle Install / Update
 *
 * DOWNLOADING → INSTALLING for one release asset:
 *
 * 1. Reject an empty URL before touching anything
 * 2. Download into the staging directory under the URL's file name
 * 3. Check the download produced a non-empty file
 * 4. Provision the bundle for all users
 * 5. Remove the downloaded file, whatever happened above
 */

import { fileNameFromUrl, stagedFilePath } from "./downloader";
import { errorMessage, fail, succeed } from "./errors";
import { ensureStagingDir, isUsableFile, withStagedFile } from "./staging";
import { StepContext } from "./step-context";
import { InstallReport, StepResult } from "./types";

export async function installBundle(
  url: string,
  ctx: StepContext,
): Promise<StepResult<InstallReport>> {
  const { host, download, logger, stagingDir, dryRun } = ctx;

  if (!url || url.trim() === "") {
    logger.error("No download URL given for install");
    return fail("INSTALL_ERROR", "No download URL was provided", "INSTALLING");
  }

  let fileName: string;
  let filePath: string;
  try {
    fileName = fileNameFromUrl(url);
    if (!fileName) {
      return fail("INSTALL_ERROR", `Download URL has no file name: ${url}`, "INSTALLING");
    }
    filePath = stagedFilePath(stagingDir, fileName);
  } catch (err: unknown) {
    return fail("INSTALL_ERROR", `Invalid download URL "${url}": ${errorMessage(err)}`, "INSTALLING");
  }

  if (dryRun) {
    logger.info({ url, file: fileName }, "[dry run] Would download and provision bundle");
    return succeed({ file_name: fileName, bytes_downloaded: 0, duration_ms: 0 });
  }

  try {
    ensureStagingDir(stagingDir);
  } catch (err: unknown) {
    return fail(
      "DOWNLOAD_ERROR",
      `Cannot create staging directory ${stagingDir}: ${errorMessage(err)}`,
      "DOWNLOADING",
    );
  }

  return withStagedFile(filePath, logger, async () => {
    ctx.onStage?.("DOWNLOADING", fileName);
    let bytes = 0;
    let durationMs = 0;
    try {
      const result = await download({
        url,
        destDir: stagingDir,
        filename: fileName,
        onProgress: ctx.onProgress,
        logger,
        timeoutMs: ctx.timeoutMs,
      });
      bytes = result.bytes_downloaded;
      durationMs = result.duration_ms;
    } catch (err: unknown) {
      logger.error({ url, error: errorMessage(err) }, "Bundle download failed");
      return fail<InstallReport>("DOWNLOAD_ERROR", errorMessage(err), "DOWNLOADING", {
        details: { url },
      });
    }

    if (!isUsableFile(filePath)) {
      logger.error({ path: filePath }, "Download did not produce a file");
      return fail<InstallReport>(
        "DOWNLOAD_ERROR",
        `Download of ${fileName} did not produce a file`,
        "DOWNLOADING",
        { details: { url, path: filePath } },
      );
    }

    ctx.onStage?.("INSTALLING", fileName);
    try {
      await host.provisionPackage(filePath);
    } catch (err: unknown) {
      logger.error({ path: filePath, error: errorMessage(err) }, "Bundle install failed");
      return fail<InstallReport>("INSTALL_ERROR", errorMessage(err), "INSTALLING", {
        details: { file: fileName },
      });
    }

    logger.info({ file: fileName, bytes, durationMs }, "Bundle installed");
    return succeed<InstallReport>({
      file_name: fileName,
      bytes_downloaded: bytes,
      duration_ms: durationMs,
    });
  });
}
