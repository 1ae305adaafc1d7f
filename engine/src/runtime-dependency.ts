/**
 * Warden Engine — Runtime Redistributable
 *
 * The tool needs the Visual C++ runtime. When no accepted release line is
 * registered as installed, the bootstrapper for the host architecture is
 * downloaded to the staging directory, run silently, and removed again.
 * Every failure here is fatal for the run.
 */

import { fileNameFromUrl, stagedFilePath } from "./downloader";
import { errorMessage, fail, succeed } from "./errors";
import { ensureStagingDir, isUsableFile, withStagedFile } from "./staging";
import { StepContext } from "./step-context";
import { RuntimeReport, RuntimeSpec, StepResult } from "./types";
import { resolveVariables } from "./utils/variables";

export async function ensureRuntime(
  spec: RuntimeSpec,
  ctx: StepContext,
): Promise<StepResult<RuntimeReport>> {
  const { host, download, logger, stagingDir, dryRun } = ctx;

  let found: string | null;
  try {
    found = await host.findInstalledSoftware(spec.name_patterns);
  } catch (err: unknown) {
    return fail("DEPENDENCY_ERROR", `Could not inspect installed software: ${errorMessage(err)}`, "CHECKING_RUNTIME", {
      fatal: true,
    });
  }

  if (found) {
    logger.info({ displayName: found }, `${spec.display_name} already installed`);
    return succeed({ found, installed: false });
  }

  let url: string;
  let fileName: string;
  let filePath: string;
  try {
    url = resolveVariables(spec.installer_url, { ARCH: host.getArchitecture() });
    fileName = fileNameFromUrl(url) || "runtime-installer.exe";
    filePath = stagedFilePath(stagingDir, fileName);
  } catch (err: unknown) {
    return fail("DEPENDENCY_ERROR", errorMessage(err), "CHECKING_RUNTIME", { fatal: true });
  }

  if (dryRun) {
    logger.info({ url }, `[dry run] Would install ${spec.display_name}`);
    return succeed({ installed: false });
  }

  return withStagedFile(filePath, logger, async () => {
    try {
      ensureStagingDir(stagingDir);
      await download({
        url,
        destDir: stagingDir,
        filename: fileName,
        onProgress: ctx.onProgress,
        logger,
        timeoutMs: ctx.timeoutMs,
      });
    } catch (err: unknown) {
      return fail<RuntimeReport>(
        "DEPENDENCY_ERROR",
        `Could not download ${spec.display_name}: ${errorMessage(err)}`,
        "CHECKING_RUNTIME",
        { fatal: true, details: { url } },
      );
    }

    if (!isUsableFile(filePath)) {
      return fail<RuntimeReport>(
        "DEPENDENCY_ERROR",
        `Download of ${spec.display_name} did not produce a file`,
        "CHECKING_RUNTIME",
        { fatal: true, details: { url } },
      );
    }

    const run = await host.runInstaller(filePath, spec.installer_args);
    if (!run.success) {
      return fail<RuntimeReport>(
        "DEPENDENCY_ERROR",
        `${spec.display_name} installer failed: ${run.message}`,
        "CHECKING_RUNTIME",
        { fatal: true, details: { exitCode: run.exitCode } },
      );
    }

    if (run.rebootRequired) {
      logger.warn(`${spec.display_name} installed; a restart is pending`);
    }
    logger.info({ exitCode: run.exitCode }, `${spec.display_name} installed`);
    return succeed<RuntimeReport>({ installed: true });
  });
}
