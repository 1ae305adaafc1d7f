/**
 * Warden Engine — Version Command Runner
 *
 * Two ways of reading the tool's `--version` output:
 *
 * - capture:  run the executable and read its stdout pipe.
 * - redirect: run it through cmd.exe with stdout redirected to a file in
 *             the staging directory, then read the file.
 *
 * The first read uses "capture" and the post-update check uses
 * "redirect". Both hand their text to the same parser.
 */

import * as fs from "fs";
import * as path from "path";
import { execFile } from "child_process";
import { promisify } from "util";
import { VersionReadMode } from "../host";
import { Logger } from "../utils/logger";

const execFileAsync = promisify(execFile);

/**
 * The inner command line for `cmd.exe /d /s /c "<line>"`.
 */
export function buildRedirectCommandLine(
  executable: string,
  args: string[],
  outFile: string,
): string {
  return [`"${executable}"`, ...args, ">", `"${outFile}"`, "2>&1"].join(" ");
}

/** Drop a UTF-8/UTF-16 byte-order mark and NUL padding from redirected text */
export function cleanRedirectedText(raw: Buffer): string {
  if (raw.length >= 2 && raw[0] === 0xff && raw[1] === 0xfe) {
    return raw.subarray(2).toString("utf16le");
  }
  return raw.toString("utf8").replace(/^\uFEFF/, "").replace(/\u0000/g, "");
}

export async function readCommandOutput(
  executable: string,
  args: string[],
  mode: VersionReadMode,
  scratchDir: string,
  logger: Logger,
): Promise<string> {
  if (mode === "capture") {
    const { stdout } = await execFileAsync(executable, args, {
      windowsHide: true,
      timeout: 30000,
    });
    logger.debug({ executable, stdout: stdout.trim() }, "Captured command output");
    return stdout;
  }

  fs.mkdirSync(scratchDir, { recursive: true });
  const outFile = path.join(scratchDir, `version-${process.pid}-${Date.now()}.txt`);
  const commandLine = buildRedirectCommandLine(executable, args, outFile);

  try {
    await execFileAsync("cmd.exe", ["/d", "/s", "/c", `"${commandLine}"`], {
      windowsHide: true,
      windowsVerbatimArguments: true,
      timeout: 30000,
    });
    const text = cleanRedirectedText(fs.readFileSync(outFile));
    logger.debug({ executable, output: text.trim() }, "Redirected command output");
    return text;
  } finally {
    fs.rmSync(outFile, { force: true });
  }
}
