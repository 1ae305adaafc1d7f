/**
 * Warden Engine — File Downloader
 *
 * Downloads installer files with progress reporting.
 * HTTPS only. HTTP URLs are rejected.
 */

import * as fs from "fs";
import * as path from "path";
import * as https from "https";
import { Logger } from "./utils/logger";

export interface DownloadProgress {
  bytes_downloaded: number;
  bytes_total: number;
  percent: number;
}

export interface DownloadResult {
  file_path: string;
  bytes_downloaded: number;
  duration_ms: number;
}

export type ProgressCallback = (progress: DownloadProgress) => void;

export interface DownloadOptions {
  url: string;
  destDir: string;
  /** Derived from the URL's last path segment when omitted */
  filename?: string;
  onProgress?: ProgressCallback;
  logger: Logger;
  /** Socket inactivity timeout (default 60s) */
  timeoutMs?: number;
  headers?: Record<string, string>;
  /** Redirect hops still allowed (default 5) */
  maxRedirects?: number;
}

/** Signature the reconciler depends on, so tests can swap the network out */
export type DownloadFn = (opts: DownloadOptions) => Promise<DownloadResult>;

const USER_AGENT = "winget-warden";

/** Characters Windows does not allow in a file name, separators included */
const UNSAFE_FILE_NAME = /[\\/:*?"<>|\u0000-\u001f]/;

/**
 * Last path segment of a URL, or "" when the path ends in "/".
 *
 * @throws Error when the decoded segment is not a plain file name
 *   (e.g. "..%5Cevil.msixbundle" decodes to a Windows path)
 */
export function fileNameFromUrl(url: string): string {
  const name = path.posix.basename(decodeURIComponent(new URL(url).pathname));
  if (name === "." || name === ".." || UNSAFE_FILE_NAME.test(name)) {
    throw new Error(`URL does not end in a plain file name: ${url}`);
  }
  return name;
}

/**
 * Where a download lands: `name` joined onto `destDir`.
 *
 * @throws Error when the result would sit outside `destDir`
 */
export function stagedFilePath(destDir: string, name: string): string {
  const dir = path.resolve(destDir);
  const filePath = path.resolve(dir, name);
  if (path.dirname(filePath) !== dir) {
    throw new Error(`File name ${name} escapes ${destDir}`);
  }
  return filePath;
}

/**
 * Download a file from an HTTPS URL into `destDir`.
 */
export async function downloadFile(opts: DownloadOptions): Promise<DownloadResult> {
  const { url, destDir, onProgress, logger } = opts;
  const timeoutMs = opts.timeoutMs ?? 60_000;
  const maxRedirects = opts.maxRedirects ?? 5;

  if (!url.startsWith("https://")) {
    throw new Error(`Download URL must be HTTPS. Got: ${url}`);
  }

  const resolvedFilename = opts.filename || fileNameFromUrl(url) || "download";
  const destPath = stagedFilePath(destDir, resolvedFilename);

  fs.mkdirSync(destDir, { recursive: true });

  logger.info({ url, dest: destPath }, "Starting download");

  const startTime = Date.now();

  return new Promise<DownloadResult>((resolve, reject) => {
    const request = https.get(
      url,
      { headers: { "User-Agent": USER_AGENT, ...opts.headers } },
      (response) => {
        if (
          response.statusCode &&
          response.statusCode >= 300 &&
          response.statusCode < 400 &&
          response.headers.location
        ) {
          response.resume();
          if (maxRedirects <= 0) {
            reject(new Error(`Too many redirects while downloading ${url}`));
            return;
          }
          const redirectUrl = new URL(response.headers.location, url).toString();
          logger.debug({ redirect: redirectUrl }, "Following redirect");
          downloadFile({
            ...opts,
            url: redirectUrl,
            filename: resolvedFilename,
            maxRedirects: maxRedirects - 1,
          })
            .then(resolve)
            .catch(reject);
          return;
        }

        if (response.statusCode !== 200) {
          response.resume();
          reject(
            new Error(`Download failed: HTTP ${response.statusCode} for ${url}`),
          );
          return;
        }

        const totalBytes = parseInt(
          response.headers["content-length"] || "0",
          10,
        );
        let downloadedBytes = 0;

        const fileStream = fs.createWriteStream(destPath);

        response.on("data", (chunk: Buffer) => {
          downloadedBytes += chunk.length;
          if (onProgress && totalBytes > 0) {
            onProgress({
              bytes_downloaded: downloadedBytes,
              bytes_total: totalBytes,
              percent: Math.round((downloadedBytes / totalBytes) * 100),
            });
          }
        });

        response.pipe(fileStream);

        fileStream.on("finish", () => {
          fileStream.close();
          const duration = Date.now() - startTime;
          logger.info(
            { dest: destPath, bytes: downloadedBytes, duration_ms: duration },
            "Download complete",
          );
          resolve({
            file_path: destPath,
            bytes_downloaded: downloadedBytes,
            duration_ms: duration,
          });
        });

        fileStream.on("error", (err) => {
          fs.rmSync(destPath, { force: true });
          reject(new Error(`Failed to write downloaded file: ${err.message}`));
        });

        response.on("aborted", () => {
          response.unpipe(fileStream);
          // The file may still be opening; remove it once the stream is closed
          fileStream.once("close", () => {
            fs.rmSync(destPath, { force: true });
            reject(new Error(`Download interrupted: ${url}`));
          });
          fileStream.destroy();
        });
      },
    );

    request.on("error", (err) => {
      reject(new Error(`Download request failed: ${err.message}`));
    });

    request.setTimeout(timeoutMs, () => {
      request.destroy();
      reject(new Error(`Download timed out after ${timeoutMs}ms: ${url}`));
    });
  });
}
