/**
 * Warden Engine — Release Feed Client
 *
 * Reads the latest published release from a GitHub-style releases API:
 *
 *   GET https://api.github.com/repos/<owner>/<repo>/releases/latest
 *   { "tag_name": "v1.9.25200",
 *     "assets": [{ "name": "...", "browser_download_url": "https://..." }] }
 *
 * Only the tag and the asset URLs are used. The asset whose URL file name
 * ends with the bundle extension is the one that gets installed.
 */

import * as https from "https";
import { z } from "zod";
import { ReleaseInfo } from "./types";
import { Logger } from "./utils/logger";
import { parseSemver } from "./utils/semver";
import { fileNameFromUrl } from "./downloader";

// ─── Schema ────────────────────────────────────────────────────

export const ReleaseAssetSchema = z.object({
  name: z.string().optional(),
  browser_download_url: z.string().url(),
});

export const ReleaseSchema = z.object({
  tag_name: z.string().min(1),
  published_at: z.string().nullable().optional(),
  assets: z.array(ReleaseAssetSchema).default([]),
});

export type ReleaseAsset = z.infer<typeof ReleaseAssetSchema>;

// ─── Errors ────────────────────────────────────────────────────

export type ReleaseFeedErrorKind = "network" | "invalid_response" | "no_asset";

export class ReleaseFeedError extends Error {
  readonly kind: ReleaseFeedErrorKind;

  constructor(kind: ReleaseFeedErrorKind, message: string) {
    super(message);
    this.name = "ReleaseFeedError";
    this.kind = kind;
  }
}

// ─── Asset Selection ───────────────────────────────────────────

/**
 * First asset whose download URL file name ends with `extension`
 * (case-insensitive). Null when none does.
 */
export function selectBundleAsset(
  assets: ReleaseAsset[],
  extension: string,
): ReleaseAsset | null {
  const suffix = extension.toLowerCase();
  for (const asset of assets) {
    let fileName: string;
    try {
      fileName = fileNameFromUrl(asset.browser_download_url);
    } catch {
      continue;
    }
    if (fileName.toLowerCase().endsWith(suffix)) return asset;
  }
  return null;
}

/**
 * Validate a feed body and turn it into ReleaseInfo.
 *
 * @throws ReleaseFeedError ("invalid_response" or "no_asset")
 */
export function parseRelease(body: unknown, bundleExtension: string): ReleaseInfo {
  const parsed = ReleaseSchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ReleaseFeedError(
      "invalid_response",
      `Release feed returned an unexpected body: ${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
  }

  const release = parsed.data;
  const version = parseSemver(release.tag_name);
  if (!version) {
    throw new ReleaseFeedError(
      "invalid_response",
      `Release tag "${release.tag_name}" is not a version`,
    );
  }

  const asset = selectBundleAsset(release.assets, bundleExtension);
  if (!asset) {
    throw new ReleaseFeedError(
      "no_asset",
      `Release ${release.tag_name} has no asset ending in ${bundleExtension}`,
    );
  }

  return {
    version: version.normalized,
    tag: release.tag_name,
    download_url: asset.browser_download_url,
    asset_name: fileNameFromUrl(asset.browser_download_url),
    published_at: release.published_at ?? undefined,
  };
}

// ─── HTTP ──────────────────────────────────────────────────────

export interface FetchJsonOptions {
  headers?: Record<string, string>;
  timeoutMs: number;
  maxRedirects?: number;
  logger: Logger;
}

/**
 * GET a JSON document over HTTPS, following redirects.
 *
 * @throws ReleaseFeedError ("network" for transport/HTTP failures,
 *   "invalid_response" for bodies that are not JSON)
 */
export function fetchJson(url: string, opts: FetchJsonOptions): Promise<unknown> {
  const maxRedirects = opts.maxRedirects ?? 5;

  return new Promise((resolve, reject) => {
    const req = https.get(url, { headers: opts.headers }, (res) => {
      if (
        res.statusCode &&
        res.statusCode >= 300 &&
        res.statusCode < 400 &&
        res.headers.location
      ) {
        res.resume();
        if (maxRedirects <= 0) {
          reject(new ReleaseFeedError("network", `Too many redirects for ${url}`));
          return;
        }
        const next = new URL(res.headers.location, url).toString();
        opts.logger.debug({ redirect: next }, "Following feed redirect");
        fetchJson(next, { ...opts, maxRedirects: maxRedirects - 1 }).then(
          resolve,
          reject,
        );
        return;
      }

      if (res.statusCode !== 200) {
        res.resume();
        reject(
          new ReleaseFeedError(
            "network",
            `Release feed responded HTTP ${res.statusCode} for ${url}`,
          ),
        );
        return;
      }

      let data = "";
      res.setEncoding("utf8");
      res.on("data", (chunk: string) => (data += chunk));
      res.on("end", () => {
        try {
          resolve(JSON.parse(data));
        } catch (err: unknown) {
          const msg = err instanceof Error ? err.message : String(err);
          reject(
            new ReleaseFeedError("invalid_response", `Release feed body is not JSON: ${msg}`),
          );
        }
      });
    });

    req.on("error", (err) => {
      reject(new ReleaseFeedError("network", `Release feed unreachable: ${err.message}`));
    });

    req.setTimeout(opts.timeoutMs, () => {
      req.destroy();
      reject(
        new ReleaseFeedError("network", `Release feed timed out after ${opts.timeoutMs}ms`),
      );
    });
  });
}

// ─── Release Source ────────────────────────────────────────────

/** Anything that can report the latest release */
export interface ReleaseSource {
  fetchLatest(): Promise<ReleaseInfo>;
}

export interface GitHubReleaseFeedOptions {
  url: string;
  bundleExtension: string;
  /** Raises the API rate limit when set */
  token?: string;
  timeoutMs: number;
  logger: Logger;
}

export class GitHubReleaseFeed implements ReleaseSource {
  private readonly options: GitHubReleaseFeedOptions;

  constructor(options: GitHubReleaseFeedOptions) {
    this.options = options;
  }

  async fetchLatest(): Promise<ReleaseInfo> {
    const { url, bundleExtension, token, timeoutMs, logger } = this.options;

    const headers: Record<string, string> = {
      "User-Agent": "winget-warden",
      Accept: "application/vnd.github+json",
    };
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }

    logger.debug({ url }, "Querying release feed");
    const body = await fetchJson(url, { headers, timeoutMs, logger });
    const release = parseRelease(body, bundleExtension);
    logger.info(
      { tag: release.tag, asset: release.asset_name },
      "Latest release resolved",
    );
    return release;
  }
}
