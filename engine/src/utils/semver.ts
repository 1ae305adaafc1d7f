/**
 * Warden Engine — Semver Utilities
 *
 * Version handling for release tags ("v1.9.25200") and the tool's own
 * `--version` output. Handles the "v" prefix, whitespace, a missing patch
 * component and prerelease suffixes such as "-preview".
 *
 * This is intentionally NOT a full semver library.
 */

import type { Freshness } from "../types";

export interface SemverParts {
  major: number;
  minor: number;
  patch: number;
  /** Dot-separated prerelease identifiers ("preview.2" -> ["preview", "2"]) */
  prerelease: string[];
  /** Input after normalization */
  normalized: string;
}

/**
 * Strip a leading "v" or "V" and trim whitespace.
 *
 *   "v1.9.25200" -> "1.9.25200"
 *   " V1.2.3 "   -> "1.2.3"
 */
export function normalizeSemver(version: string): string {
  return version.trim().replace(/^[vV]/, "");
}

const SEMVER_PATTERN =
  /^(\d+)\.(\d+)(?:\.(\d+))?(?:-([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?(?:\+[0-9A-Za-z.-]+)?$/;

/**
 * Parse a version string. Returns null if it cannot be parsed.
 *
 * Accepts "1.2.3", "v1.2.3", "1.2" (patch defaults to 0),
 * "1.10.40-preview" and "1.2.3+build.7" (build metadata is dropped).
 */
export function parseSemver(version: string): SemverParts | null {
  const normalized = normalizeSemver(version);
  const match = normalized.match(SEMVER_PATTERN);
  if (!match) return null;

  return {
    major: parseInt(match[1], 10),
    minor: parseInt(match[2], 10),
    patch: match[3] !== undefined ? parseInt(match[3], 10) : 0,
    prerelease: match[4] !== undefined ? match[4].split(".") : [],
    normalized,
  };
}

function compareIdentifiers(a: string, b: string): -1 | 0 | 1 {
  const aNum = /^\d+$/.test(a);
  const bNum = /^\d+$/.test(b);
  if (aNum && bNum) {
    const na = parseInt(a, 10);
    const nb = parseInt(b, 10);
    return na === nb ? 0 : na > nb ? 1 : -1;
  }
  // Numeric identifiers always rank below alphanumeric ones
  if (aNum) return -1;
  if (bNum) return 1;
  return a === b ? 0 : a > b ? 1 : -1;
}

function comparePrerelease(a: string[], b: string[]): -1 | 0 | 1 {
  if (a.length === 0 && b.length === 0) return 0;
  // A release outranks any of its prereleases
  if (a.length === 0) return 1;
  if (b.length === 0) return -1;

  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i++) {
    const cmp = compareIdentifiers(a[i], b[i]);
    if (cmp !== 0) return cmp;
  }
  if (a.length === b.length) return 0;
  return a.length > b.length ? 1 : -1;
}

/**
 * Compare two parsed versions: -1 if a < b, 0 if equal, 1 if a > b.
 */
export function compareParts(a: SemverParts, b: SemverParts): -1 | 0 | 1 {
  if (a.major !== b.major) return a.major > b.major ? 1 : -1;
  if (a.minor !== b.minor) return a.minor > b.minor ? 1 : -1;
  if (a.patch !== b.patch) return a.patch > b.patch ? 1 : -1;
  return comparePrerelease(a.prerelease, b.prerelease);
}

/**
 * Compare two version strings.
 *
 * Returns -1, 0 or 1, or null if either string is not a valid version.
 */
export function compareSemver(a: string, b: string): -1 | 0 | 1 | null {
  const pa = parseSemver(a);
  const pb = parseSemver(b);
  if (!pa || !pb) return null;
  return compareParts(pa, pb);
}

export function isValidSemver(version: string): boolean {
  return parseSemver(version) !== null;
}

/**
 * "up-to-date" when installed >= latest, "stale" otherwise.
 * Null when either version does not parse.
 */
export function checkFreshness(
  installed: string,
  latest: string,
): Freshness | null {
  const cmp = compareSemver(installed, latest);
  if (cmp === null) return null;
  return cmp >= 0 ? "up-to-date" : "stale";
}

/**
 * Version from a `--version` style output: the first non-empty line,
 * normalized. Null when that line is not a version.
 *
 *   "v1.9.25200\r\n" -> "1.9.25200"
 */
export function parseVersionOutput(output: string): string | null {
  const line = output
    .split(/\r?\n/)
    .map((l) => l.trim())
    .find((l) => l.length > 0);
  if (line === undefined) return null;
  const parsed = parseSemver(line);
  return parsed ? parsed.normalized : null;
}
