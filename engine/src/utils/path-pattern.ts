/**
 * Warden Engine — Wildcard Path Expansion
 *
 * The fallback tool location carries a package-identity wildcard:
 *   C:\Program Files\WindowsApps\Microsoft.DesktopAppInstaller_*_x64__8wekyb3d8bbwe\winget.exe
 *
 * Segments containing "*" or "?" are matched against directory listings,
 * one level at a time. Both "\" and "/" separate segments.
 */

import * as fs from "fs";
import * as path from "path";

function hasWildcard(segment: string): boolean {
  return /[*?]/.test(segment);
}

/**
 * Turn one wildcard segment into an anchored regex.
 * Matching is case-insensitive, like Windows file names.
 */
export function segmentToRegExp(segment: string): RegExp {
  const escaped = segment
    .split("")
    .map((ch) => {
      if (ch === "*") return ".*";
      if (ch === "?") return ".";
      return ch.replace(/[.+^${}()|[\]\\]/g, "\\$&");
    })
    .join("");
  return new RegExp(`^${escaped}$`, "i");
}

function splitPattern(pattern: string): { root: string; segments: string[] } {
  const parts = pattern.split(/[\\/]+/);

  // "/tmp/x" splits into ["", "tmp", "x"]
  if (parts[0] === "") {
    return { root: path.sep, segments: parts.slice(1).filter(Boolean) };
  }
  // "C:\Program Files\..." -> root "C:\"
  if (/^[A-Za-z]:$/.test(parts[0])) {
    return { root: `${parts[0]}\\`, segments: parts.slice(1).filter(Boolean) };
  }
  return { root: "", segments: parts.filter(Boolean) };
}

function listDir(dir: string): string[] {
  try {
    return fs.readdirSync(dir);
  } catch {
    // Missing or unreadable (WindowsApps is ACL-restricted) means no match
    return [];
  }
}

/**
 * Expand a pattern into every existing path it matches, sorted.
 */
export function findPathMatches(pattern: string): string[] {
  const { root, segments } = splitPattern(pattern);
  let candidates: string[] = [root];

  for (const segment of segments) {
    const next: string[] = [];
    for (const base of candidates) {
      if (hasWildcard(segment)) {
        const regex = segmentToRegExp(segment);
        for (const entry of listDir(base || ".")) {
          if (regex.test(entry)) next.push(base ? path.join(base, entry) : entry);
        }
      } else {
        next.push(base ? path.join(base, segment) : segment);
      }
    }
    candidates = next;
    if (candidates.length === 0) return [];
  }

  return candidates.filter((p) => fs.existsSync(p)).sort();
}

/**
 * First existing path matching the pattern, or null.
 */
export function expandPathPattern(pattern: string): string | null {
  const matches = findPathMatches(pattern);
  return matches.length > 0 ? matches[0] : null;
}
