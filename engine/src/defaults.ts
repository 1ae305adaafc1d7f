/**
 * Warden Engine — Built-in Defaults
 *
 * The managed tool is winget, shipped in the Microsoft App Installer
 * bundle. The CLI config layer overrides any of these.
 */

import * as os from "os";
import * as path from "path";
import {
  ReconcilerOptions,
  RegistrationPolicy,
  RuntimeSpec,
  ToolSpec,
} from "./types";

export const DEFAULT_TOOL: ToolSpec = {
  command: "winget",
  display_name: "winget",
  fallback_path:
    "${PROGRAMFILES}\\WindowsApps\\Microsoft.DesktopAppInstaller_*_${ARCH}__8wekyb3d8bbwe\\winget.exe",
  feed_url: "https://api.github.com/repos/microsoft/winget-cli/releases/latest",
  bundle_extension: ".msixbundle",
  version_args: ["--version"],
};

export const DEFAULT_RUNTIME: RuntimeSpec = {
  display_name: "Visual C++ Redistributable",
  name_patterns: [
    "Microsoft Visual C++ 2015-2019 Redistributable",
    "Microsoft Visual C++ 2015-2022 Redistributable",
  ],
  installer_url: "https://aka.ms/vs/17/release/vc_redist.${ARCH}.exe",
  installer_args: ["/install", "/quiet", "/norestart"],
};

export const DEFAULT_REGISTRATION: RegistrationPolicy = {
  attempts: 6,
  interval_ms: 2000,
  max_interval_ms: 10000,
};

/** Windows 10 1809, the oldest build App Installer supports */
export const DEFAULT_MIN_OS_BUILD = 17763;

export const DEFAULT_TIMEOUT_MS = 60_000;

export function defaultStagingDir(): string {
  return path.join(os.tmpdir(), "winget-warden", "prerequisites");
}

/**
 * Complete options from a partial set. Nested specs are merged one level
 * deep so a caller can override a single field of `tool`.
 */
export function resolveOptions(
  partial: Partial<Omit<ReconcilerOptions, "tool" | "runtime" | "registration">> & {
    tool?: Partial<ToolSpec>;
    runtime?: Partial<RuntimeSpec>;
    registration?: Partial<RegistrationPolicy>;
  } = {},
): ReconcilerOptions {
  return {
    staging_dir: partial.staging_dir ?? defaultStagingDir(),
    tool: { ...DEFAULT_TOOL, ...partial.tool },
    runtime: { ...DEFAULT_RUNTIME, ...partial.runtime },
    min_os_build: partial.min_os_build ?? DEFAULT_MIN_OS_BUILD,
    require_elevation: partial.require_elevation ?? true,
    registration: { ...DEFAULT_REGISTRATION, ...partial.registration },
    dry_run: partial.dry_run ?? false,
    force: partial.force ?? false,
    verbose: partial.verbose ?? false,
    timeout_ms: partial.timeout_ms ?? DEFAULT_TIMEOUT_MS,
    token: partial.token,
    logger: partial.logger,
  };
}
