/**
 * Warden Engine — Core Type Definitions
 *
 * Shapes shared by the reconciler, the release feed and the host adapter.
 * Result and option objects use snake_case keys so they can be printed
 * or serialised as-is by the CLI.
 */

import type { Logger } from "./utils/logger";

export type Architecture = "x64" | "x86" | "arm64";

// ─── Tool & Release ──────────────────────────────────────────────

export interface ToolInstallation {
  /** Resolved executable path, absent when the tool was not found */
  executable_path?: string;
  /** Normalized version (no leading "v"), absent until read */
  version?: string;
}

export interface ReleaseInfo {
  /** Normalized version parsed from the tag */
  version: string;
  /** Raw tag name as published */
  tag: string;
  /** Download URL of the selected bundle asset */
  download_url: string;
  /** File name of the selected asset */
  asset_name: string;
  published_at?: string;
}

export type Freshness = "up-to-date" | "stale";

// ─── Specs (what to manage) ──────────────────────────────────────

export interface ToolSpec {
  /** Command name resolved through the OS lookup (e.g. "winget") */
  command: string;
  display_name: string;
  /**
   * Fallback executable location. May contain ${VAR} references and
   * "*" wildcards in any segment.
   */
  fallback_path: string;
  /** Releases API URL returning the latest release */
  feed_url: string;
  /** Asset suffix that identifies the installable bundle */
  bundle_extension: string;
  /** Arguments that make the tool print its version */
  version_args: string[];
}

export interface RuntimeSpec {
  display_name: string;
  /** Accepted DisplayName substrings in the uninstall registry */
  name_patterns: string[];
  /** Installer URL; ${ARCH} resolves to x64, x86 or arm64 */
  installer_url: string;
  installer_args: string[];
}

export interface RegistrationPolicy {
  /** How many times to re-check after an install */
  attempts: number;
  /** First delay between checks */
  interval_ms: number;
  /** Upper bound for the growing delay */
  max_interval_ms: number;
}

// ─── Reconciler Options ──────────────────────────────────────────

export interface ReconcilerOptions {
  /** Scratch directory for downloaded installers */
  staging_dir: string;
  tool: ToolSpec;
  runtime: RuntimeSpec;
  min_os_build: number;
  require_elevation: boolean;
  registration: RegistrationPolicy;
  /** Read everything, change nothing */
  dry_run: boolean;
  /** Reinstall even when the installed version is current */
  force: boolean;
  verbose: boolean;
  /** Network timeout for feed requests and downloads */
  timeout_ms: number;
  /** Bearer token sent to the release feed */
  token?: string;
  /** Injected logger; one is created from `verbose` otherwise */
  logger?: Logger;
}

// ─── States & Errors ─────────────────────────────────────────────

export type ReconcileState =
  | "PENDING"
  | "CHECKING_HOST"
  | "CHECKING_RUNTIME"
  | "LOCATING"
  | "READING_VERSION"
  | "RESOLVING"
  | "COMPARING"
  | "DOWNLOADING"
  | "INSTALLING"
  | "REGISTERING"
  | "CONFIRMING"
  | "COMPLETED"
  | "FAILED";

export type ErrorCategory =
  | "HOST_UNSUPPORTED"
  | "PERMISSION_ERROR"
  | "DEPENDENCY_ERROR"
  | "NETWORK_ERROR"
  | "FEED_ERROR"
  | "DOWNLOAD_ERROR"
  | "INSTALL_ERROR"
  | "VERSION_ERROR"
  | "NOT_FOUND"
  | "VERIFICATION_ERROR";

export interface ReconcileError {
  category: ErrorCategory;
  message: string;
  state: ReconcileState;
  /** Environment failures that make any further step pointless */
  fatal: boolean;
  details?: Record<string, unknown>;
}

export type StepResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ReconcileError };

export type ReconcileAction = "none" | "installed" | "updated";

export interface ReconcileResult {
  execution_id: string;
  final_state: "COMPLETED" | "FAILED";
  action: ReconcileAction;
  freshness?: Freshness;
  installation?: ToolInstallation;
  release?: ReleaseInfo;
  dry_run: boolean;
  started_at: string;
  finished_at: string;
  error?: ReconcileError;
}

export interface InspectionResult {
  installation: ToolInstallation;
  release?: ReleaseInfo;
  freshness?: Freshness;
  error?: ReconcileError;
}

export interface HostReport {
  os_build: number;
  architecture: Architecture;
  elevated: boolean;
}

export interface RuntimeReport {
  /** Matching DisplayName, when one was already present */
  found?: string;
  /** Whether this run installed the redistributable */
  installed: boolean;
}

export interface InstallReport {
  file_name: string;
  bytes_downloaded: number;
  duration_ms: number;
}

// ─── Events ──────────────────────────────────────────────────────

export type ReconcileEventType = "state_change" | "progress";

export interface StateChangeData {
  execution_id: string;
  state: ReconcileState;
  message?: string;
}

export interface ProgressData {
  execution_id: string;
  state: ReconcileState;
  progress_percent: number;
  bytes_downloaded: number;
  bytes_total: number;
}

export type ReconcileEvent =
  | { type: "state_change"; timestamp: string; data: StateChangeData }
  | { type: "progress"; timestamp: string; data: ProgressData };

export type ReconcileEventHandler = (event: ReconcileEvent) => void;
