/**
 * Warden Engine — Public API
 *
 * This is the single entry point for the engine package.
 * The CLI imports from here, never from internal modules.
 */

export { Reconciler } from "./reconciler";
export type { ReconcilerCollaborators } from "./reconciler";

export type {
  Architecture,
  ToolInstallation,
  ReleaseInfo,
  Freshness,
  ToolSpec,
  RuntimeSpec,
  RegistrationPolicy,
  ReconcilerOptions,
  ReconcileState,
  ErrorCategory,
  ReconcileError,
  StepResult,
  ReconcileAction,
  ReconcileResult,
  InspectionResult,
  HostReport,
  RuntimeReport,
  InstallReport,
  ReconcileEvent,
  ReconcileEventType,
  ReconcileEventHandler,
  StateChangeData,
  ProgressData,
} from "./types";

export {
  DEFAULT_TOOL,
  DEFAULT_RUNTIME,
  DEFAULT_REGISTRATION,
  DEFAULT_MIN_OS_BUILD,
  DEFAULT_TIMEOUT_MS,
  defaultStagingDir,
  resolveOptions,
} from "./defaults";

export type { HostAdapter, InstallerRunResult, VersionReadMode } from "./host";

export {
  GitHubReleaseFeed,
  ReleaseFeedError,
  parseRelease,
  selectBundleAsset,
} from "./release-feed";
export type { ReleaseSource, ReleaseAsset } from "./release-feed";

export { downloadFile, fileNameFromUrl } from "./downloader";
export type {
  DownloadFn,
  DownloadOptions,
  DownloadResult,
  DownloadProgress,
} from "./downloader";

// Utilities (exposed for CLI use)
export {
  normalizeSemver,
  parseSemver,
  compareSemver,
  checkFreshness,
  parseVersionOutput,
} from "./utils/semver";
export { resolveVariables, validateVariables } from "./utils/variables";
export { createLogger } from "./utils/logger";
export type { Logger, LogLevel } from "./utils/logger";

export { WindowsHost } from "./windows";
