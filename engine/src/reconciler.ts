/**
 * Warden Engine — Version Reconciler
 *
 * Keeps one tool installed at its latest published release:
 *
 *   PENDING → CHECKING_HOST → CHECKING_RUNTIME → LOCATING
 *     ├─ not found → RESOLVING → DOWNLOADING → INSTALLING → REGISTERING
 *     └─ found
 *   → READING_VERSION → RESOLVING → COMPARING
 *     ├─ up to date → COMPLETED
 *     └─ stale → DOWNLOADING → INSTALLING → REGISTERING → CONFIRMING → COMPLETED
 *
 * Any failure transitions to FAILED. Nothing is retried; the only loop is
 * the bounded wait for the OS to register a freshly provisioned package.
 *
 * The reconciler has NO UI logic. It reports through return values and
 * event callbacks, and leaves exit codes to the caller.
 */

import * as crypto from "crypto";
import {
  Freshness,
  HostReport,
  InspectionResult,
  InstallReport,
  ReconcileAction,
  ReconcileError,
  ReconcileEvent,
  ReconcileEventHandler,
  ReconcileResult,
  ReconcileState,
  ReconcilerOptions,
  ReleaseInfo,
  RuntimeReport,
  StepResult,
  ToolInstallation,
} from "./types";
import { HostAdapter, VersionReadMode } from "./host";
import { DownloadFn, ProgressCallback, downloadFile } from "./downloader";
import { GitHubReleaseFeed, ReleaseFeedError, ReleaseSource } from "./release-feed";
import { installBundle } from "./bundle-installer";
import { ensureRuntime } from "./runtime-dependency";
import { StepContext } from "./step-context";
import { errorMessage, fail, succeed } from "./errors";
import { WindowsHost } from "./windows";
import { createLogger, Logger } from "./utils/logger";
import { checkFreshness, compareSemver, parseVersionOutput } from "./utils/semver";
import { resolveVariables } from "./utils/variables";
import { pollUntil } from "./utils/wait";

/** OS, feed and network seams. Defaults talk to the real machine. */
export interface ReconcilerCollaborators {
  host: HostAdapter;
  feed: ReleaseSource;
  download: DownloadFn;
}

export class Reconciler {
  private readonly options: ReconcilerOptions;
  private readonly logger: Logger;
  private readonly host: HostAdapter;
  private readonly feed: ReleaseSource;
  private readonly download: DownloadFn;
  private eventHandlers: ReconcileEventHandler[] = [];
  private executionId = "";

  constructor(
    options: ReconcilerOptions,
    collaborators: Partial<ReconcilerCollaborators> = {},
  ) {
    this.options = options;
    this.logger =
      options.logger ??
      createLogger({ level: options.verbose ? "debug" : "silent", component: "reconciler" });
    this.host = collaborators.host ?? new WindowsHost(this.logger);
    this.feed =
      collaborators.feed ??
      new GitHubReleaseFeed({
        url: options.tool.feed_url,
        bundleExtension: options.tool.bundle_extension,
        token: options.token,
        timeoutMs: options.timeout_ms,
        logger: this.logger,
      });
    this.download = collaborators.download ?? downloadFile;
  }

  /** Display name of the managed tool */
  get toolName(): string {
    return this.options.tool.display_name;
  }

  // ─── Event System ────────────────────────────────────────────

  /**
   * Register an event handler. The CLI uses this to drive its spinner.
   */
  on(handler: ReconcileEventHandler): void {
    this.eventHandlers.push(handler);
  }

  private emit(event: ReconcileEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (err: unknown) {
        this.logger.debug({ error: errorMessage(err) }, "Event handler threw");
      }
    }
  }

  private transition(state: ReconcileState, message?: string): void {
    this.logger.debug({ execution: this.executionId, state, message }, "State change");
    this.emit({
      type: "state_change",
      timestamp: new Date().toISOString(),
      data: { execution_id: this.executionId, state, message },
    });
  }

  private progressReporter(state: ReconcileState): ProgressCallback {
    return (progress) => {
      this.emit({
        type: "progress",
        timestamp: new Date().toISOString(),
        data: {
          execution_id: this.executionId,
          state,
          progress_percent: progress.percent,
          bytes_downloaded: progress.bytes_downloaded,
          bytes_total: progress.bytes_total,
        },
      });
    };
  }

  private stepContext(): StepContext {
    return {
      host: this.host,
      download: this.download,
      logger: this.logger,
      stagingDir: this.options.staging_dir,
      timeoutMs: this.options.timeout_ms,
      dryRun: this.options.dry_run,
      onStage: (state, message) => this.transition(state, message),
      onProgress: this.progressReporter("DOWNLOADING"),
    };
  }

  // ─── Operations ──────────────────────────────────────────────

  /**
   * Fail when the OS build is below the minimum, or when elevation is
   * required and missing. Both failures are fatal.
   */
  async checkHostSupport(): Promise<StepResult<HostReport>> {
    const build = this.host.getOsBuild();
    const architecture = this.host.getArchitecture();

    if (build === null) {
      return fail("HOST_UNSUPPORTED", "Could not determine the OS build number", "CHECKING_HOST", {
        fatal: true,
      });
    }
    if (build < this.options.min_os_build) {
      this.logger.error({ build, minimum: this.options.min_os_build }, "OS build too old");
      return fail(
        "HOST_UNSUPPORTED",
        `OS build ${build} is older than the required ${this.options.min_os_build}`,
        "CHECKING_HOST",
        { fatal: true, details: { build, minimum: this.options.min_os_build } },
      );
    }

    const elevated = await this.host.isElevated();
    if (this.options.require_elevation && !elevated) {
      return fail(
        "PERMISSION_ERROR",
        "Administrator rights are required. Run the terminal as Administrator.",
        "CHECKING_HOST",
        { fatal: true },
      );
    }

    this.logger.info({ build, architecture, elevated }, "Host supported");
    return succeed({ os_build: build, architecture, elevated });
  }

  /**
   * Install the runtime redistributable if no accepted version is present.
   */
  ensureRuntimeDependency(): Promise<StepResult<RuntimeReport>> {
    return ensureRuntime(this.options.runtime, {
      ...this.stepContext(),
      onProgress: this.progressReporter("CHECKING_RUNTIME"),
    });
  }

  /**
   * Resolve the tool's executable: OS command lookup first, then the
   * wildcard fallback path. Null when neither finds it.
   */
  async locateInstalledTool(): Promise<string | null> {
    const { command, fallback_path } = this.options.tool;

    try {
      const resolved = await this.host.resolveCommand(command);
      if (resolved) return resolved;
    } catch (err: unknown) {
      this.logger.debug({ command, error: errorMessage(err) }, "Command lookup failed");
    }

    try {
      const pattern = resolveVariables(fallback_path, {
        ARCH: this.host.getArchitecture(),
      });
      const match = this.host.expandPathPattern(pattern);
      if (match) {
        this.logger.debug({ pattern, match }, "Tool found at fallback path");
        return match;
      }
    } catch (err: unknown) {
      this.logger.warn({ pattern: fallback_path, error: errorMessage(err) }, "Fallback path lookup failed");
    }

    return null;
  }

  /**
   * Latest release from the feed, with its bundle asset.
   */
  async fetchLatestRelease(): Promise<StepResult<ReleaseInfo>> {
    try {
      return succeed(await this.feed.fetchLatest());
    } catch (err: unknown) {
      const category =
        err instanceof ReleaseFeedError && err.kind !== "network"
          ? "FEED_ERROR"
          : "NETWORK_ERROR";
      this.logger.error({ error: errorMessage(err), category }, "Release feed query failed");
      return fail(category, errorMessage(err), "RESOLVING", {
        details: { feed: this.options.tool.feed_url },
      });
    }
  }

  /**
   * Download and provision the bundle at `downloadUrl`. The downloaded
   * file is removed on every exit path.
   */
  installOrUpdate(downloadUrl: string): Promise<StepResult<InstallReport>> {
    return installBundle(downloadUrl, this.stepContext());
  }

  /**
   * Run the tool's version flag and parse the first line it prints.
   */
  async readInstalledVersion(
    executablePath: string,
    via: VersionReadMode = "capture",
  ): Promise<StepResult<string>> {
    let output: string;
    try {
      output = await this.host.readCommandOutput(
        executablePath,
        this.options.tool.version_args,
        via,
        this.options.staging_dir,
      );
    } catch (err: unknown) {
      return fail("VERSION_ERROR", `Could not run ${executablePath}: ${errorMessage(err)}`, "READING_VERSION", {
        details: { via },
      });
    }

    const version = parseVersionOutput(output);
    if (!version) {
      return fail("VERSION_ERROR", `Unrecognised version output: "${output.trim()}"`, "READING_VERSION", {
        details: { via },
      });
    }
    return succeed(version);
  }

  compareVersions(installed: string, latest: string): Freshness | null {
    return checkFreshness(installed, latest);
  }

  // ─── Inspection (read-only) ──────────────────────────────────

  /**
   * Locate, read and compare without changing anything.
   */
  async inspect(): Promise<InspectionResult> {
    const installation: ToolInstallation = {};

    const exe = await this.locateInstalledTool();
    if (exe) {
      installation.executable_path = exe;
      const read = await this.readInstalledVersion(exe);
      if (!read.ok) return { installation, error: read.error };
      installation.version = read.value;
    }

    const latest = await this.fetchLatestRelease();
    if (!latest.ok) return { installation, error: latest.error };

    if (!installation.version) {
      return { installation, release: latest.value };
    }

    const freshness = this.compareVersions(installation.version, latest.value.version);
    if (!freshness) {
      return {
        installation,
        release: latest.value,
        error: {
          category: "VERSION_ERROR",
          message: `Cannot compare ${installation.version} with ${latest.value.version}`,
          state: "COMPARING",
          fatal: false,
        },
      };
    }
    return { installation, release: latest.value, freshness };
  }

  // ─── Workflow ────────────────────────────────────────────────

  async reconcile(): Promise<ReconcileResult> {
    this.executionId = crypto.randomUUID();
    const startedAt = new Date().toISOString();
    const dryRun = this.options.dry_run;
    const installation: ToolInstallation = {};
    let release: ReleaseInfo | undefined;
    let freshness: Freshness | undefined;
    let action: ReconcileAction = "none";

    const finish = (error?: ReconcileError): ReconcileResult => {
      if (error) {
        this.logger.error(
          { state: error.state, category: error.category, error: error.message },
          "Reconciliation failed",
        );
        this.transition("FAILED", error.message);
      } else {
        this.transition("COMPLETED");
      }
      return {
        execution_id: this.executionId,
        final_state: error ? "FAILED" : "COMPLETED",
        action,
        freshness,
        installation,
        release,
        dry_run: dryRun,
        started_at: startedAt,
        finished_at: new Date().toISOString(),
        error,
      };
    };

    this.transition("PENDING");

    // ─── Prerequisites ───
    this.transition("CHECKING_HOST");
    const hostCheck = await this.checkHostSupport();
    if (!hostCheck.ok) return finish(hostCheck.error);

    this.transition("CHECKING_RUNTIME");
    const runtime = await this.ensureRuntimeDependency();
    if (!runtime.ok) return finish(runtime.error);

    // ─── Locate (install when absent) ───
    this.transition("LOCATING");
    let exe = await this.locateInstalledTool();

    if (!exe) {
      this.logger.info(`${this.options.tool.display_name} not found - installing latest release`);
      this.transition("RESOLVING");
      const latest = await this.fetchLatestRelease();
      if (!latest.ok) return finish(latest.error);
      release = latest.value;

      const installed = await this.installOrUpdate(release.download_url);
      if (!installed.ok) return finish(installed.error);
      action = "installed";

      if (dryRun) return finish();

      this.transition("REGISTERING");
      exe = await this.waitForTool();
      if (!exe) {
        return finish({
          category: "NOT_FOUND",
          message: `${this.options.tool.display_name} is still not found after installing ${release.tag}`,
          state: "REGISTERING",
          fatal: false,
        });
      }
    }
    installation.executable_path = exe;

    // ─── Read installed version ───
    this.transition("READING_VERSION");
    const current = await this.readInstalledVersion(exe, "capture");
    if (!current.ok) return finish(current.error);
    installation.version = current.value;

    // ─── Latest release (once per pass) ───
    if (!release) {
      this.transition("RESOLVING");
      const latest = await this.fetchLatestRelease();
      if (!latest.ok) return finish(latest.error);
      release = latest.value;
    }

    // ─── Compare ───
    this.transition("COMPARING");
    const cmp = this.compareVersions(current.value, release.version);
    if (!cmp) {
      return finish({
        category: "VERSION_ERROR",
        message: `Cannot compare ${current.value} with ${release.version}`,
        state: "COMPARING",
        fatal: false,
      });
    }
    freshness = cmp;

    if (freshness === "up-to-date" && !this.options.force) {
      this.logger.info({ version: current.value }, "Tool is up to date");
      return finish();
    }

    // A forced reinstall never downgrades
    if (compareSemver(current.value, release.version) === 1) {
      this.logger.info(
        { installed: current.value, latest: release.version },
        "Installed version is newer than the latest release, skipping reinstall",
      );
      return finish();
    }

    // ─── Update ───
    this.logger.info(
      { installed: current.value, latest: release.version, forced: freshness === "up-to-date" },
      "Updating tool",
    );
    const updated = await this.installOrUpdate(release.download_url);
    if (!updated.ok) return finish(updated.error);
    if (action === "none") action = "updated";

    if (dryRun) return finish();

    this.transition("REGISTERING");
    const confirmed = await this.waitForVersion(exe, release.version);
    installation.executable_path = confirmed.executable_path;
    installation.version = confirmed.version;

    this.transition("CONFIRMING");
    if (confirmed.version === undefined || compareSemver(confirmed.version, release.version) !== 0) {
      return finish({
        category: "VERIFICATION_ERROR",
        message: `Installed version is ${confirmed.version ?? "unknown"} after update, expected ${release.version}`,
        state: "CONFIRMING",
        fatal: false,
        details: { expected: release.version, actual: confirmed.version },
      });
    }

    freshness = "up-to-date";
    this.logger.info({ version: confirmed.version }, "Update confirmed");
    return finish();
  }

  // ─── Registration waits ──────────────────────────────────────

  private pollOptions(what: string) {
    const { attempts, interval_ms, max_interval_ms } = this.options.registration;
    return {
      attempts,
      intervalMs: interval_ms,
      maxIntervalMs: max_interval_ms,
      onMiss: (attempt: number, nextDelayMs: number) =>
        this.logger.debug({ attempt, nextDelayMs }, `Waiting for ${what}`),
    };
  }

  private waitForTool(): Promise<string | null> {
    return pollUntil(() => this.locateInstalledTool(), this.pollOptions("tool registration"));
  }

  /**
   * Re-read the version (through the redirect path) until it matches
   * `expected` or the attempts run out. Returns the last reading.
   */
  private async waitForVersion(
    previousPath: string,
    expected: string,
  ): Promise<ToolInstallation> {
    let last: ToolInstallation = { executable_path: previousPath };

    await pollUntil(async () => {
      // A provisioned update can move the executable to a new package folder
      const exe = (await this.locateInstalledTool()) ?? previousPath;
      const read = await this.readInstalledVersion(exe, "redirect");
      last = { executable_path: exe, version: read.ok ? read.value : last.version };
      return read.ok && compareSemver(read.value, expected) === 0 ? read.value : null;
    }, this.pollOptions("updated version"));

    return last;
  }
}
