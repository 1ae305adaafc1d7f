/**
 * Warden Engine — Reconciler Tests
 *
 * Drives the full workflow against an in-process host, release source
 * and downloader. Registration polling runs with zero delay.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { Reconciler } from "../src/reconciler";
import { ReleaseFeedError } from "../src/release-feed";
import { ReconcileEvent, ReconcileState, ReconcilerOptions } from "../src/types";
import {
  FakeFeed,
  FakeHost,
  FakeDownload,
  fakeDownload,
  makeTempDir,
  release,
  testOptions,
} from "./helpers/fakes";

const WINGET = "C:\\Users\\dev\\AppData\\Local\\Microsoft\\WindowsApps\\winget.exe";

describe("Reconciler", () => {
  let root: string;
  let stagingDir: string;
  let host: FakeHost;
  let download: FakeDownload;

  function reconciler(
    feed: FakeFeed,
    overrides: Partial<ReconcilerOptions> = {},
  ): Reconciler {
    return new Reconciler(testOptions(stagingDir, overrides), {
      host,
      feed,
      download: download.fn,
    });
  }

  function stateTrail(r: Reconciler): ReconcileState[] {
    const states: ReconcileState[] = [];
    r.on((event: ReconcileEvent) => {
      if (event.type === "state_change") states.push(event.data.state);
    });
    return states;
  }

  /** Make a provision call "install" `version` at `exe` */
  function installsAs(version: string, exe: string = WINGET): void {
    host.onProvision = () => {
      host.commandPath = exe;
      host.version = version;
    };
  }

  beforeEach(() => {
    root = makeTempDir("reconcile");
    stagingDir = path.join(root, "staging");
    host = new FakeHost();
    download = fakeDownload();
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  // ─── End-to-end scenarios ──────────────────────────────────

  describe("workflow", () => {
    it("installs the latest release when the tool is absent", async () => {
      installsAs("1.9.0");
      const feed = new FakeFeed(release("1.9.0"));

      const result = await reconciler(feed).reconcile();

      expect(result.final_state).toBe("COMPLETED");
      expect(result.action).toBe("installed");
      expect(result.freshness).toBe("up-to-date");
      expect(result.installation).toEqual({ executable_path: WINGET, version: "1.9.0" });
      expect(result.error).toBeUndefined();
      expect(host.provisionCalls).toEqual([
        { bundlePath: path.join(stagingDir, "App.msixbundle"), existed: true },
      ]);
      expect(feed.calls).toBe(1);
      expect(fs.readdirSync(stagingDir)).toEqual([]);
    });

    it("does nothing when the installed version equals the latest", async () => {
      host.commandPath = WINGET;
      host.version = "1.5.0";
      const feed = new FakeFeed(release("1.5.0"));

      const result = await reconciler(feed).reconcile();

      expect(result.final_state).toBe("COMPLETED");
      expect(result.action).toBe("none");
      expect(result.freshness).toBe("up-to-date");
      expect(result.installation).toEqual({ executable_path: WINGET, version: "1.5.0" });
      expect(download.calls).toHaveLength(0);
      expect(host.provisionCalls).toHaveLength(0);
    });

    it("does nothing when the installed version is newer", async () => {
      host.commandPath = WINGET;
      host.version = "1.7.0";

      const result = await reconciler(new FakeFeed(release("1.6.0"))).reconcile();

      expect(result.action).toBe("none");
      expect(host.provisionCalls).toHaveLength(0);
    });

    it("updates a stale tool once and confirms the new version", async () => {
      host.commandPath = WINGET;
      host.version = "1.4.0";
      installsAs("1.6.0");
      const feed = new FakeFeed(release("1.6.0"));

      const result = await reconciler(feed).reconcile();

      expect(result.final_state).toBe("COMPLETED");
      expect(result.action).toBe("updated");
      expect(result.freshness).toBe("up-to-date");
      expect(result.installation?.version).toBe("1.6.0");
      expect(host.provisionCalls).toHaveLength(1);
      expect(feed.calls).toBe(1);
      expect(host.versionReads.map((r) => r.mode)).toEqual(["capture", "redirect"]);
      expect(host.versionReads[1].scratchDir).toBe(stagingDir);
    });

    it("fails without installing when the feed is unreachable", async () => {
      host.commandPath = WINGET;
      host.version = "1.4.0";
      const feed = new FakeFeed(new ReleaseFeedError("network", "Release feed unreachable: ENOTFOUND"));

      const result = await reconciler(feed).reconcile();

      expect(result.final_state).toBe("FAILED");
      expect(result.error).toEqual({
        category: "NETWORK_ERROR",
        message: "Release feed unreachable: ENOTFOUND",
        state: "RESOLVING",
        fatal: false,
        details: { feed: "https://api.github.com/repos/microsoft/winget-cli/releases/latest" },
      });
      expect(download.calls).toHaveLength(0);
      expect(host.provisionCalls).toHaveLength(0);
    });

    it("fails without installing when the tool is absent and the feed is unreachable", async () => {
      const feed = new FakeFeed(new Error("getaddrinfo ENOTFOUND api.github.com"));

      const result = await reconciler(feed).reconcile();

      expect(result.final_state).toBe("FAILED");
      expect(result.error?.category).toBe("NETWORK_ERROR");
      expect(result.action).toBe("none");
      expect(host.provisionCalls).toHaveLength(0);
    });

    it("reports a malformed feed as a feed error", async () => {
      host.commandPath = WINGET;
      host.version = "1.4.0";
      const feed = new FakeFeed(new ReleaseFeedError("no_asset", "Release v1.6.0 has no asset ending in .msixbundle"));

      const result = await reconciler(feed).reconcile();

      expect(result.error?.category).toBe("FEED_ERROR");
    });
  });

  // ─── Host support ──────────────────────────────────────────

  describe("host support", () => {
    it("stops on an OS build below the minimum", async () => {
      host.osBuild = 16299;

      const result = await reconciler(new FakeFeed(release("1.6.0"))).reconcile();

      expect(result.final_state).toBe("FAILED");
      expect(result.error).toEqual({
        category: "HOST_UNSUPPORTED",
        message: "OS build 16299 is older than the required 17763",
        state: "CHECKING_HOST",
        fatal: true,
        details: { build: 16299, minimum: 17763 },
      });
      expect(host.findCalls).toHaveLength(0);
      expect(host.commandLookups).toHaveLength(0);
    });

    it("accepts the minimum build itself", async () => {
      host.osBuild = 17763;
      const check = await reconciler(new FakeFeed(release("1.6.0"))).checkHostSupport();
      expect(check).toEqual({
        ok: true,
        value: { os_build: 17763, architecture: "x64", elevated: true },
      });
    });

    it("stops when the build cannot be read", async () => {
      host.osBuild = null;
      const check = await reconciler(new FakeFeed(release("1.6.0"))).checkHostSupport();
      expect(check.ok).toBe(false);
      if (!check.ok) expect(check.error.category).toBe("HOST_UNSUPPORTED");
    });

    it("stops without administrator rights", async () => {
      host.elevated = false;

      const result = await reconciler(new FakeFeed(release("1.6.0"))).reconcile();

      expect(result.error?.category).toBe("PERMISSION_ERROR");
      expect(result.error?.fatal).toBe(true);
      expect(host.findCalls).toHaveLength(0);
    });

    it("allows an unelevated run when elevation is not required", async () => {
      host.elevated = false;
      const check = await reconciler(new FakeFeed(release("1.6.0")), {
        require_elevation: false,
      }).checkHostSupport();
      expect(check.ok).toBe(true);
    });
  });

  // ─── Runtime dependency ────────────────────────────────────

  describe("runtime dependency", () => {
    it("skips the installer when an accepted release line is present", async () => {
      const check = await reconciler(new FakeFeed(release("1.6.0"))).ensureRuntimeDependency();

      expect(check).toEqual({
        ok: true,
        value: {
          found: "Microsoft Visual C++ 2015-2022 Redistributable (x64) - 14.38.33135",
          installed: false,
        },
      });
      expect(host.findCalls).toEqual([
        [
          "Microsoft Visual C++ 2015-2019 Redistributable",
          "Microsoft Visual C++ 2015-2022 Redistributable",
        ],
      ]);
      expect(download.calls).toHaveLength(0);
    });

    it("downloads and runs the installer for the host architecture", async () => {
      host.installedRuntime = null;
      host.architecture = "arm64";

      const check = await reconciler(new FakeFeed(release("1.6.0"))).ensureRuntimeDependency();

      const installerPath = path.join(stagingDir, "vc_redist.arm64.exe");
      expect(check).toEqual({ ok: true, value: { installed: true } });
      expect(download.calls[0].url).toBe("https://aka.ms/vs/17/release/vc_redist.arm64.exe");
      expect(host.installerRuns).toEqual([
        { filePath: installerPath, args: ["/install", "/quiet", "/norestart"], existed: true },
      ]);
      expect(fs.existsSync(installerPath)).toBe(false);
    });

    it("stops the run when the installer fails", async () => {
      host.installedRuntime = null;
      host.runtimeInstallerResult = {
        success: false,
        exitCode: 1603,
        rebootRequired: false,
        message: "Fatal error during installation.",
      };

      const result = await reconciler(new FakeFeed(release("1.6.0"))).reconcile();

      expect(result.error).toEqual({
        category: "DEPENDENCY_ERROR",
        message: "Visual C++ Redistributable installer failed: Fatal error during installation.",
        state: "CHECKING_RUNTIME",
        fatal: true,
        details: { exitCode: 1603 },
      });
      expect(host.commandLookups).toHaveLength(0);
      expect(fs.existsSync(path.join(stagingDir, "vc_redist.x64.exe"))).toBe(false);
    });

    it("stops the run when the installer cannot be downloaded", async () => {
      host.installedRuntime = null;
      download = fakeDownload({ failWith: new Error("HTTP 404") });

      const result = await reconciler(new FakeFeed(release("1.6.0"))).reconcile();

      expect(result.error?.category).toBe("DEPENDENCY_ERROR");
      expect(result.error?.message).toBe("Could not download Visual C++ Redistributable: HTTP 404");
      expect(host.installerRuns).toHaveLength(0);
    });
  });

  // ─── Locating ──────────────────────────────────────────────

  describe("locateInstalledTool", () => {
    it("prefers the command lookup", async () => {
      host.commandPath = WINGET;
      host.fallbackMatch = "C:\\Program Files\\WindowsApps\\other\\winget.exe";

      const exe = await reconciler(new FakeFeed(release("1.6.0"))).locateInstalledTool();

      expect(exe).toBe(WINGET);
      expect(host.expandedPatterns).toHaveLength(0);
    });

    it("falls back to the wildcard path with the architecture filled in", async () => {
      const fallback = "C:\\Apps\\Pkg_1.2.3_x64\\tool.exe";
      host.fallbackMatch = fallback;

      const r = reconciler(new FakeFeed(release("1.6.0")), {
        tool: {
          ...testOptions(stagingDir).tool,
          fallback_path: "C:\\Apps\\Pkg_*_${ARCH}\\tool.exe",
        },
      });

      expect(await r.locateInstalledTool()).toBe(fallback);
      expect(host.expandedPatterns).toEqual(["C:\\Apps\\Pkg_*_x64\\tool.exe"]);
    });

    it("returns null when neither lookup finds the tool", async () => {
      expect(await reconciler(new FakeFeed(release("1.6.0"))).locateInstalledTool()).toBeNull();
    });

    it("uses the fallback path when the tool lives only there", async () => {
      host.fallbackMatch = WINGET;
      host.version = "1.6.0";

      const result = await reconciler(new FakeFeed(release("1.6.0"))).reconcile();

      expect(result.action).toBe("none");
      expect(result.installation?.executable_path).toBe(WINGET);
    });
  });

  // ─── Version reading ───────────────────────────────────────

  describe("readInstalledVersion", () => {
    it("parses the first line of output", async () => {
      host.versionOutput = "v1.9.25200\r\n";
      const read = await reconciler(new FakeFeed(release("1.6.0"))).readInstalledVersion(WINGET);
      expect(read).toEqual({ ok: true, value: "1.9.25200" });
      expect(host.versionReads[0].mode).toBe("capture");
    });

    it("fails on output that is not a version", async () => {
      host.commandPath = WINGET;
      host.versionOutput = "The system cannot execute the specified program.\r\n";

      const result = await reconciler(new FakeFeed(release("1.6.0"))).reconcile();

      expect(result.error).toEqual({
        category: "VERSION_ERROR",
        message: 'Unrecognised version output: "The system cannot execute the specified program."',
        state: "READING_VERSION",
        fatal: false,
        details: { via: "capture" },
      });
    });

    it("fails when the executable cannot be run", async () => {
      host.commandPath = WINGET;

      const result = await reconciler(new FakeFeed(release("1.6.0"))).reconcile();

      expect(result.error?.category).toBe("VERSION_ERROR");
      expect(result.error?.message).toBe(`Could not run ${WINGET}: ${WINGET} is not runnable`);
    });
  });

  // ─── Installing ────────────────────────────────────────────

  describe("install failures", () => {
    it("fails with NOT_FOUND when the tool never appears", async () => {
      const result = await reconciler(new FakeFeed(release("1.9.0"))).reconcile();

      expect(result.final_state).toBe("FAILED");
      expect(result.action).toBe("installed");
      expect(result.error?.category).toBe("NOT_FOUND");
      expect(result.error?.message).toBe("winget is still not found after installing v1.9.0");
      // one lookup while locating, then one per registration attempt
      expect(host.commandLookups).toHaveLength(4);
    });

    it("reports a version mismatch after the update", async () => {
      host.commandPath = WINGET;
      host.version = "1.4.0";

      const result = await reconciler(new FakeFeed(release("1.6.0"))).reconcile();

      expect(result.final_state).toBe("FAILED");
      expect(result.error).toEqual({
        category: "VERIFICATION_ERROR",
        message: "Installed version is 1.4.0 after update, expected 1.6.0",
        state: "CONFIRMING",
        fatal: false,
        details: { expected: "1.6.0", actual: "1.4.0" },
      });
      expect(host.versionReads.filter((r) => r.mode === "redirect")).toHaveLength(3);
    });

    it("reports a provisioning failure", async () => {
      host.commandPath = WINGET;
      host.version = "1.4.0";
      host.provisionError = new Error("Add-AppxProvisionedPackage failed: 0x80073D02");

      const result = await reconciler(new FakeFeed(release("1.6.0"))).reconcile();

      expect(result.error?.category).toBe("INSTALL_ERROR");
      expect(result.error?.state).toBe("INSTALLING");
      expect(fs.readdirSync(stagingDir)).toEqual([]);
    });

    it("reports an empty download URL from the feed", async () => {
      host.commandPath = WINGET;
      host.version = "1.4.0";
      const feed = new FakeFeed({ ...release("1.6.0"), download_url: "" });

      const result = await reconciler(feed).reconcile();

      expect(result.error?.message).toBe("No download URL was provided");
      expect(download.calls).toHaveLength(0);
    });

    it("picks up an update that moved the executable", async () => {
      const moved = "C:\\Program Files\\WindowsApps\\new\\winget.exe";
      host.commandPath = WINGET;
      host.version = "1.4.0";
      installsAs("1.6.0", moved);

      const result = await reconciler(new FakeFeed(release("1.6.0"))).reconcile();

      expect(result.installation).toEqual({ executable_path: moved, version: "1.6.0" });
    });
  });

  // ─── Options ───────────────────────────────────────────────

  describe("dry run", () => {
    it("reads everything and changes nothing for a stale tool", async () => {
      host.commandPath = WINGET;
      host.version = "1.4.0";
      installsAs("1.6.0");

      const result = await reconciler(new FakeFeed(release("1.6.0")), { dry_run: true }).reconcile();

      expect(result.final_state).toBe("COMPLETED");
      expect(result.dry_run).toBe(true);
      expect(result.action).toBe("updated");
      expect(result.freshness).toBe("stale");
      expect(result.installation?.version).toBe("1.4.0");
      expect(download.calls).toHaveLength(0);
      expect(host.provisionCalls).toHaveLength(0);
    });

    it("reports the install it would do for an absent tool", async () => {
      const result = await reconciler(new FakeFeed(release("1.9.0")), { dry_run: true }).reconcile();

      expect(result.final_state).toBe("COMPLETED");
      expect(result.action).toBe("installed");
      expect(result.release?.version).toBe("1.9.0");
      expect(host.provisionCalls).toHaveLength(0);
    });

    it("does not install a missing runtime", async () => {
      host.installedRuntime = null;
      host.commandPath = WINGET;
      host.version = "1.6.0";

      const result = await reconciler(new FakeFeed(release("1.6.0")), { dry_run: true }).reconcile();

      expect(result.final_state).toBe("COMPLETED");
      expect(host.installerRuns).toHaveLength(0);
      expect(download.calls).toHaveLength(0);
    });
  });

  describe("force", () => {
    it("reinstalls a current tool", async () => {
      host.commandPath = WINGET;
      host.version = "1.5.0";

      const result = await reconciler(new FakeFeed(release("1.5.0")), { force: true }).reconcile();

      expect(result.final_state).toBe("COMPLETED");
      expect(result.action).toBe("updated");
      expect(host.provisionCalls).toHaveLength(1);
    });

    it("does not downgrade a tool newer than the latest release", async () => {
      host.commandPath = WINGET;
      host.version = "1.7.0";

      const result = await reconciler(new FakeFeed(release("1.6.0")), { force: true }).reconcile();

      expect(result.final_state).toBe("COMPLETED");
      expect(result.action).toBe("none");
      expect(result.freshness).toBe("up-to-date");
      expect(result.installation).toEqual({ executable_path: WINGET, version: "1.7.0" });
      expect(result.error).toBeUndefined();
      expect(download.calls).toHaveLength(0);
      expect(host.provisionCalls).toHaveLength(0);
    });
  });

  // ─── Events ────────────────────────────────────────────────

  describe("events", () => {
    it("walks the short path when nothing needs doing", async () => {
      host.commandPath = WINGET;
      host.version = "1.5.0";
      const r = reconciler(new FakeFeed(release("1.5.0")));
      const states = stateTrail(r);

      await r.reconcile();

      expect(states).toEqual([
        "PENDING",
        "CHECKING_HOST",
        "CHECKING_RUNTIME",
        "LOCATING",
        "READING_VERSION",
        "RESOLVING",
        "COMPARING",
        "COMPLETED",
      ]);
    });

    it("walks the update path", async () => {
      host.commandPath = WINGET;
      host.version = "1.4.0";
      installsAs("1.6.0");
      const r = reconciler(new FakeFeed(release("1.6.0")));
      const states = stateTrail(r);

      await r.reconcile();

      expect(states).toEqual([
        "PENDING",
        "CHECKING_HOST",
        "CHECKING_RUNTIME",
        "LOCATING",
        "READING_VERSION",
        "RESOLVING",
        "COMPARING",
        "DOWNLOADING",
        "INSTALLING",
        "REGISTERING",
        "CONFIRMING",
        "COMPLETED",
      ]);
    });

    it("walks the install path without a second feed query", async () => {
      installsAs("1.9.0");
      const r = reconciler(new FakeFeed(release("1.9.0")));
      const states = stateTrail(r);

      await r.reconcile();

      expect(states).toEqual([
        "PENDING",
        "CHECKING_HOST",
        "CHECKING_RUNTIME",
        "LOCATING",
        "RESOLVING",
        "DOWNLOADING",
        "INSTALLING",
        "REGISTERING",
        "READING_VERSION",
        "COMPARING",
        "COMPLETED",
      ]);
    });

    it("ends in FAILED on error", async () => {
      host.osBuild = 10240;
      const r = reconciler(new FakeFeed(release("1.6.0")));
      const states = stateTrail(r);

      await r.reconcile();

      expect(states).toEqual(["PENDING", "CHECKING_HOST", "FAILED"]);
    });

    it("reports download progress", async () => {
      host.commandPath = WINGET;
      host.version = "1.4.0";
      installsAs("1.6.0");
      const r = reconciler(new FakeFeed(release("1.6.0")));
      const progress: number[] = [];
      r.on((event) => {
        if (event.type === "progress") progress.push(event.data.progress_percent);
      });

      await r.reconcile();

      expect(progress).toEqual([100]);
    });

    it("keeps going when a handler throws", async () => {
      host.commandPath = WINGET;
      host.version = "1.5.0";
      const r = reconciler(new FakeFeed(release("1.5.0")));
      r.on(() => {
        throw new Error("handler broke");
      });

      const result = await r.reconcile();

      expect(result.final_state).toBe("COMPLETED");
    });

    it("tags every event with the run's execution id", async () => {
      host.commandPath = WINGET;
      host.version = "1.5.0";
      const r = reconciler(new FakeFeed(release("1.5.0")));
      const ids = new Set<string>();
      r.on((event) => ids.add(event.data.execution_id));

      const result = await r.reconcile();

      expect([...ids]).toEqual([result.execution_id]);
    });
  });

  // ─── Inspection ────────────────────────────────────────────

  describe("inspect", () => {
    it("reports a stale tool without changing it", async () => {
      host.commandPath = WINGET;
      host.version = "1.4.0";

      const report = await reconciler(new FakeFeed(release("1.6.0"))).inspect();

      expect(report).toEqual({
        installation: { executable_path: WINGET, version: "1.4.0" },
        release: release("1.6.0"),
        freshness: "stale",
      });
      expect(host.provisionCalls).toHaveLength(0);
      expect(host.findCalls).toHaveLength(0);
    });

    it("reports an absent tool with the latest release", async () => {
      const report = await reconciler(new FakeFeed(release("1.9.0"))).inspect();

      expect(report).toEqual({ installation: {}, release: release("1.9.0") });
    });

    it("carries a feed failure", async () => {
      host.commandPath = WINGET;
      host.version = "1.4.0";

      const report = await reconciler(new FakeFeed(new Error("timeout"))).inspect();

      expect(report.installation.version).toBe("1.4.0");
      expect(report.error?.category).toBe("NETWORK_ERROR");
    });
  });

  describe("compareVersions", () => {
    it("agrees with semantic ordering", () => {
      const r = reconciler(new FakeFeed(release("1.6.0")));
      expect(r.compareVersions("1.4.0", "1.6.0")).toBe("stale");
      expect(r.compareVersions("v1.6.0", "1.6.0")).toBe("up-to-date");
      expect(r.compareVersions("junk", "1.6.0")).toBeNull();
    });
  });
});
