/**
 * Warden CLI -- Output Helpers
 *
 * Centralized formatting for all CLI output: colors, spinners, tables.
 * Uses chalk (v4, CommonJS compatible) for ANSI colors,
 * ora for spinners, and cli-table3 for tabular data.
 *
 * Engine logs go to stderr through pino; everything the user reads
 * flows through this module.
 */

import chalk from "chalk";
import ora, { Ora } from "ora";
import Table from "cli-table3";
import { ErrorCategory, ReconcileState } from "@winget-warden/engine";

// ─── Debug Mode ─────────────────────────────────────────────

let _debugMode = false;

export function setDebugMode(enabled: boolean): void {
  _debugMode = enabled;
}

export function isDebugMode(): boolean {
  return _debugMode;
}

// ─── Color Shortcuts ────────────────────────────────────────

export const colors = {
  success: chalk.green,
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.cyan,
  dim: chalk.gray,
  bold: chalk.bold,
  tool: chalk.bold.white,
  version: chalk.cyan,
  muted: chalk.gray,
};

// ─── Symbols (safe for Windows terminals) ───────────────────

export const symbols = {
  success: chalk.green("\u2714"), // ✔
  error: chalk.red("\u2716"), // ✖
  warn: chalk.yellow("\u26A0"), // ⚠
  info: chalk.cyan("\u2139"), // ℹ
  arrow: chalk.gray("\u2192"), // →
};

// ─── Print Helpers ──────────────────────────────────────────

export function printSuccess(msg: string): void {
  console.log(`${symbols.success} ${msg}`);
}

export function printError(msg: string): void {
  console.error(`${symbols.error} ${msg}`);
}

export function printWarn(msg: string): void {
  console.log(`${symbols.warn}  ${msg}`);
}

export function printInfo(msg: string): void {
  console.log(`${symbols.info} ${msg}`);
}

export function printDryRun(msg: string): void {
  console.log(colors.warn("[DRY RUN] ") + msg);
}

/**
 * Print a debug message. Only visible with --debug flag.
 */
export function printDebug(msg: string): void {
  if (_debugMode) {
    console.log(colors.muted(`  [debug] ${msg}`));
  }
}

export function printBlank(): void {
  console.log();
}

/**
 * Print an indented detail line (for sub-items under a stage).
 */
export function printDetail(label: string, value: string): void {
  console.log(`  ${colors.dim(label + ":")} ${value}`);
}

// ─── Stage Output ───────────────────────────────────────────

/**
 *   ✔ Checked host
 *   ✔ Located winget
 *   ✔ Read installed version
 */
export function printStageSuccess(msg: string): void {
  console.log(`  ${symbols.success} ${msg}`);
}

export function printStageError(msg: string): void {
  console.log(`  ${symbols.error} ${msg}`);
}

export function printHeader(msg: string): void {
  console.log();
  console.log(`  ${colors.bold(msg)}`);
  console.log();
}

// ─── Spinner ────────────────────────────────────────────────

export function createSpinner(text: string): Ora {
  return ora({ text, color: "cyan" });
}

// ─── Tables ─────────────────────────────────────────────────

/**
 * On Windows cmd/PowerShell without TERM set, Unicode borders corrupt.
 */
export function shouldUseAsciiBorders(): boolean {
  return process.platform === "win32" && !process.env.TERM;
}

const ASCII_CHARS = {
  top: "-",
  "top-mid": "+",
  "top-left": "+",
  "top-right": "+",
  bottom: "-",
  "bottom-mid": "+",
  "bottom-left": "+",
  "bottom-right": "+",
  left: "|",
  "left-mid": "+",
  mid: "-",
  "mid-mid": "+",
  right: "|",
  "right-mid": "+",
  middle: "|",
};

export interface TableOptions {
  head: string[];
  rows: string[][];
}

export function renderTable({ head, rows }: TableOptions): string {
  const ascii = shouldUseAsciiBorders();
  const table = new Table({
    head: head.map((h) => chalk.bold.cyan(h)),
    style: { head: [], border: ascii ? [] : ["gray"] },
    wordWrap: false,
    ...(ascii ? { chars: ASCII_CHARS } : {}),
  });
  for (const row of rows) {
    table.push(row);
  }
  return table.toString();
}

export function printTable(opts: TableOptions): void {
  console.log(renderTable(opts));
}

// ─── State Badge ────────────────────────────────────────────

const STATE_COLORS: Record<ReconcileState, chalk.Chalk> = {
  PENDING: chalk.gray,
  CHECKING_HOST: chalk.cyan,
  CHECKING_RUNTIME: chalk.cyan,
  LOCATING: chalk.cyan,
  READING_VERSION: chalk.cyan,
  RESOLVING: chalk.cyan,
  COMPARING: chalk.cyan,
  DOWNLOADING: chalk.blue,
  INSTALLING: chalk.yellow,
  REGISTERING: chalk.yellow,
  CONFIRMING: chalk.magenta,
  COMPLETED: chalk.green,
  FAILED: chalk.red,
};

/** Human-friendly state labels */
export const STATE_LABELS: Record<ReconcileState, string> = {
  PENDING: "Starting",
  CHECKING_HOST: "Checking host",
  CHECKING_RUNTIME: "Checking runtime",
  LOCATING: "Locating",
  READING_VERSION: "Reading version",
  RESOLVING: "Resolving latest release",
  COMPARING: "Comparing",
  DOWNLOADING: "Downloading",
  INSTALLING: "Installing",
  REGISTERING: "Waiting for registration",
  CONFIRMING: "Confirming",
  COMPLETED: "Done",
  FAILED: "Failed",
};

export function formatState(state: ReconcileState): string {
  return STATE_COLORS[state](STATE_LABELS[state]);
}

// ─── Error Category Labels ──────────────────────────────────

const ERROR_LABELS: Record<ErrorCategory, string> = {
  HOST_UNSUPPORTED: "Unsupported Windows version",
  PERMISSION_ERROR: "Insufficient permissions",
  DEPENDENCY_ERROR: "Runtime dependency could not be installed",
  NETWORK_ERROR: "Network failure",
  FEED_ERROR: "Unexpected release feed response",
  DOWNLOAD_ERROR: "Download failed",
  INSTALL_ERROR: "Package installation failed",
  VERSION_ERROR: "Could not read the installed version",
  NOT_FOUND: "Tool not found after install",
  VERIFICATION_ERROR: "Post-update verification failed",
};

export function formatErrorCategory(category: ErrorCategory): string {
  return ERROR_LABELS[category];
}

// ─── Byte Formatting ────────────────────────────────────────

export function formatBytes(bytes: number): string {
  if (bytes === 0) return "0 B";
  const units = ["B", "KB", "MB", "GB"];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), units.length - 1);
  return `${(bytes / Math.pow(1024, i)).toFixed(1)} ${units[i]}`;
}

// ─── Duration ───────────────────────────────────────────────

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const mins = Math.floor(ms / 60_000);
  const secs = Math.round((ms % 60_000) / 1000);
  return `${mins}m ${secs}s`;
}
