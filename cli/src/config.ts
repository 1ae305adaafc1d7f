/**
 * Warden CLI — Configuration
 *
 * Central location for CLI paths, the optional config file and the
 * environment overrides. Everything lives under ~/.winget-warden
 * (%USERPROFILE%\.winget-warden on Windows).
 *
 *   # ~/.winget-warden/config.yaml
 *   staging_dir: ${TEMP}\winget-warden
 *   require_elevation: true
 *   registration:
 *     attempts: 10
 *   network:
 *     timeout_ms: 120000
 */

import * as path from "path";
import * as os from "os";
import * as fs from "fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import {
  ReconcilerOptions,
  resolveOptions,
  resolveVariables,
  validateVariables,
} from "@winget-warden/engine";

/** Root data directory: ~/.winget-warden */
export const WARDEN_HOME = path.join(os.homedir(), ".winget-warden");

export const paths = {
  /** Optional YAML config */
  config: path.join(WARDEN_HOME, "config.yaml"),
  /** Downloaded installers, removed after each install */
  staging: path.join(WARDEN_HOME, "staging"),
};

// ─── Schema ─────────────────────────────────────────────────

const ToolSchema = z
  .object({
    command: z.string().min(1),
    display_name: z.string().min(1),
    fallback_path: z.string().min(1),
    feed_url: z.string().url(),
    bundle_extension: z.string().regex(/^\.[A-Za-z0-9]+$/, "must look like .msixbundle"),
    version_args: z.array(z.string()),
  })
  .partial()
  .strict();

const RuntimeSchema = z
  .object({
    display_name: z.string().min(1),
    name_patterns: z.array(z.string().min(1)).min(1),
    installer_url: z.string().min(1),
    installer_args: z.array(z.string()),
  })
  .partial()
  .strict();

const RegistrationSchema = z
  .object({
    attempts: z.number().int().min(1).max(100),
    interval_ms: z.number().int().min(0),
    max_interval_ms: z.number().int().min(0),
  })
  .partial()
  .strict();

const NetworkSchema = z
  .object({
    timeout_ms: z.number().int().positive(),
    token: z.string().min(1),
  })
  .partial()
  .strict();

export const ConfigSchema = z
  .object({
    staging_dir: z.string().min(1),
    min_os_build: z.number().int().nonnegative(),
    require_elevation: z.boolean(),
    tool: ToolSchema,
    runtime: RuntimeSchema,
    registration: RegistrationSchema,
    network: NetworkSchema,
  })
  .partial()
  .strict();

export type WardenConfig = z.infer<typeof ConfigSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// ─── Loading ────────────────────────────────────────────────

export interface LoadConfigOptions {
  /** Explicit file from --config; must exist */
  file?: string;
  /** Used when no file is given; may be absent */
  defaultPath?: string;
}

export interface LoadedConfig {
  config: WardenConfig;
  /** File the config came from, null when only defaults apply */
  source: string | null;
}

/**
 * Read and validate the YAML config.
 *
 * @throws ConfigError for a missing explicit file, bad YAML, schema
 *   violations or unknown ${VAR} references
 */
export function loadConfig(opts: LoadConfigOptions = {}): LoadedConfig {
  const filePath = opts.file ? path.resolve(opts.file) : opts.defaultPath ?? paths.config;

  if (!fs.existsSync(filePath)) {
    if (opts.file) throw new ConfigError(`Config file not found: ${filePath}`);
    return { config: {}, source: null };
  }

  let raw: unknown;
  try {
    raw = parseYaml(fs.readFileSync(filePath, "utf-8"));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid YAML in ${filePath}: ${msg}`);
  }

  // An empty file parses to null
  const parsed = ConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config in ${filePath}: ${issues}`);
  }

  const problems = checkVariables(parsed.data);
  if (problems.length > 0) {
    throw new ConfigError(`Invalid config in ${filePath}: ${problems.join("; ")}`);
  }

  return { config: parsed.data, source: filePath };
}

/** ${ARCH} is only known once the host is inspected */
function checkVariables(config: WardenConfig): string[] {
  const fields: [string, string | undefined, string[]][] = [
    ["staging_dir", config.staging_dir, []],
    ["tool.fallback_path", config.tool?.fallback_path, ["ARCH"]],
    ["runtime.installer_url", config.runtime?.installer_url, ["ARCH"]],
  ];

  const problems: string[] = [];
  for (const [key, value, allowed] of fields) {
    if (value === undefined) continue;
    for (const error of validateVariables(value, allowed)) {
      problems.push(`${key}: ${error}`);
    }
  }
  return problems;
}

// ─── Environment ────────────────────────────────────────────

/**
 * Layer WINGET_WARDEN_STAGING_DIR, WINGET_WARDEN_FEED_URL and GITHUB_TOKEN
 * over the file config. Empty variables are ignored.
 */
export function applyEnvOverrides(
  config: WardenConfig,
  env: NodeJS.ProcessEnv = process.env,
): WardenConfig {
  const result: WardenConfig = { ...config };

  if (env.WINGET_WARDEN_STAGING_DIR) {
    result.staging_dir = env.WINGET_WARDEN_STAGING_DIR;
  }
  if (env.WINGET_WARDEN_FEED_URL) {
    result.tool = { ...config.tool, feed_url: env.WINGET_WARDEN_FEED_URL };
  }
  if (env.GITHUB_TOKEN) {
    result.network = { ...config.network, token: env.GITHUB_TOKEN };
  }

  return result;
}

// ─── Reconciler Options ─────────────────────────────────────

export interface RunFlags {
  dryRun: boolean;
  force: boolean;
  verbose: boolean;
}

/**
 * Build ReconcilerOptions from the config and command flags.
 */
export function toReconcilerOptions(
  config: WardenConfig,
  flags: RunFlags,
): ReconcilerOptions {
  let stagingDir: string;
  try {
    stagingDir = resolveVariables(config.staging_dir ?? paths.staging);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`staging_dir: ${msg}`);
  }

  return resolveOptions({
    staging_dir: stagingDir,
    tool: config.tool,
    runtime: config.runtime,
    registration: config.registration,
    min_os_build: config.min_os_build,
    require_elevation: config.require_elevation,
    timeout_ms: config.network?.timeout_ms,
    token: config.network?.token,
    dry_run: flags.dryRun,
    force: flags.force,
    verbose: flags.verbose,
  });
}

/**
 * Everything a command needs: config file, environment, then flags.
 */
export function getReconcilerOptions(
  configFile: string | undefined,
  flags: RunFlags,
): ReconcilerOptions {
  const { config } = loadConfig({ file: configFile });
  return toReconcilerOptions(applyEnvOverrides(config), flags);
}
