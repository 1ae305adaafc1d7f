/**
 * Warden Engine — Path Variable Resolution
 *
 * Configured paths and URLs use variables like ${PROGRAMFILES} or ${ARCH}
 * instead of hardcoded values. This module resolves them.
 */

import * as path from "path";
import * as os from "os";

/**
 * Map of supported variables to their resolved values.
 * Computed on every call so environment changes are picked up.
 */
function getVariableMap(): Record<string, string> {
  const env = process.env;
  const home = os.homedir();
  const localAppData = env.LOCALAPPDATA || path.join(home, "AppData", "Local");

  return {
    LOCALAPPDATA: localAppData,
    APPDATA: env.APPDATA || path.join(home, "AppData", "Roaming"),
    USERPROFILE: env.USERPROFILE || home,
    PROGRAMFILES: env.PROGRAMFILES || "C:\\Program Files",
    PROGRAMFILES_X86: env["PROGRAMFILES(X86)"] || "C:\\Program Files (x86)",
    PROGRAMDATA: env.PROGRAMDATA || "C:\\ProgramData",
    SYSTEMROOT: env.SYSTEMROOT || "C:\\Windows",
    TEMP: env.TEMP || os.tmpdir(),
  };
}

/**
 * Resolve all ${VARIABLE} references in a string.
 *
 * `extra` adds or overrides variables for this call only
 * (the reconciler passes { ARCH: "x64" } this way).
 *
 * @throws Error if an unknown variable is referenced
 *
 * @example
 * resolveVariables("https://aka.ms/vs/17/release/vc_redist.${ARCH}.exe", { ARCH: "x64" })
 * // → "https://aka.ms/vs/17/release/vc_redist.x64.exe"
 */
export function resolveVariables(
  input: string,
  extra: Record<string, string> = {},
): string {
  const variables = { ...getVariableMap(), ...extra };

  return input.replace(/\$\{([A-Z_0-9]+)\}/g, (_match, varName: string) => {
    const value = variables[varName];
    if (value === undefined) {
      throw new Error(
        `Unknown variable: \${${varName}}. ` +
          `Supported variables: ${Object.keys(variables).join(", ")}`,
      );
    }
    return value;
  });
}

/**
 * List unknown variables in a string without resolving it.
 * `allowed` names variables that are only known at run time (e.g. ARCH).
 */
export function validateVariables(
  input: string,
  allowed: string[] = [],
): string[] {
  const known = new Set([...Object.keys(getVariableMap()), ...allowed]);
  const errors: string[] = [];

  const pattern = /\$\{([A-Z_0-9]+)\}/g;
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(input)) !== null) {
    if (!known.has(match[1])) {
      errors.push(`Unknown variable: \${${match[1]}}`);
    }
  }

  return errors;
}
