/**
 * Warden Engine — Windows Pipeline Types
 */

// ─── Installer Exit Codes ──────────────────────────────────────

export interface InstallerExitCodeInfo {
  code: number;
  name: string;
  category: "success" | "args" | "permission" | "fatal" | "busy" | "unknown";
  message: string;
  /** Whether this code still counts as a successful install */
  ok: boolean;
}

/**
 * Exit codes returned by the redistributable's bootstrapper.
 * It reuses the Windows Installer codes.
 * See: https://learn.microsoft.com/en-us/windows/win32/msi/error-codes
 */
export const INSTALLER_EXIT_CODES: Record<number, InstallerExitCodeInfo> = {
  0: {
    code: 0,
    name: "ERROR_SUCCESS",
    category: "success",
    message: "Installation completed successfully.",
    ok: true,
  },
  5: {
    code: 5,
    name: "ERROR_ACCESS_DENIED",
    category: "permission",
    message: "Access denied. Run from an elevated terminal.",
    ok: false,
  },
  1602: {
    code: 1602,
    name: "ERROR_INSTALL_USEREXIT",
    category: "fatal",
    message: "User cancelled the installation.",
    ok: false,
  },
  1603: {
    code: 1603,
    name: "ERROR_INSTALL_FAILURE",
    category: "fatal",
    message: "Fatal error during installation.",
    ok: false,
  },
  1618: {
    code: 1618,
    name: "ERROR_INSTALL_ALREADY_RUNNING",
    category: "busy",
    message: "Another installation is already in progress.",
    ok: false,
  },
  1638: {
    code: 1638,
    name: "ERROR_PRODUCT_VERSION",
    category: "success",
    message: "Another version of this product is already installed.",
    ok: true,
  },
  1639: {
    code: 1639,
    name: "ERROR_INVALID_COMMAND_LINE",
    category: "args",
    message: "Invalid command-line argument passed to the installer.",
    ok: false,
  },
  1641: {
    code: 1641,
    name: "ERROR_SUCCESS_REBOOT_INITIATED",
    category: "success",
    message: "Installation succeeded. A system restart was initiated.",
    ok: true,
  },
  3010: {
    code: 3010,
    name: "ERROR_SUCCESS_REBOOT_REQUIRED",
    category: "success",
    message: "Installation succeeded. A system restart is required.",
    ok: true,
  },
};

export function lookupInstallerExitCode(code: number): InstallerExitCodeInfo {
  return (
    INSTALLER_EXIT_CODES[code] ?? {
      code,
      name: "UNKNOWN",
      category: "unknown" as const,
      message: `Unrecognised installer exit code: ${code}`,
      ok: false,
    }
  );
}
