#!/usr/bin/env node

/**
 * Warden CLI — Entry Point
 *
 * Keeps winget installed and current on a Windows machine.
 *
 * Commands:
 *   winget-warden [sync]       Install or update to the latest release (default)
 *   winget-warden check        Compare installed vs. latest, change nothing
 *   winget-warden where        Print the located executable
 *
 * Global options:
 *   --config <file>            YAML config (default ~/.winget-warden/config.yaml)
 *   --debug                    Debug output and engine logs
 */

import { buildProgram } from "./program";

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
