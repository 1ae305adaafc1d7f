/**
 * Warden Engine — Step Results
 *
 * Every reconciler operation reports success or failure as a value.
 * Exceptions from collaborators are caught at the operation boundary and
 * turned into a ReconcileError here.
 */

import {
  ErrorCategory,
  ReconcileError,
  ReconcileState,
  StepResult,
} from "./types";

export function succeed<T>(value: T): StepResult<T> {
  return { ok: true, value };
}

export function fail<T>(
  category: ErrorCategory,
  message: string,
  state: ReconcileState,
  options: { fatal?: boolean; details?: Record<string, unknown> } = {},
): StepResult<T> {
  const error: ReconcileError = {
    category,
    message,
    state,
    fatal: options.fatal ?? false,
  };
  if (options.details) error.details = options.details;
  return { ok: false, error };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
