/**
 * Warden Engine — Step Context
 *
 * What the install steps share: the host, the downloader, the staging
 * directory and the callbacks the reconciler turns into events.
 */

import { HostAdapter } from "./host";
import { DownloadFn, ProgressCallback } from "./downloader";
import { ReconcileState } from "./types";
import { Logger } from "./utils/logger";

export interface StepContext {
  host: HostAdapter;
  download: DownloadFn;
  logger: Logger;
  stagingDir: string;
  timeoutMs: number;
  dryRun: boolean;
  onStage?: (state: ReconcileState, message?: string) => void;
  onProgress?: ProgressCallback;
}
