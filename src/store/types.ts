import { RunSummary } from "../types";

export type RunStatus = "completed" | "cancelled" | "failed";

export interface IndexedDownload {
  url: string;
  filePath: string;
  sha256: string;
  bytes: number;
  contentType?: string;
  jobQuery: string;
  site: string;
  candidateTitle: string;
  runId: string;
  downloadedAt: string;
}

export interface StoreStats {
  totalDownloads: number;
  totalBytes: number;
  totalRuns: number;
  lastRun?: {
    runId: string;
    status: RunStatus | "running";
    startedAt: string;
    finishedAt?: string;
  };
}

/** Cross-run memory of fetched attachments, keyed by URL and by content hash. */
export interface DownloadIndexStore {
  /** Dry runs record no run row. */
  startRun(runId: string, startedAt: string): Promise<void>;
  finishRun(runId: string, status: RunStatus, finishedAt: string, summary?: RunSummary): Promise<void>;
  findByUrl(url: string): Promise<IndexedDownload | undefined>;
  findBySha256(sha256: string): Promise<IndexedDownload | undefined>;
  recordDownload(entry: IndexedDownload): Promise<void>;
  getStats(): Promise<StoreStats>;
  close(): Promise<void>;
}
