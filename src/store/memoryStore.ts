import { RunSummary } from "../types";
import { DownloadIndexStore, IndexedDownload, RunStatus, StoreStats } from "./types";

interface RunRow {
  runId: string;
  status: RunStatus | "running";
  startedAt: string;
  finishedAt?: string;
  summary?: RunSummary;
}

export class InMemoryStore implements DownloadIndexStore {
  private readonly downloads = new Map<string, IndexedDownload>();
  private readonly runs: RunRow[] = [];

  async startRun(runId: string, startedAt: string): Promise<void> {
    this.runs.push({ runId, status: "running", startedAt });
  }

  async finishRun(runId: string, status: RunStatus, finishedAt: string, summary?: RunSummary): Promise<void> {
    const run = this.runs.find((item) => item.runId === runId);
    if (run) {
      run.status = status;
      run.finishedAt = finishedAt;
      run.summary = summary;
    }
  }

  async findByUrl(url: string): Promise<IndexedDownload | undefined> {
    return this.downloads.get(url);
  }

  async findBySha256(sha256: string): Promise<IndexedDownload | undefined> {
    for (const entry of this.downloads.values()) {
      if (entry.sha256 === sha256) {
        return entry;
      }
    }
    return undefined;
  }

  async recordDownload(entry: IndexedDownload): Promise<void> {
    this.downloads.set(entry.url, { ...entry });
  }

  async getStats(): Promise<StoreStats> {
    let totalBytes = 0;
    for (const entry of this.downloads.values()) {
      totalBytes += entry.bytes;
    }
    const lastRun = this.runs[this.runs.length - 1];
    return {
      totalDownloads: this.downloads.size,
      totalBytes,
      totalRuns: this.runs.length,
      lastRun: lastRun
        ? { runId: lastRun.runId, status: lastRun.status, startedAt: lastRun.startedAt, finishedAt: lastRun.finishedAt }
        : undefined,
    };
  }

  async close(): Promise<void> {
    return;
  }
}
