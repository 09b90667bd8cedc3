import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { RunSummary } from "../types";
import { DownloadIndexStore, IndexedDownload, RunStatus, StoreStats } from "./types";

type DownloadRow = {
  url: string;
  filePath: string;
  sha256: string;
  bytes: number;
  contentType: string | null;
  jobQuery: string;
  site: string;
  candidateTitle: string;
  runId: string;
  downloadedAt: string;
};

type RunRow = {
  runId: string;
  status: RunStatus | "running";
  startedAt: string;
  finishedAt: string | null;
};

type TotalsRow = {
  totalDownloads: number;
  totalBytes: number | null;
};

type CountRow = {
  total: number;
};

function toIndexedDownload(row: DownloadRow): IndexedDownload {
  return {
    url: row.url,
    filePath: row.filePath,
    sha256: row.sha256,
    bytes: row.bytes,
    contentType: row.contentType ?? undefined,
    jobQuery: row.jobQuery,
    site: row.site,
    candidateTitle: row.candidateTitle,
    runId: row.runId,
    downloadedAt: row.downloadedAt,
  };
}

export class SqliteStore implements DownloadIndexStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    const absolutePath = path.resolve(dbPath);
    fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
    this.db = new Database(absolutePath);
    this.db.pragma("journal_mode = WAL");
    this.initializeSchema();
  }

  async startRun(runId: string, startedAt: string): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO runs (runId, startedAt, finishedAt, status)
        VALUES (@runId, @startedAt, NULL, 'running')
        ON CONFLICT(runId) DO UPDATE SET
          startedAt = excluded.startedAt,
          finishedAt = NULL,
          status = 'running'
      `,
      )
      .run({ runId, startedAt });
  }

  async finishRun(runId: string, status: RunStatus, finishedAt: string, summary?: RunSummary): Promise<void> {
    this.db
      .prepare(
        `
        UPDATE runs
        SET
          status = @status,
          finishedAt = @finishedAt,
          summaryJson = @summaryJson
        WHERE runId = @runId
      `,
      )
      .run({
        runId,
        status,
        finishedAt,
        summaryJson: summary ? JSON.stringify(summary) : null,
      });
  }

  async findByUrl(url: string): Promise<IndexedDownload | undefined> {
    const row = this.db
      .prepare<[string], DownloadRow>(
        `
        SELECT url, filePath, sha256, bytes, contentType, jobQuery, site, candidateTitle, runId, downloadedAt
        FROM downloads
        WHERE url = ?
      `,
      )
      .get(url);
    return row ? toIndexedDownload(row) : undefined;
  }

  async findBySha256(sha256: string): Promise<IndexedDownload | undefined> {
    const row = this.db
      .prepare<[string], DownloadRow>(
        `
        SELECT url, filePath, sha256, bytes, contentType, jobQuery, site, candidateTitle, runId, downloadedAt
        FROM downloads
        WHERE sha256 = ?
        ORDER BY downloadedAt ASC
        LIMIT 1
      `,
      )
      .get(sha256);
    return row ? toIndexedDownload(row) : undefined;
  }

  async recordDownload(entry: IndexedDownload): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO downloads (
          url, filePath, sha256, bytes, contentType, jobQuery, site, candidateTitle, runId, downloadedAt
        )
        VALUES (
          @url, @filePath, @sha256, @bytes, @contentType, @jobQuery, @site, @candidateTitle, @runId, @downloadedAt
        )
        ON CONFLICT(url) DO UPDATE SET
          filePath = excluded.filePath,
          sha256 = excluded.sha256,
          bytes = excluded.bytes,
          contentType = excluded.contentType,
          jobQuery = excluded.jobQuery,
          site = excluded.site,
          candidateTitle = excluded.candidateTitle,
          runId = excluded.runId,
          downloadedAt = excluded.downloadedAt
      `,
      )
      .run({
        ...entry,
        contentType: entry.contentType ?? null,
      });
  }

  async getStats(): Promise<StoreStats> {
    const totals = this.db
      .prepare<[], TotalsRow>(`SELECT COUNT(*) AS totalDownloads, SUM(bytes) AS totalBytes FROM downloads`)
      .get();
    const runs = this.db.prepare<[], CountRow>(`SELECT COUNT(*) AS total FROM runs`).get();
    const lastRun = this.db
      .prepare<[], RunRow>(
        `
        SELECT runId, status, startedAt, finishedAt
        FROM runs
        ORDER BY startedAt DESC
        LIMIT 1
      `,
      )
      .get();

    return {
      totalDownloads: totals?.totalDownloads ?? 0,
      totalBytes: totals?.totalBytes ?? 0,
      totalRuns: runs?.total ?? 0,
      lastRun: lastRun
        ? {
            runId: lastRun.runId,
            status: lastRun.status,
            startedAt: lastRun.startedAt,
            finishedAt: lastRun.finishedAt ?? undefined,
          }
        : undefined,
    };
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS downloads (
        url TEXT PRIMARY KEY,
        filePath TEXT NOT NULL,
        sha256 TEXT NOT NULL,
        bytes INTEGER NOT NULL,
        contentType TEXT,
        jobQuery TEXT NOT NULL,
        site TEXT NOT NULL,
        candidateTitle TEXT NOT NULL,
        runId TEXT NOT NULL,
        downloadedAt TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_downloads_sha256 ON downloads (sha256);

      CREATE TABLE IF NOT EXISTS runs (
        runId TEXT PRIMARY KEY,
        startedAt TEXT NOT NULL,
        finishedAt TEXT,
        status TEXT NOT NULL,
        summaryJson TEXT
      );
    `);
  }
}
