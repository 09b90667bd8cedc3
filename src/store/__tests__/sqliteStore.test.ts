import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createTempDir, removeDir } from "../../__tests__/helpers";
import { InMemoryStore } from "../memoryStore";
import { SqliteStore } from "../sqliteStore";
import { DownloadIndexStore, IndexedDownload } from "../types";

function entry(url: string, sha256: string, bytes: number): IndexedDownload {
  return {
    url,
    filePath: `/downloads/${path.basename(url)}`,
    sha256,
    bytes,
    contentType: "application/pdf",
    jobQuery: "budget",
    site: "example.gov",
    candidateTitle: "Notice",
    runId: "run_1",
    downloadedAt: "2025-02-01T00:00:00.000Z",
  };
}

async function exerciseStore(store: DownloadIndexStore): Promise<void> {
  await store.startRun("run_1", "2025-02-01T00:00:00.000Z");
  await store.recordDownload(entry("https://example.gov/a.pdf", "sha-a", 10));
  await store.recordDownload(entry("https://example.gov/b.pdf", "sha-b", 5));
  await store.finishRun("run_1", "completed", "2025-02-01T00:05:00.000Z");

  expect(await store.findByUrl("https://example.gov/a.pdf")).toEqual(entry("https://example.gov/a.pdf", "sha-a", 10));
  expect(await store.findByUrl("https://example.gov/missing.pdf")).toBeUndefined();
  expect((await store.findBySha256("sha-b"))?.url).toBe("https://example.gov/b.pdf");
  expect(await store.getStats()).toEqual({
    totalDownloads: 2,
    totalBytes: 15,
    totalRuns: 1,
    lastRun: {
      runId: "run_1",
      status: "completed",
      startedAt: "2025-02-01T00:00:00.000Z",
      finishedAt: "2025-02-01T00:05:00.000Z",
    },
  });
}

describe("SqliteStore", () => {
  let rootDir: string;

  beforeEach(() => {
    rootDir = createTempDir();
  });

  afterEach(() => {
    removeDir(rootDir);
  });

  it("indexes downloads by URL and hash", async () => {
    const store = new SqliteStore(path.join(rootDir, "nested", "index.sqlite"));
    try {
      await exerciseStore(store);
    } finally {
      await store.close();
    }
  });

  it("keeps the index across reopen", async () => {
    const dbPath = path.join(rootDir, "index.sqlite");
    const first = new SqliteStore(dbPath);
    await first.recordDownload(entry("https://example.gov/a.pdf", "sha-a", 10));
    await first.close();

    const second = new SqliteStore(dbPath);
    try {
      expect((await second.findByUrl("https://example.gov/a.pdf"))?.sha256).toBe("sha-a");
    } finally {
      await second.close();
    }
  });

  it("reports empty statistics for a fresh index", async () => {
    const store = new SqliteStore(path.join(rootDir, "fresh.sqlite"));
    try {
      expect(await store.getStats()).toEqual({ totalDownloads: 0, totalBytes: 0, totalRuns: 0, lastRun: undefined });
    } finally {
      await store.close();
    }
  });
});

describe("InMemoryStore", () => {
  it("behaves like the SQLite index", async () => {
    await exerciseStore(new InMemoryStore());
  });
});
