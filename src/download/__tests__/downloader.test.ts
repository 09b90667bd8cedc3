import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createFakeHttp, createTempDir, createTestConfig, createTestLogger, createTestMetrics, removeDir } from "../../__tests__/helpers";
import { AppConfig } from "../../config";
import { ConcurrencyLimiter } from "../../core/concurrency";
import { HttpClient } from "../../core/fetch";
import { InMemoryStore } from "../../store";
import { Attachment, Candidate, Job } from "../../types";
import { downloadAttachment, DownloadContext, DownloaderDeps } from "../downloader";
import { candidateDirectory } from "../paths";

const job: Job = { query: "budget", siteUrl: "https://example.gov/list", baselineDate: new Date(Date.UTC(2024, 11, 1)) };
const candidate: Candidate = {
  title: "Budget notice",
  rawDate: "2025-02-01",
  parsedDate: new Date(Date.UTC(2025, 1, 1)),
  detailLink: "https://example.gov/notice/1.html",
};
const attachment: Attachment = {
  url: "https://example.gov/files/report.pdf",
  inferredFilename: "report.pdf",
  extension: "pdf",
};
const context: DownloadContext = { runId: "run_test", job, candidate, title: "Budget notice", host: "example.gov" };

describe("downloadAttachment", () => {
  let rootDir: string;
  let config: AppConfig;
  let store: InMemoryStore;

  beforeEach(() => {
    rootDir = createTempDir();
    config = createTestConfig(rootDir);
    store = new InMemoryStore();
  });

  afterEach(() => {
    removeDir(rootDir);
  });

  function deps(httpClient: HttpClient): DownloaderDeps {
    return {
      config,
      logger: createTestLogger(),
      metrics: createTestMetrics(),
      store,
      pool: new ConcurrencyLimiter(2),
      httpClient,
    };
  }

  const expectedPath = (): string =>
    path.join(rootDir, "downloads", "example.gov", "budget", "20250201_Budget notice_10e10d75", "report.pdf");

  it("writes the file under host, query and dated title", async () => {
    const http = createFakeHttp({ [attachment.url]: { body: "%PDF-1.4 test", contentType: "application/pdf" } });
    const outcome = await downloadAttachment(attachment, context, deps(http.client));

    expect(outcome).toMatchObject({
      kind: "attachment",
      status: "success",
      reason: "downloaded",
      filePath: expectedPath(),
      attachmentFilename: "report.pdf",
      candidateDate: "20250201",
    });
    expect(fs.readFileSync(expectedPath(), "utf-8")).toBe("%PDF-1.4 test");
    expect(fs.existsSync(`${expectedPath()}.part`)).toBe(false);
    expect((await store.findByUrl(attachment.url))?.bytes).toBe(13);
  });

  it("reports an existing file as already present without a request", async () => {
    fs.mkdirSync(path.dirname(expectedPath()), { recursive: true });
    fs.writeFileSync(expectedPath(), "old copy");
    const http = createFakeHttp({});

    const outcome = await downloadAttachment(attachment, context, deps(http.client));

    expect(outcome).toMatchObject({ status: "success", reason: "already present", filePath: expectedPath() });
    expect(http.calls).toHaveLength(0);
    expect(fs.readFileSync(expectedPath(), "utf-8")).toBe("old copy");
  });

  it("skips URLs the index already holds", async () => {
    await store.recordDownload({
      url: attachment.url,
      filePath: "/synced/elsewhere/report.pdf",
      sha256: "abc",
      bytes: 3,
      jobQuery: "budget",
      site: "example.gov",
      candidateTitle: "Budget notice",
      runId: "run_earlier",
      downloadedAt: "2025-01-01T00:00:00.000Z",
    });
    const http = createFakeHttp({});

    const outcome = await downloadAttachment(attachment, context, deps(http.client));

    expect(outcome).toMatchObject({ status: "success", reason: "already downloaded", filePath: "/synced/elsewhere/report.pdf" });
    expect(http.calls).toHaveLength(0);
  });

  it("classifies 403 as forbidden without retrying", async () => {
    const http = createFakeHttp({ [attachment.url]: { status: 403, body: "denied", contentType: "text/plain" } });

    const outcome = await downloadAttachment(attachment, context, deps(http.client));

    expect(outcome).toMatchObject({ status: "failure", errorKind: "forbidden", reason: "HTTP 403" });
    expect(http.calls).toHaveLength(1);
    expect(fs.existsSync(expectedPath())).toBe(false);
  });

  it("treats an HTML page in place of a file as forbidden", async () => {
    const http = createFakeHttp({ [attachment.url]: { body: "<html>login</html>", contentType: "text/html" } });

    const outcome = await downloadAttachment(attachment, context, deps(http.client));

    expect(outcome).toMatchObject({ status: "failure", errorKind: "forbidden" });
    expect(fs.existsSync(expectedPath())).toBe(false);
  });

  it("retries server errors and reports them as network failures", async () => {
    const http = createFakeHttp({ [attachment.url]: { status: 502, body: "bad gateway", contentType: "text/plain" } });

    const outcome = await downloadAttachment(attachment, context, deps(http.client));

    expect(outcome).toMatchObject({ status: "failure", errorKind: "network", reason: "HTTP 502" });
    expect(http.calls).toHaveLength(2);
  });

  it("drops a second copy of content the index already has", async () => {
    const other: Attachment = { url: "https://example.gov/mirror/copy.pdf", inferredFilename: "copy.pdf", extension: "pdf" };
    const http = createFakeHttp({
      [attachment.url]: { body: "same bytes", contentType: "application/pdf" },
      [other.url]: { body: "same bytes", contentType: "application/pdf" },
    });

    await downloadAttachment(attachment, context, deps(http.client));
    const outcome = await downloadAttachment(other, context, deps(http.client));

    expect(outcome).toMatchObject({ status: "success", reason: "duplicate content", filePath: expectedPath() });
    expect(fs.existsSync(path.join(path.dirname(expectedPath()), "copy.pdf"))).toBe(false);
    expect((await store.findByUrl(other.url))?.filePath).toBe(expectedPath());
  });
});

describe("candidateDirectory", () => {
  it("sanitizes every segment and marks unknown dates", () => {
    expect(candidateDirectory("/data", "example.gov", "a/b", null, 'Notice: "draft"', "https://example.gov/n/2")).toBe(
      path.resolve("/data", "example.gov", "ab", "unknown_date_Notice draft_854dcf93"),
    );
  });

  it("separates same-titled candidates of one day by their detail link", () => {
    const day = new Date(Date.UTC(2025, 1, 1));
    const first = candidateDirectory("/data", "example.gov", "budget", day, "Notice", "https://example.gov/notice/a.html");
    const second = candidateDirectory("/data", "example.gov", "budget", day, "Notice", "https://example.gov/notice/b.html");

    expect(first).toBe(path.resolve("/data", "example.gov", "budget", "20250201_Notice_93e10d07"));
    expect(second).toBe(path.resolve("/data", "example.gov", "budget", "20250201_Notice_3fdbd91e"));
  });
});
