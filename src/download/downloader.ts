import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { AppConfig } from "../config";
import { ConcurrencyLimiter } from "../core/concurrency";
import { classifyHttpStatus, classifyNetworkError, DownloadError, toErrorMessage } from "../core/errors";
import { defaultHttpClient, getFetchDispatcher, HttpClient } from "../core/fetch";
import { withRetry } from "../core/retry";
import { sanitizeFilename } from "../crawl/detailParser";
import { buildOutcome } from "../ledger/outcome";
import { Logger, MetricsRegistry } from "../observability";
import { DownloadIndexStore } from "../store";
import { Attachment, Candidate, Job, OutcomeRecord } from "../types";
import { candidateDirectory } from "./paths";

export interface DownloaderDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  store: DownloadIndexStore;
  pool: ConcurrencyLimiter;
  httpClient?: HttpClient;
}

export interface DownloadContext {
  runId: string;
  job: Job;
  candidate: Candidate;
  /** Detail page title, used for the candidate directory. */
  title: string;
  host: string;
}

interface AttemptResult {
  sha256: string;
  bytes: number;
  contentType?: string;
}

const HTML_MIME_TYPES = new Set(["text/html", "application/xhtml+xml"]);

async function removeIfExists(filePath: string): Promise<void> {
  await fs.promises.rm(filePath, { force: true });
}

async function downloadAttempt(
  url: string,
  outputPath: string,
  extension: string,
  config: AppConfig,
  httpClient: HttpClient,
): Promise<AttemptResult> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), config.downloadTimeoutMs);
  const tempPath = `${outputPath}.part`;

  try {
    const response = await httpClient(url, {
      method: "GET",
      headers: {
        "user-agent": config.userAgent,
        accept: "*/*",
      },
      dispatcher: getFetchDispatcher(config.ignoreHttpsErrors),
      signal: controller.signal,
      redirect: "follow",
    });

    if (!response.ok) {
      await response.body?.cancel();
      throw new DownloadError(`HTTP ${response.status}`, {
        url,
        statusCode: response.status,
        ...classifyHttpStatus(response.status),
      });
    }

    const contentType = response.headers.get("content-type") ?? undefined;
    const mime = contentType?.split(";")[0].trim().toLowerCase();
    if (mime && HTML_MIME_TYPES.has(mime) && extension !== "html" && extension !== "htm") {
      // usually a login or error page served with 200
      await response.body?.cancel();
      throw new DownloadError(`Received HTML page instead of .${extension} file`, {
        url,
        statusCode: response.status,
        category: "forbidden",
        retryable: false,
      });
    }

    if (!response.body) {
      throw new DownloadError("Empty response body", { url, category: "unknown", retryable: false });
    }

    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    const hash = crypto.createHash("sha256");
    let bytes = 0;

    const writable = fs.createWriteStream(tempPath, { flags: "w" });
    const readable = Readable.fromWeb(response.body);
    readable.on("data", (chunk: Uint8Array) => {
      hash.update(chunk);
      bytes += chunk.byteLength;
    });

    try {
      await pipeline(readable, writable);
      await fs.promises.rename(tempPath, outputPath);
    } catch (error) {
      await removeIfExists(tempPath);
      throw error;
    }

    return { sha256: hash.digest("hex"), bytes, contentType };
  } catch (error) {
    if (error instanceof DownloadError) {
      throw error;
    }
    throw new DownloadError(`Download failed: ${toErrorMessage(error)}`, {
      url,
      cause: error,
      ...classifyNetworkError(error),
    });
  } finally {
    clearTimeout(timeout);
  }
}

/**
 * Fetches one attachment into the candidate directory and reports the outcome.
 * Never throws: every failure comes back as a classified failure record.
 */
export async function downloadAttachment(
  attachment: Attachment,
  context: DownloadContext,
  deps: DownloaderDeps,
): Promise<OutcomeRecord> {
  const { config, logger, metrics, store } = deps;
  const httpClient = deps.httpClient ?? defaultHttpClient;
  const { runId, job, candidate, host } = context;
  const directory = candidateDirectory(
    config.downloadRoot,
    host,
    job.query,
    candidate.parsedDate,
    context.title,
    candidate.detailLink,
  );
  const filename = sanitizeFilename(attachment.inferredFilename, `attachment.${attachment.extension}`);
  const filePath = path.join(directory, filename);
  const base = {
    runId,
    kind: "attachment" as const,
    job,
    site: host,
    candidate,
    attachmentUrl: attachment.url,
    attachmentFilename: filename,
  };

  if (fs.existsSync(filePath)) {
    metrics.incrementCounter("downloads_already_present", 1);
    logger.info("download_item_skipped", { url: attachment.url, filePath, reason: "already present" });
    return buildOutcome({ ...base, status: "success", filePath, reason: "already present" });
  }

  const indexed = await store.findByUrl(attachment.url);
  if (indexed) {
    metrics.incrementCounter("downloads_already_present", 1);
    logger.info("download_item_skipped", { url: attachment.url, filePath: indexed.filePath, reason: "already downloaded" });
    return buildOutcome({ ...base, status: "success", filePath: indexed.filePath, reason: "already downloaded" });
  }

  const stopTimer = metrics.startTimer("download_ms");
  try {
    const result = await withRetry(
      (attempt) =>
        deps.pool.run(() => {
          logger.debug("download_item_attempt_start", { url: attachment.url, attempt });
          return downloadAttempt(attachment.url, filePath, attachment.extension, config, httpClient);
        }),
      { maxRetries: config.maxFetchRetries, baseDelayMs: config.retryBaseDelayMs },
      {
        isRetryable: (error) => error instanceof DownloadError && error.retryable,
        onRetry: (error, attempt, delayMs) => {
          logger.warn("download_item_retry", { url: attachment.url, attempt, delayMs, error: toErrorMessage(error) });
        },
      },
    );
    const durationMs = stopTimer();

    const duplicate = await store.findBySha256(result.sha256);
    if (duplicate && duplicate.filePath !== filePath && fs.existsSync(duplicate.filePath)) {
      await removeIfExists(filePath);
      await store.recordDownload({
        ...duplicate,
        url: attachment.url,
        jobQuery: job.query,
        site: host,
        candidateTitle: candidate.title,
        runId,
        downloadedAt: new Date().toISOString(),
      });
      metrics.incrementCounter("downloads_already_present", 1);
      logger.info("download_item_duplicate", { url: attachment.url, filePath: duplicate.filePath, sha256: result.sha256 });
      return buildOutcome({ ...base, status: "success", filePath: duplicate.filePath, reason: "duplicate content" });
    }

    await store.recordDownload({
      url: attachment.url,
      filePath,
      sha256: result.sha256,
      bytes: result.bytes,
      contentType: result.contentType,
      jobQuery: job.query,
      site: host,
      candidateTitle: candidate.title,
      runId,
      downloadedAt: new Date().toISOString(),
    });
    metrics.incrementCounter("downloads_ok", 1);
    logger.info("download_item_ok", { url: attachment.url, filePath, bytes: result.bytes, durationMs });
    return buildOutcome({ ...base, status: "success", filePath, reason: "downloaded" });
  } catch (error) {
    const durationMs = stopTimer();
    const { category } = classifyNetworkError(error);
    metrics.incrementCounter("downloads_failed", 1);
    logger.warn("download_item_failed", {
      url: attachment.url,
      durationMs,
      errorKind: category,
      error: toErrorMessage(error),
    });
    return buildOutcome({
      ...base,
      status: "failure",
      filePath,
      reason: toErrorMessage(error),
      errorKind: category,
    });
  }
}
