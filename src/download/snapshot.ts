import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { toErrorMessage } from "../core/errors";
import { htmlToMarkdown } from "../crawl/snapshot";
import { sanitizeFilename } from "../crawl/detailParser";
import { buildOutcome } from "../ledger/outcome";
import { OutcomeRecord } from "../types";
import { DownloadContext, DownloaderDeps } from "./downloader";
import { candidateDirectory } from "./paths";

export type SnapshotDeps = Pick<DownloaderDeps, "config" | "logger" | "metrics" | "store">;

export interface SnapshotOptions {
  markdown: boolean;
}

interface SnapshotFile {
  format: "html" | "markdown";
  filePath: string;
  content: string;
  contentType: string;
}

/** Index key of a snapshot: the detail URL plus a fragment naming the format. */
export function snapshotIndexUrl(detailLink: string, format: SnapshotFile["format"]): string {
  return `${detailLink}#snapshot.${format === "html" ? "html" : "md"}`;
}

async function writeSnapshotFile(file: SnapshotFile, context: DownloadContext, deps: SnapshotDeps): Promise<OutcomeRecord> {
  const { logger, metrics, store } = deps;
  const { runId, job, candidate, host } = context;
  const indexUrl = snapshotIndexUrl(candidate.detailLink, file.format);
  const base = {
    runId,
    kind: "snapshot" as const,
    job,
    site: host,
    candidate,
    attachmentFilename: path.basename(file.filePath),
  };

  try {
    if (fs.existsSync(file.filePath)) {
      logger.info("snapshot_skipped", { url: candidate.detailLink, filePath: file.filePath, reason: "already present" });
      return buildOutcome({ ...base, status: "success", filePath: file.filePath, reason: "already present" });
    }

    const indexed = await store.findByUrl(indexUrl);
    if (indexed) {
      logger.info("snapshot_skipped", { url: candidate.detailLink, filePath: indexed.filePath, reason: "already downloaded" });
      return buildOutcome({ ...base, status: "success", filePath: indexed.filePath, reason: "already downloaded" });
    }

    const sha256 = crypto.createHash("sha256").update(file.content).digest("hex");
    const duplicate = await store.findBySha256(sha256);
    if (duplicate && fs.existsSync(duplicate.filePath)) {
      logger.info("snapshot_duplicate", { url: candidate.detailLink, filePath: duplicate.filePath, sha256 });
      return buildOutcome({ ...base, status: "success", filePath: duplicate.filePath, reason: "duplicate content" });
    }

    const tempPath = `${file.filePath}.part`;
    await fs.promises.mkdir(path.dirname(file.filePath), { recursive: true });
    await fs.promises.writeFile(tempPath, file.content, "utf-8");
    await fs.promises.rename(tempPath, file.filePath);
    await store.recordDownload({
      url: indexUrl,
      filePath: file.filePath,
      sha256,
      bytes: Buffer.byteLength(file.content, "utf-8"),
      contentType: file.contentType,
      jobQuery: job.query,
      site: host,
      candidateTitle: candidate.title,
      runId,
      downloadedAt: new Date().toISOString(),
    });
    metrics.incrementCounter("snapshots_saved", 1);
    logger.info("snapshot_saved", { url: candidate.detailLink, filePath: file.filePath, format: file.format });
    return buildOutcome({ ...base, status: "success", filePath: file.filePath, reason: "downloaded" });
  } catch (error) {
    logger.warn("snapshot_failed", { url: candidate.detailLink, filePath: file.filePath, error: toErrorMessage(error) });
    return buildOutcome({
      ...base,
      status: "failure",
      filePath: file.filePath,
      reason: toErrorMessage(error),
      errorKind: "unknown",
    });
  }
}

/**
 * Saves the detail page as `detail_<title>.html`, plus a Markdown rendering
 * beside it when enabled and non-empty. One outcome per file; never throws.
 */
export async function saveSnapshot(
  html: string,
  context: DownloadContext,
  deps: SnapshotDeps,
  options: SnapshotOptions,
): Promise<OutcomeRecord[]> {
  const directory = candidateDirectory(
    deps.config.downloadRoot,
    context.host,
    context.job.query,
    context.candidate.parsedDate,
    context.title,
    context.candidate.detailLink,
  );
  const htmlName = sanitizeFilename(`detail_${context.title}.html`, "detail.html");
  const files: SnapshotFile[] = [
    { format: "html", filePath: path.join(directory, htmlName), content: html, contentType: "text/html; charset=utf-8" },
  ];

  if (options.markdown) {
    const markdown = htmlToMarkdown(html);
    if (markdown) {
      files.push({
        format: "markdown",
        filePath: path.join(directory, `${htmlName.slice(0, -".html".length)}.md`),
        content: `${markdown}\n`,
        contentType: "text/markdown; charset=utf-8",
      });
    }
  }

  const outcomes: OutcomeRecord[] = [];
  for (const file of files) {
    outcomes.push(await writeSnapshotFile(file, context, deps));
  }
  return outcomes;
}
