import { AppConfig } from "../config";
import { classifyNetworkError, toErrorMessage } from "../core/errors";
import { downloadAttachment, DownloadContext, DownloaderDeps } from "../download/downloader";
import { saveSnapshot } from "../download/snapshot";
import { PageFetcher } from "../fetch/types";
import { buildOutcome, OutcomeLedger } from "../ledger";
import { Logger, MetricsRegistry } from "../observability";
import { normalizeHost, SiteRegistry } from "../sites/registry";
import { AdapterRule } from "../sites/types";
import { Attachment, Candidate, Job } from "../types";
import { filterNewerCandidates, formatDay, parseDateText, withParsedDates } from "./dateFilter";
import {
  directAttachment,
  extensionFromContentType,
  extractDetail,
  extractDetailDateText,
  isAllowedAttachment,
} from "./detailParser";
import { extractCandidates } from "./listingParser";
import { buildSearchUrl } from "./searchUrl";
import { buildSnapshotHtml } from "./snapshot";

export interface CrawlDependencies {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  registry: SiteRegistry;
  fetcher: PageFetcher;
  ledger: OutcomeLedger;
  downloader: Omit<DownloaderDeps, "logger">;
}

export interface CrawlOptions {
  dryRun: boolean;
  signal?: AbortSignal;
}

export interface JobReport {
  /** A job-level failure outcome was recorded. */
  failed: boolean;
  candidatesFound: number;
  candidatesQualified: number;
  attachmentsFound: number;
  downloadsOk: number;
  downloadsAlreadyPresent: number;
  downloadsFailed: number;
  snapshotsSaved: number;
}

interface ResolvedAttachments {
  title: string;
  attachments: Attachment[];
  snapshotHtml?: string;
}

function emptyReport(): JobReport {
  return {
    failed: false,
    candidatesFound: 0,
    candidatesQualified: 0,
    attachmentsFound: 0,
    downloadsOk: 0,
    downloadsAlreadyPresent: 0,
    downloadsFailed: 0,
    snapshotsSaved: 0,
  };
}

async function fillDatesFromDetailPages(
  candidates: Candidate[],
  rule: AdapterRule,
  deps: CrawlDependencies,
  logger: Logger,
): Promise<Candidate[]> {
  const formats = deps.config.dateFormats;
  const filled: Candidate[] = [];

  for (const candidate of candidates) {
    if (candidate.parsedDate) {
      filled.push(candidate);
      continue;
    }

    try {
      const page = await deps.fetcher.fetch(candidate.detailLink, { mode: rule.detailDate.fetchMode });
      const dateText = page.isHtml ? extractDetailDateText(page.html, rule.detailDate, formats) : undefined;
      if (dateText) {
        filled.push({ ...candidate, rawDate: dateText, parsedDate: parseDateText(dateText, formats) });
        logger.debug("detail_date_filled", { url: candidate.detailLink, rawDate: dateText });
        continue;
      }
      logger.debug("detail_date_missing", { url: candidate.detailLink });
    } catch (error) {
      logger.warn("detail_date_fetch_failed", { url: candidate.detailLink, error: toErrorMessage(error) });
    }
    filled.push(candidate);
  }

  return filled;
}

async function resolveAttachments(
  candidate: Candidate,
  rule: AdapterRule,
  deps: CrawlDependencies,
): Promise<ResolvedAttachments> {
  const extensions = rule.detail.attachmentExtensions;

  if (!rule.detail.enabled || isAllowedAttachment(candidate.detailLink, extensions)) {
    const direct = directAttachment(candidate.detailLink, extensions);
    return { title: candidate.title, attachments: direct ? [direct] : [] };
  }

  const page = await deps.fetcher.fetch(candidate.detailLink, { mode: rule.detail.fetchMode });
  if (!page.isHtml) {
    const direct = directAttachment(page.url, extensions, extensionFromContentType(page.contentType));
    return { title: candidate.title, attachments: direct ? [direct] : [] };
  }

  const detail = extractDetail(page.html, page.url, rule.detail, candidate.title);
  const snapshotHtml = rule.detail.snapshot.enabled ? buildSnapshotHtml(page.html, rule.detail.snapshot) : undefined;
  return { ...detail, snapshotHtml };
}

/**
 * Runs one job through search, date filter, detail and download. Component
 * errors become ledger outcomes; only ledger or index failures propagate.
 */
export async function crawlJob(job: Job, deps: CrawlDependencies, options: CrawlOptions): Promise<JobReport> {
  const { runId, config, metrics, ledger } = deps;
  const host = normalizeHost(job.siteUrl);
  const logger = deps.logger.child("crawler");
  const report = emptyReport();
  const rule = deps.registry.resolve(host);
  const searchUrl = buildSearchUrl(rule, job);
  const jobFields = { query: job.query, site: host };

  logger.info("job_search_start", { ...jobFields, url: searchUrl, mode: rule.fetchMode, rule: rule.domain });

  let candidates: Candidate[];
  try {
    const page = await deps.fetcher.fetch(searchUrl, {
      mode: rule.fetchMode,
      waitFor: rule.listing.waitFor,
      softWait: !rule.listing.waitForRequired,
    });
    candidates = page.isHtml ? extractCandidates(page.html, page.url, rule.listing, job.query) : [];
  } catch (error) {
    const { category } = classifyNetworkError(error);
    logger.error("job_search_failed", { ...jobFields, url: searchUrl, errorKind: category, error: toErrorMessage(error) });
    await ledger.append(
      buildOutcome({
        runId,
        kind: "job",
        status: "failure",
        job,
        site: host,
        reason: `Search page failed: ${toErrorMessage(error)}`,
        errorKind: category,
      }),
    );
    report.failed = true;
    return report;
  }

  report.candidatesFound = candidates.length;
  metrics.incrementCounter("candidates_found", candidates.length);
  if (candidates.length === 0) {
    logger.info("job_no_candidates", { ...jobFields, url: searchUrl });
  }

  let dated = withParsedDates(candidates, config.dateFormats);
  if (rule.detailDate.enabled) {
    dated = await fillDatesFromDetailPages(dated, rule, deps, logger);
  }

  const qualified = filterNewerCandidates(dated, job.baselineDate, config.dateFormats);
  report.candidatesQualified = qualified.length;
  metrics.incrementCounter("candidates_qualified", qualified.length);
  logger.info("job_candidates_filtered", {
    ...jobFields,
    found: candidates.length,
    qualified: qualified.length,
    baseline: formatDay(job.baselineDate),
  });

  if (qualified.length === 0) {
    await ledger.append(
      buildOutcome({ runId, kind: "job", status: "success", job, site: host, reason: "no new candidates" }),
    );
    return report;
  }

  if (options.dryRun) {
    for (const candidate of qualified) {
      logger.info("candidate_qualified_dry_run", {
        ...jobFields,
        title: candidate.title,
        date: formatDay(candidate.parsedDate),
        url: candidate.detailLink,
      });
    }
    await ledger.append(
      buildOutcome({
        runId,
        kind: "job",
        status: "success",
        job,
        site: host,
        reason: `dry run: ${qualified.length} qualifying candidate(s)`,
      }),
    );
    return report;
  }

  const downloaderDeps: DownloaderDeps = { ...deps.downloader, logger: logger.child("downloader") };

  for (const candidate of qualified) {
    if (options.signal?.aborted) {
      logger.warn("job_cancelled", { ...jobFields, remainingCandidates: qualified.length - qualified.indexOf(candidate) });
      break;
    }

    let resolved: ResolvedAttachments;
    try {
      resolved = await resolveAttachments(candidate, rule, deps);
    } catch (error) {
      const { category } = classifyNetworkError(error);
      logger.warn("candidate_detail_failed", { ...jobFields, url: candidate.detailLink, error: toErrorMessage(error) });
      await ledger.append(
        buildOutcome({
          runId,
          kind: "candidate",
          status: "failure",
          job,
          site: host,
          candidate,
          reason: `Detail page failed: ${toErrorMessage(error)}`,
          errorKind: category,
        }),
      );
      continue;
    }

    const downloadContext: DownloadContext = { runId, job, candidate, title: resolved.title, host };
    if (resolved.snapshotHtml !== undefined) {
      const snapshotOutcomes = await saveSnapshot(resolved.snapshotHtml, downloadContext, downloaderDeps, {
        markdown: rule.detail.snapshot.markdown,
      });
      for (const outcome of snapshotOutcomes) {
        if (outcome.status === "success" && outcome.reason === "downloaded") {
          report.snapshotsSaved += 1;
        }
        await ledger.append(outcome);
      }
    }

    report.attachmentsFound += resolved.attachments.length;
    metrics.incrementCounter("attachments_found", resolved.attachments.length);
    if (resolved.attachments.length === 0) {
      logger.info("candidate_no_attachments", { ...jobFields, url: candidate.detailLink });
      await ledger.append(
        buildOutcome({
          runId,
          kind: "candidate",
          status: "success",
          job,
          site: host,
          candidate,
          reason: "no attachments",
        }),
      );
      continue;
    }

    for (const attachment of resolved.attachments) {
      const outcome = await downloadAttachment(attachment, downloadContext, downloaderDeps);
      if (outcome.status === "failure") {
        report.downloadsFailed += 1;
      } else if (outcome.reason === "downloaded") {
        report.downloadsOk += 1;
      } else {
        report.downloadsAlreadyPresent += 1;
      }
      await ledger.append(outcome);
    }
  }

  return report;
}
