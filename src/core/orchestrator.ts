import { AppConfig } from "../config";
import { crawlJob, JobReport } from "../crawl/crawler";
import { PageFetcher } from "../fetch/types";
import { validateJob } from "../jobs/loadJobs";
import { buildOutcome, OutcomeLedger } from "../ledger";
import { Logger, MetricsRegistry } from "../observability";
import { normalizeHost, SiteRegistry } from "../sites/registry";
import { DownloadIndexStore } from "../store";
import { Job, RunSummary } from "../types";
import { ConcurrencyLimiter, processWithConcurrency } from "./concurrency";
import { classifyNetworkError, toErrorMessage, ValidationError } from "./errors";
import { HttpClient } from "./fetch";

export interface RunDependencies {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  registry: SiteRegistry;
  fetcher: PageFetcher;
  ledger: OutcomeLedger;
  store: DownloadIndexStore;
  /** Attachment downloads share the plain HTTP pool with static page fetches. */
  downloadPool: ConcurrencyLimiter;
  httpClient?: HttpClient;
}

export interface RunOptions {
  dryRun: boolean;
  signal?: AbortSignal;
}

function createSummary(runId: string, dryRun: boolean, jobsTotal: number, startedAt: string): RunSummary {
  return {
    runId,
    dryRun,
    cancelled: false,
    jobsTotal,
    jobsSkipped: 0,
    jobsCompleted: 0,
    jobsFailed: 0,
    candidatesFound: 0,
    candidatesQualified: 0,
    attachmentsFound: 0,
    downloadsOk: 0,
    downloadsAlreadyPresent: 0,
    downloadsFailed: 0,
    snapshotsSaved: 0,
    startedAt,
  };
}

function addReport(summary: RunSummary, report: JobReport): void {
  summary.candidatesFound += report.candidatesFound;
  summary.candidatesQualified += report.candidatesQualified;
  summary.attachmentsFound += report.attachmentsFound;
  summary.downloadsOk += report.downloadsOk;
  summary.downloadsAlreadyPresent += report.downloadsAlreadyPresent;
  summary.downloadsFailed += report.downloadsFailed;
  summary.snapshotsSaved += report.snapshotsSaved;
  if (report.failed) {
    summary.jobsFailed += 1;
  } else {
    summary.jobsCompleted += 1;
  }
}

function partitionJobs(jobs: readonly Job[], logger: Logger): { valid: Job[]; skipped: number } {
  const valid: Job[] = [];
  let skipped = 0;
  for (const job of jobs) {
    try {
      validateJob(job);
      valid.push(job);
    } catch (error) {
      if (!(error instanceof ValidationError)) {
        throw error;
      }
      skipped += 1;
      logger.warn("job_skipped_invalid", { row: error.rowNumber, query: job.query, site: job.siteUrl, error: error.message });
    }
  }
  return { valid, skipped };
}

/**
 * Runs every valid job through the crawl pipeline under the job concurrency
 * limit. Cancellation and the run timeout stop new jobs from starting.
 */
export async function runJobs(jobs: readonly Job[], deps: RunDependencies, options: RunOptions): Promise<RunSummary> {
  const { runId, config, metrics, ledger, store } = deps;
  const logger = deps.logger.child("orchestrator");
  const startedAt = new Date().toISOString();
  const summary = createSummary(runId, options.dryRun, jobs.length, startedAt);

  const controller = new AbortController();
  const onAbort = (): void => controller.abort();
  if (options.signal?.aborted) {
    controller.abort();
  } else {
    options.signal?.addEventListener("abort", onAbort, { once: true });
  }
  const timeout =
    config.runTimeoutMs > 0
      ? setTimeout(() => {
          logger.warn("run_timeout_reached", { timeoutMs: config.runTimeoutMs });
          controller.abort();
        }, config.runTimeoutMs)
      : undefined;

  // a dry run leaves the download index untouched
  const recordRun = !options.dryRun;
  if (recordRun) {
    await store.startRun(runId, startedAt);
  }
  logger.info("run_start", { jobs: jobs.length, dryRun: options.dryRun, concurrency: config.jobConcurrency });

  try {
    const { valid, skipped } = partitionJobs(jobs, logger);
    summary.jobsSkipped = skipped;
    metrics.incrementCounter("jobs_skipped", skipped);

    await processWithConcurrency(
      valid,
      config.jobConcurrency,
      async (job) => {
        const fields = { query: job.query, site: job.siteUrl, row: job.rowNumber };
        metrics.incrementCounter("jobs_started", 1);
        const stopTimer = metrics.startTimer("job_ms");
        logger.info("job_start", fields);

        try {
          const report = await crawlJob(
            job,
            {
              runId,
              config,
              logger,
              metrics,
              registry: deps.registry,
              fetcher: deps.fetcher,
              ledger,
              downloader: { config, metrics, store, pool: deps.downloadPool, httpClient: deps.httpClient },
            },
            { dryRun: options.dryRun, signal: controller.signal },
          );
          addReport(summary, report);
          metrics.incrementCounter(report.failed ? "jobs_failed" : "jobs_completed", 1);
          logger.info("job_complete", { ...fields, ...report, durationMs: stopTimer() });
        } catch (error) {
          summary.jobsFailed += 1;
          metrics.incrementCounter("jobs_failed", 1);
          logger.error("job_failed", { ...fields, durationMs: stopTimer(), error: toErrorMessage(error) });
          await recordJobFailure(job, error, deps, logger);
        }
      },
      controller.signal,
    );

    summary.cancelled = controller.signal.aborted;
    summary.finishedAt = new Date().toISOString();
    if (recordRun) {
      await store.finishRun(runId, summary.cancelled ? "cancelled" : "completed", summary.finishedAt, summary);
    }
    logger.info(summary.cancelled ? "run_cancelled" : "run_complete", { ...summary });
    return summary;
  } catch (error) {
    if (recordRun) {
      await store.finishRun(runId, "failed", new Date().toISOString());
    }
    throw error;
  } finally {
    if (timeout) {
      clearTimeout(timeout);
    }
    options.signal?.removeEventListener("abort", onAbort);
  }
}

async function recordJobFailure(job: Job, error: unknown, deps: RunDependencies, logger: Logger): Promise<void> {
  try {
    await deps.ledger.append(
      buildOutcome({
        runId: deps.runId,
        kind: "job",
        status: "failure",
        job,
        site: normalizeHost(job.siteUrl),
        reason: toErrorMessage(error),
        errorKind: classifyNetworkError(error).category,
      }),
    );
  } catch (ledgerError) {
    logger.error("ledger_append_failed", { query: job.query, error: toErrorMessage(ledgerError) });
  }
}
