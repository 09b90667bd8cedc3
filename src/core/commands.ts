import { AppConfig } from "../config";
import { StrategyPageFetcher } from "../fetch";
import { loadJobs } from "../jobs";
import { countLedgerRecords, createLedger } from "../ledger";
import { Logger, MetricsRegistry } from "../observability";
import { describeRule, normalizeHost, SiteRegistry } from "../sites";
import { createStore, DownloadIndexStore, InMemoryStore, StoreStats } from "../store";
import { RunSummary } from "../types";
import { HttpClient } from "./fetch";
import { runJobs } from "./orchestrator";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
}

export interface StatusReport {
  store: StoreStats;
  ledger: { success: number; failure: number };
}

export async function runCrawlCommand(
  ctx: CommandContext,
  options: { signal?: AbortSignal; httpClient?: HttpClient } = {},
): Promise<RunSummary> {
  const { config, logger } = ctx;
  const registry = SiteRegistry.fromConfig(config.sites);
  const jobs = loadJobs(config.jobsPath, config.dateFormats);
  logger.info("jobs_loaded", { jobsPath: config.jobsPath, jobs: jobs.length, rules: registry.domains().length });

  // dry runs never reach the downloader, so the index file is not opened
  const store: DownloadIndexStore = config.dryRun ? new InMemoryStore() : createStore(config);
  const fetcher = new StrategyPageFetcher({
    config,
    logger: logger.child("fetcher"),
    metrics: ctx.metrics,
    httpClient: options.httpClient,
  });

  try {
    return await runJobs(
      jobs,
      {
        runId: ctx.runId,
        config,
        logger,
        metrics: ctx.metrics,
        registry,
        fetcher,
        ledger: createLedger(config),
        store,
        downloadPool: fetcher.pools.static,
        httpClient: options.httpClient,
      },
      { dryRun: config.dryRun, signal: options.signal },
    );
  } finally {
    await fetcher.close();
    await store.close();
  }
}

export async function runStatus(ctx: CommandContext): Promise<StatusReport> {
  ctx.logger.info("status_start");
  const store = createStore(ctx.config);
  try {
    const report: StatusReport = {
      store: await store.getStats(),
      ledger: await countLedgerRecords(ctx.config.ledgerPaths),
    };
    ctx.logger.info("status_complete", { ...report });
    return report;
  } finally {
    await store.close();
  }
}

export function runResolve(ctx: CommandContext, host: string): Record<string, unknown> {
  const registry = SiteRegistry.fromConfig(ctx.config.sites);
  const rule = registry.resolve(host);
  const description = describeRule(rule);
  ctx.logger.info("resolve_complete", { site: normalizeHost(host), rule: rule.domain, isDefault: rule.isDefault });
  return description;
}
