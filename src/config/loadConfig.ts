import fs from "node:fs";
import path from "node:path";
import { ConfigError, toErrorMessage } from "../core/errors";
import { DEFAULT_DATE_FORMATS } from "../crawl/dateFilter";
import { LogLevel } from "../observability/types";
import { ConfigOverrides, configFileSchema } from "./schema";
import { AppConfig } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  userAgent: "Mozilla/5.0 (compatible; site-adapter-crawler/1.0)",
  ignoreHttpsErrors: false,
  dryRun: false,
  headless: true,
  jobsPath: "data/jobs.csv",
  downloadRoot: "downloads",
  storePath: "data/download-index.sqlite",
  logPath: "logs/run.log",
  logLevel: "info",
  ledgerPaths: {
    success: "data/ledgers/success.jsonl",
    failure: "data/ledgers/failures.jsonl",
  },
  requestTimeoutMs: 20_000,
  renderTimeoutMs: 30_000,
  renderSettleMs: 1_000,
  downloadTimeoutMs: 120_000,
  jobConcurrency: 4,
  staticConcurrency: 6,
  dynamicConcurrency: 2,
  maxFetchRetries: 2,
  retryBaseDelayMs: 1_000,
  runTimeoutMs: 0,
  dateFormats: [...DEFAULT_DATE_FORMATS],
  sites: {},
};

type Env = Record<string, string | undefined>;

function readConfigFile(configPath?: string): { overrides: ConfigOverrides; baseDir: string } {
  if (!configPath) {
    return { overrides: {}, baseDir: process.cwd() };
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(absolutePath, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${absolutePath}: ${toErrorMessage(error)}`, { cause: error });
  }

  const parsed = configFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigError(`Invalid config file ${absolutePath}:\n${issues.join("\n")}`);
  }

  return { overrides: parsed.data, baseDir: path.dirname(absolutePath) };
}

function resolveFrom(baseDir: string, value: string): string;
function resolveFrom(baseDir: string, value: string | undefined): string | undefined;
function resolveFrom(baseDir: string, value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  return path.isAbsolute(value) ? path.normalize(value) : path.resolve(baseDir, value);
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return fallback;
}

export function loadConfig(configPath?: string, env: Env = process.env): AppConfig {
  const { overrides: fileConfig, baseDir } = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    ledgerPaths: {
      ...DEFAULT_CONFIG.ledgerPaths,
      ...(fileConfig.ledgerPaths ?? {}),
    },
  };

  return {
    ...merged,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    dryRun: toBool(env.DRY_RUN, merged.dryRun),
    headless: toBool(env.HEADLESS, merged.headless),
    jobsPath: resolveFrom(baseDir, env.JOBS_PATH ?? merged.jobsPath),
    downloadRoot: resolveFrom(baseDir, env.DOWNLOAD_ROOT ?? merged.downloadRoot),
    storePath: resolveFrom(baseDir, env.STORE_PATH ?? merged.storePath),
    logPath: resolveFrom(baseDir, env.LOG_PATH ?? merged.logPath),
    logLevel: toLogLevel(env.LOG_LEVEL, merged.logLevel),
    ledgerPaths: {
      success: resolveFrom(baseDir, env.SUCCESS_LEDGER_PATH ?? merged.ledgerPaths.success),
      failure: resolveFrom(baseDir, env.FAILURE_LEDGER_PATH ?? merged.ledgerPaths.failure),
    },
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    renderTimeoutMs: toInt(env.RENDER_TIMEOUT_MS, merged.renderTimeoutMs),
    downloadTimeoutMs: toInt(env.DOWNLOAD_TIMEOUT_MS, merged.downloadTimeoutMs),
    jobConcurrency: toInt(env.JOB_CONCURRENCY, merged.jobConcurrency),
    staticConcurrency: toInt(env.STATIC_CONCURRENCY, merged.staticConcurrency),
    dynamicConcurrency: toInt(env.DYNAMIC_CONCURRENCY, merged.dynamicConcurrency),
    maxFetchRetries: toInt(env.MAX_FETCH_RETRIES, merged.maxFetchRetries),
    retryBaseDelayMs: toInt(env.RETRY_BASE_DELAY_MS, merged.retryBaseDelayMs),
    runTimeoutMs: toInt(env.RUN_TIMEOUT_MS, merged.runTimeoutMs),
  };
}

export { DEFAULT_CONFIG };
