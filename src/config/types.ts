import { LogLevel } from "../observability/types";
import { SiteRuleInput } from "../sites/schema";

export interface LedgerPaths {
  success: string;
  failure: string;
}

export interface AppConfig {
  userAgent: string;
  ignoreHttpsErrors: boolean;
  dryRun: boolean;
  headless: boolean;
  jobsPath: string;
  downloadRoot: string;
  storePath: string;
  logPath?: string;
  logLevel: LogLevel;
  ledgerPaths: LedgerPaths;
  requestTimeoutMs: number;
  renderTimeoutMs: number;
  renderSettleMs: number;
  downloadTimeoutMs: number;
  jobConcurrency: number;
  staticConcurrency: number;
  dynamicConcurrency: number;
  maxFetchRetries: number;
  retryBaseDelayMs: number;
  /** 0 disables the run-level timeout. */
  runTimeoutMs: number;
  dateFormats: string[];
  sites: Record<string, SiteRuleInput>;
}
