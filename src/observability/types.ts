export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  query?: string;
  site?: string;
  url?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "jobs_started"
  | "jobs_completed"
  | "jobs_failed"
  | "jobs_skipped"
  | "pages_fetched"
  | "fetch_retries"
  | "candidates_found"
  | "candidates_qualified"
  | "attachments_found"
  | "downloads_ok"
  | "downloads_already_present"
  | "downloads_failed"
  | "snapshots_saved";

export type MetricTimerName = "page_fetch_ms" | "download_ms" | "job_ms";
