export interface Job {
  readonly query: string;
  readonly siteUrl: string;
  readonly baselineDate: Date;
  readonly rowNumber?: number;
}

export interface Candidate {
  title: string;
  rawDate: string;
  parsedDate: Date | null;
  detailLink: string;
}

export interface Attachment {
  url: string;
  inferredFilename: string;
  extension: string;
  label?: string;
}

export interface DetailInfo {
  title: string;
  attachments: Attachment[];
}

export type OutcomeStatus = "success" | "failure";

export type OutcomeKind = "attachment" | "snapshot" | "candidate" | "job";

export type ErrorKind = "network" | "forbidden" | "unknown";

export interface OutcomeRecord {
  runId: string;
  kind: OutcomeKind;
  status: OutcomeStatus;
  jobQuery: string;
  site: string;
  candidateTitle?: string;
  candidateDate?: string;
  candidateUrl?: string;
  attachmentUrl?: string;
  attachmentFilename?: string;
  filePath?: string;
  reason?: string;
  errorKind?: ErrorKind;
  timestamp: string;
}

export interface RunSummary {
  runId: string;
  dryRun: boolean;
  cancelled: boolean;
  jobsTotal: number;
  jobsSkipped: number;
  jobsCompleted: number;
  jobsFailed: number;
  candidatesFound: number;
  candidatesQualified: number;
  attachmentsFound: number;
  downloadsOk: number;
  downloadsAlreadyPresent: number;
  downloadsFailed: number;
  snapshotsSaved: number;
  startedAt: string;
  finishedAt?: string;
}
