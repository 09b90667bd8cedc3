import { formatDay } from "../crawl/dateFilter";
import { Candidate, ErrorKind, Job, OutcomeKind, OutcomeRecord, OutcomeStatus } from "../types";

export interface OutcomeInput {
  runId: string;
  kind: OutcomeKind;
  status: OutcomeStatus;
  job: Job;
  site: string;
  candidate?: Candidate;
  attachmentUrl?: string;
  attachmentFilename?: string;
  filePath?: string;
  reason?: string;
  errorKind?: ErrorKind;
}

export function buildOutcome(input: OutcomeInput): OutcomeRecord {
  const { candidate } = input;
  return {
    runId: input.runId,
    kind: input.kind,
    status: input.status,
    jobQuery: input.job.query,
    site: input.site,
    candidateTitle: candidate?.title,
    candidateDate: candidate ? (candidate.parsedDate ? formatDay(candidate.parsedDate) : candidate.rawDate) : undefined,
    candidateUrl: candidate?.detailLink,
    attachmentUrl: input.attachmentUrl,
    attachmentFilename: input.attachmentFilename,
    filePath: input.filePath,
    reason: input.reason,
    errorKind: input.errorKind,
    timestamp: new Date().toISOString(),
  };
}
