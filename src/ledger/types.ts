import { OutcomeRecord } from "../types";

/** Append-only record of every outcome; success and failure go to separate streams. */
export interface OutcomeLedger {
  append(record: OutcomeRecord): Promise<void>;
}

export interface LedgerCounts {
  success: number;
  failure: number;
}
