import { OutcomeRecord } from "../types";
import { BaseLedger } from "./baseLedger";

export class MemoryLedger extends BaseLedger {
  readonly records: OutcomeRecord[] = [];

  get successes(): OutcomeRecord[] {
    return this.records.filter((record) => record.status === "success");
  }

  get failures(): OutcomeRecord[] {
    return this.records.filter((record) => record.status === "failure");
  }

  protected async write(record: OutcomeRecord): Promise<void> {
    this.records.push(record);
  }
}
