import { ConcurrencyLimiter } from "../core/concurrency";
import { OutcomeRecord } from "../types";
import { OutcomeLedger } from "./types";

export abstract class BaseLedger implements OutcomeLedger {
  private readonly mutex = new ConcurrencyLimiter(1);

  /** Appends one at a time so concurrent jobs never interleave lines. */
  append(record: OutcomeRecord): Promise<void> {
    return this.mutex.run(() => this.write(record));
  }

  protected abstract write(record: OutcomeRecord): Promise<void>;
}
