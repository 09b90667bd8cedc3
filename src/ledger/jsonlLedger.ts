import fs from "node:fs";
import path from "node:path";
import { LedgerPaths } from "../config";
import { OutcomeRecord } from "../types";
import { BaseLedger } from "./baseLedger";
import { LedgerCounts } from "./types";

export class JsonlLedger extends BaseLedger {
  private readonly successPath: string;
  private readonly failurePath: string;

  constructor(paths: LedgerPaths) {
    super();
    this.successPath = path.resolve(paths.success);
    this.failurePath = path.resolve(paths.failure);
    fs.mkdirSync(path.dirname(this.successPath), { recursive: true });
    fs.mkdirSync(path.dirname(this.failurePath), { recursive: true });
  }

  protected async write(record: OutcomeRecord): Promise<void> {
    const filePath = record.status === "success" ? this.successPath : this.failurePath;
    await fs.promises.appendFile(filePath, JSON.stringify(record) + "\n", "utf-8");
  }
}

async function countLines(filePath: string): Promise<number> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return 0;
    }
    throw error;
  }
  return content.split("\n").filter((line) => line.trim().length > 0).length;
}

export async function countLedgerRecords(paths: LedgerPaths): Promise<LedgerCounts> {
  const [success, failure] = await Promise.all([countLines(paths.success), countLines(paths.failure)]);
  return { success, failure };
}
