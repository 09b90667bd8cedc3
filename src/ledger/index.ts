import { AppConfig } from "../config";
import { JsonlLedger } from "./jsonlLedger";
import { OutcomeLedger } from "./types";

export function createLedger(config: AppConfig): OutcomeLedger {
  return new JsonlLedger(config.ledgerPaths);
}

export * from "./baseLedger";
export * from "./jsonlLedger";
export * from "./memoryLedger";
export * from "./outcome";
export * from "./types";
