import { AppConfig } from "../config";
import { SqliteStore } from "./sqliteStore";
import { DownloadIndexStore } from "./types";

export function createStore(config: AppConfig): DownloadIndexStore {
  return new SqliteStore(config.storePath);
}

export * from "./memoryStore";
export * from "./sqliteStore";
export * from "./types";
