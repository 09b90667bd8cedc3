import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Response } from "undici";
import { AppConfig, DEFAULT_CONFIG } from "../config";
import { HttpClient } from "../core/fetch";
import { Logger, MetricsRegistry } from "../observability";

export interface FakeRoute {
  status?: number;
  body?: string | Uint8Array;
  contentType?: string;
}

export type FakeRouteHandler = FakeRoute | (() => FakeRoute);

export interface FakeHttp {
  client: HttpClient;
  calls: string[];
}

/** In-process stand-in for the network: unknown URLs answer 404. */
export function createFakeHttp(routes: Record<string, FakeRouteHandler>): FakeHttp {
  const calls: string[] = [];
  const client: HttpClient = async (url) => {
    calls.push(url);
    const handler = routes[url];
    if (!handler) {
      return new Response("not found", { status: 404, headers: { "content-type": "text/plain" } });
    }
    const route = typeof handler === "function" ? handler() : handler;
    return new Response(route.body ?? "", {
      status: route.status ?? 200,
      headers: { "content-type": route.contentType ?? "text/html; charset=utf-8" },
    });
  };
  return { client, calls };
}

export function createTempDir(prefix = "site-crawler-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function createTestConfig(rootDir: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...DEFAULT_CONFIG,
    jobsPath: path.join(rootDir, "jobs.csv"),
    downloadRoot: path.join(rootDir, "downloads"),
    storePath: path.join(rootDir, "index.sqlite"),
    logPath: undefined,
    ledgerPaths: {
      success: path.join(rootDir, "ledgers", "success.jsonl"),
      failure: path.join(rootDir, "ledgers", "failures.jsonl"),
    },
    maxFetchRetries: 1,
    retryBaseDelayMs: 0,
    renderSettleMs: 0,
    ...overrides,
  };
}

export function createTestLogger(): Logger {
  return new Logger({ component: "test", runId: "run_test" }, { minLevel: "silent" });
}

export function createTestMetrics(): MetricsRegistry {
  return new MetricsRegistry();
}
