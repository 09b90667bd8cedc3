import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createFakeHttp, createTempDir, createTestConfig, createTestLogger, createTestMetrics, removeDir } from "../../__tests__/helpers";
import { siteRuleSchema } from "../../sites";
import { runCrawlCommand } from "../commands";

const SEARCH_PAGE = `
<ul>
  <li class="result"><a href="/notice/1.html">Notice A</a><span class="date">2025-02-01</span></li>
</ul>`;

describe("runCrawlCommand", () => {
  let rootDir: string;

  beforeEach(() => {
    rootDir = createTempDir();
    fs.writeFileSync(path.join(rootDir, "jobs.csv"), "keyword,url,date\nbudget,https://example.gov/,2024-12-01\n");
  });

  afterEach(() => {
    removeDir(rootDir);
  });

  it("leaves the download index untouched on a dry run", async () => {
    const config = createTestConfig(rootDir, {
      dryRun: true,
      sites: {
        "example.gov": siteRuleSchema.parse({
          searchUrl: "https://example.gov/search?q={query}",
          selectors: { item: "li.result", title: "a", date: "span.date" },
        }),
      },
    });
    const http = createFakeHttp({ "https://example.gov/search?q=budget": { body: SEARCH_PAGE } });

    const summary = await runCrawlCommand(
      { runId: "run_test", config, logger: createTestLogger(), metrics: createTestMetrics() },
      { httpClient: http.client },
    );

    expect(summary).toMatchObject({ dryRun: true, jobsCompleted: 1, candidatesQualified: 1, downloadsOk: 0 });
    expect(fs.existsSync(config.storePath)).toBe(false);
    expect(http.calls).toEqual(["https://example.gov/search?q=budget"]);
  });
});
