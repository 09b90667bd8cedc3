import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { createTempDir, removeDir } from "../../__tests__/helpers";
import { ConfigError, ValidationError } from "../../core/errors";
import { loadJobs, parseBaselineDate, parseJobSheet, validateJob } from "../loadJobs";

describe("parseJobSheet", () => {
  it("maps aliased headers to jobs", () => {
    const jobs = parseJobSheet(
      "\uFEFF关键词,网址,发布时间\n年度报告,https://example.gov/list,2024-12-01\nbudget,https://example.org/s?q={query},2025/01/05 08:30\n",
    );

    expect(jobs).toEqual([
      { query: "年度报告", siteUrl: "https://example.gov/list", baselineDate: new Date(Date.UTC(2024, 11, 1)), rowNumber: 2 },
      {
        query: "budget",
        siteUrl: "https://example.org/s?q={query}",
        baselineDate: new Date(Date.UTC(2025, 0, 5, 8, 30)),
        rowNumber: 3,
      },
    ]);
  });

  it("accepts English headers in any order and case", () => {
    const jobs = parseJobSheet("Baseline Date,URL,Keyword\n2024-06-30,https://example.gov,plan\n");
    expect(jobs[0]).toMatchObject({ query: "plan", siteUrl: "https://example.gov" });
    expect(jobs[0].baselineDate).toEqual(new Date(Date.UTC(2024, 5, 30)));
  });

  it("reads spreadsheet day numbers", () => {
    const jobs = parseJobSheet("keyword,url,date\nplan,https://example.gov,45658\n");
    expect(jobs[0].baselineDate).toEqual(new Date(Date.UTC(2025, 0, 1)));
  });

  it("keeps incomplete rows so the run can skip and count them", () => {
    const jobs = parseJobSheet("keyword,url,date\n,https://example.gov,2024-01-01\nplan,https://example.gov,someday\n\n");
    expect(jobs).toHaveLength(2);
    expect(() => validateJob(jobs[0])).toThrow("Job has an empty keyword");
    expect(() => validateJob(jobs[1])).toThrow("Job has a missing or unparseable baseline date");
  });

  it("fails when a required column is missing", () => {
    expect(() => parseJobSheet("keyword,url\nplan,https://example.gov\n")).toThrow(ConfigError);
    expect(() => parseJobSheet("")).toThrow(ConfigError);
  });
});

describe("parseBaselineDate", () => {
  it("handles serial numbers with a time fraction", () => {
    expect(parseBaselineDate("45658.5")).toEqual(new Date(Date.UTC(2025, 0, 1, 12)));
    expect(parseBaselineDate("not a date")).toBeNull();
  });
});

describe("validateJob", () => {
  it("names the offending row", () => {
    const job = { query: "plan", siteUrl: " ", baselineDate: new Date(Date.UTC(2024, 0, 1)), rowNumber: 7 };
    expect(() => validateJob(job)).toThrow(ValidationError);
    try {
      validateJob(job);
    } catch (error) {
      expect(error).toMatchObject({ rowNumber: 7, message: "Job has an empty site URL" });
    }
  });
});

describe("loadJobs", () => {
  it("reads a sheet from disk", () => {
    const dir = createTempDir();
    try {
      const filePath = path.join(dir, "jobs.csv");
      fs.writeFileSync(filePath, "query,site_url,baseline_date\nplan,https://example.gov,2024-01-01\n");
      expect(loadJobs(filePath)).toHaveLength(1);
    } finally {
      removeDir(dir);
    }
  });

  it("raises ConfigError for a missing file", () => {
    expect(() => loadJobs("/nonexistent/jobs.csv")).toThrow(ConfigError);
  });
});
