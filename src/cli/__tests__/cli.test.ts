import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "../../config";
import { applyCliOverrides, parseCliArgs } from "../index";

describe("parseCliArgs", () => {
  it("reads run options", () => {
    expect(
      parseCliArgs(["run", "--config", "cfg.json", "--dry-run", "--concurrency", "3", "--timeout-minutes", "10"]),
    ).toEqual({
      command: "run",
      dryRun: true,
      ignoreHttpsErrors: false,
      configPath: "cfg.json",
      jobsPath: undefined,
      concurrency: 3,
      timeoutMinutes: 10,
      host: undefined,
    });
  });

  it("takes the host for resolve", () => {
    expect(parseCliArgs(["resolve", "example.gov"])).toMatchObject({ command: "resolve", host: "example.gov" });
    expect(parseCliArgs(["resolve"])).toBe("help");
  });

  it("falls back to help", () => {
    expect(parseCliArgs([])).toBe("help");
    expect(parseCliArgs(["crawl"])).toBe("help");
    expect(parseCliArgs(["run", "--help"])).toBe("help");
  });

  it("ignores invalid numbers and flags given as values", () => {
    const parsed = parseCliArgs(["run", "--concurrency", "zero", "--jobs", "--dry-run"]);
    expect(parsed).toMatchObject({ concurrency: undefined, jobsPath: undefined, dryRun: true });
  });
});

describe("applyCliOverrides", () => {
  it("applies flags over the loaded configuration", () => {
    const parsed = parseCliArgs(["run", "--jobs", "/tmp/jobs.csv", "--timeout-minutes", "2", "--ignore-https-errors"]);
    if (parsed === "help") {
      throw new Error("expected run arguments");
    }
    const config = applyCliOverrides(DEFAULT_CONFIG, parsed);
    expect(config.jobsPath).toBe("/tmp/jobs.csv");
    expect(config.runTimeoutMs).toBe(120_000);
    expect(config.ignoreHttpsErrors).toBe(true);
    expect(config.dryRun).toBe(false);
    expect(config.jobConcurrency).toBe(DEFAULT_CONFIG.jobConcurrency);
  });
});
