import { z } from "zod";
import { isValidDateFormat } from "../crawl/dateFilter";
import { siteRuleSchema } from "../sites/schema";

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();
const pathString = z.string().trim().min(1);

export const configFileSchema = z
  .object({
    userAgent: z.string().min(1),
    ignoreHttpsErrors: z.boolean(),
    dryRun: z.boolean(),
    headless: z.boolean(),
    jobsPath: pathString,
    downloadRoot: pathString,
    storePath: pathString,
    logPath: pathString,
    logLevel: z.enum(["debug", "info", "warn", "error"]),
    ledgerPaths: z.object({ success: pathString, failure: pathString }).partial().strict(),
    requestTimeoutMs: positiveInt,
    renderTimeoutMs: positiveInt,
    renderSettleMs: nonNegativeInt,
    downloadTimeoutMs: positiveInt,
    jobConcurrency: positiveInt,
    staticConcurrency: positiveInt,
    dynamicConcurrency: positiveInt,
    maxFetchRetries: nonNegativeInt,
    retryBaseDelayMs: nonNegativeInt,
    runTimeoutMs: nonNegativeInt,
    dateFormats: z
      .array(z.string().min(1).refine(isValidDateFormat, { message: "date format needs YYYY, M/MM and D/DD tokens" }))
      .min(1),
    sites: z.record(z.string(), siteRuleSchema),
  })
  .partial()
  .strict();

export type ConfigOverrides = z.output<typeof configFileSchema>;
