import fs from "node:fs";
import path from "node:path";
import { parse as parseCsv } from "csv-parse/sync";
import { z } from "zod";
import { ConfigError, toErrorMessage, ValidationError } from "../core/errors";
import { DEFAULT_DATE_FORMATS, parseDateText } from "../crawl/dateFilter";
import { Job } from "../types";

const COLUMN_ALIASES = {
  query: ["keyword", "query", "file_name", "filename", "文件名", "关键词"],
  siteUrl: ["url", "site", "site_url", "网址", "网站", "链接"],
  baselineDate: ["baseline_date", "date", "publish_time", "发布时间", "时间"],
} as const;

type ColumnName = keyof typeof COLUMN_ALIASES;

const COLUMN_NAMES: readonly ColumnName[] = ["query", "siteUrl", "baselineDate"];

const SPREADSHEET_EPOCH_MS = Date.UTC(1899, 11, 30);
const DAY_MS = 24 * 60 * 60 * 1000;

const rowsSchema = z.array(z.array(z.string()));

function normalizeHeader(value: string): string {
  return value.trim().toLowerCase().replace(/\s+/g, "_");
}

function findColumns(header: readonly string[]): Record<ColumnName, number> {
  const normalized = header.map(normalizeHeader);
  const indexOf = (name: ColumnName): number =>
    normalized.findIndex((cell) => COLUMN_ALIASES[name].some((alias) => alias === cell));

  const columns = {
    query: indexOf("query"),
    siteUrl: indexOf("siteUrl"),
    baselineDate: indexOf("baselineDate"),
  };
  const missing = COLUMN_NAMES.filter((name) => columns[name] < 0);
  if (missing.length > 0) {
    const expected = missing.map((name) => `${name} (${COLUMN_ALIASES[name].join(", ")})`).join("; ");
    throw new ConfigError(`Job sheet is missing required column(s): ${expected}`);
  }
  return columns;
}

/** Plain day numbers count days since 1899-12-30, the spreadsheet convention. */
export function parseBaselineDate(value: string, formats: readonly string[] = DEFAULT_DATE_FORMATS): Date | null {
  const trimmed = value.trim();
  if (/^\d{1,5}(\.\d+)?$/.test(trimmed)) {
    const serial = Number.parseFloat(trimmed);
    return new Date(SPREADSHEET_EPOCH_MS + Math.round(serial * DAY_MS));
  }
  return parseDateText(trimmed, formats);
}

export function parseJobSheet(content: string, formats: readonly string[] = DEFAULT_DATE_FORMATS): Job[] {
  let records: unknown;
  try {
    records = parseCsv(content, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true,
    });
  } catch (error) {
    throw new ConfigError(`Job sheet is not valid CSV: ${toErrorMessage(error)}`, { cause: error });
  }

  const parsed = rowsSchema.safeParse(records);
  if (!parsed.success) {
    throw new ConfigError("Job sheet rows could not be read as text cells");
  }
  const rows = parsed.data;
  if (rows.length === 0) {
    throw new ConfigError("Job sheet is empty");
  }

  const columns = findColumns(rows[0]);
  const jobs: Job[] = [];
  rows.slice(1).forEach((row, index) => {
    if (row.every((cell) => cell === "")) {
      return;
    }
    const rawDate = row[columns.baselineDate] ?? "";
    jobs.push({
      query: row[columns.query] ?? "",
      siteUrl: row[columns.siteUrl] ?? "",
      baselineDate: parseBaselineDate(rawDate, formats) ?? new Date(Number.NaN),
      // header is row 1
      rowNumber: index + 2,
    });
  });
  return jobs;
}

export function loadJobs(filePath: string, formats: readonly string[] = DEFAULT_DATE_FORMATS): Job[] {
  const absolutePath = path.resolve(filePath);
  let content: string;
  try {
    content = fs.readFileSync(absolutePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read job sheet ${absolutePath}: ${toErrorMessage(error)}`, { cause: error });
  }
  return parseJobSheet(content, formats);
}

/** Throws `ValidationError` for a job that cannot enter the pipeline. */
export function validateJob(job: Job): void {
  if (!job.query.trim()) {
    throw new ValidationError("Job has an empty keyword", job.rowNumber);
  }
  if (!job.siteUrl.trim()) {
    throw new ValidationError("Job has an empty site URL", job.rowNumber);
  }
  if (Number.isNaN(job.baselineDate.getTime())) {
    throw new ValidationError("Job has a missing or unparseable baseline date", job.rowNumber);
  }
}
