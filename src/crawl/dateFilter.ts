import { Candidate } from "../types";

/** Tried in order; date-time variants come before the date-only ones they contain. */
export const DEFAULT_DATE_FORMATS = [
  "YYYY-MM-DD HH:mm:ss",
  "YYYY-MM-DD HH:mm",
  "YYYY/MM/DD HH:mm:ss",
  "YYYY/MM/DD HH:mm",
  "YYYY-MM-DD",
  "YYYY/MM/DD",
  "YYYY.MM.DD",
  "YYYY年MM月DD日",
] as const;

type DateField = "year" | "month" | "day" | "hour" | "minute" | "second";

interface CompiledFormat {
  pattern: RegExp;
  fields: DateField[];
}

const TOKENS: Record<string, { field: DateField; source: string }> = {
  YYYY: { field: "year", source: "(\\d{4})" },
  MM: { field: "month", source: "(\\d{1,2})" },
  M: { field: "month", source: "(\\d{1,2})" },
  DD: { field: "day", source: "(\\d{1,2})" },
  D: { field: "day", source: "(\\d{1,2})" },
  HH: { field: "hour", source: "(\\d{1,2})" },
  H: { field: "hour", source: "(\\d{1,2})" },
  mm: { field: "minute", source: "(\\d{2})" },
  ss: { field: "second", source: "(\\d{2})" },
};

const TOKEN_PATTERN = /YYYY|MM|M|DD|D|HH|H|mm|ss/g;

const compiledCache = new Map<string, CompiledFormat | null>();

function escapeLiteral(literal: string): string {
  return literal
    .split(/(\s+)/)
    .map((part) => (/^\s+$/.test(part) ? "(?:\\s+|T)" : part.replace(/[.*+?^${}()|[\]\\/-]/g, "\\$&")))
    .join("");
}

function compileFormat(format: string): CompiledFormat | null {
  const cached = compiledCache.get(format);
  if (cached !== undefined) {
    return cached;
  }

  const fields: DateField[] = [];
  let source = "";
  let lastIndex = 0;
  for (const match of format.matchAll(TOKEN_PATTERN)) {
    const index = match.index ?? 0;
    source += escapeLiteral(format.slice(lastIndex, index));
    const token = TOKENS[match[0]];
    fields.push(token.field);
    source += token.source;
    lastIndex = index + match[0].length;
  }
  source += escapeLiteral(format.slice(lastIndex));

  const required: DateField[] = ["year", "month", "day"];
  const compiled = required.every((field) => fields.filter((item) => item === field).length === 1)
    ? { pattern: new RegExp(`(?<!\\d)${source}(?!\\d)`, "g"), fields }
    : null;
  compiledCache.set(format, compiled);
  return compiled;
}

export function isValidDateFormat(format: string): boolean {
  return compileFormat(format) !== null;
}

function toUtcDate(values: Partial<Record<DateField, number>>): Date | null {
  const { year = 0, month = 1, day = 1, hour = 0, minute = 0, second = 0 } = values;
  if (month < 1 || month > 12 || day < 1 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  // rejects rollovers such as 2025-02-30
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

/**
 * First format that matches anywhere in the text wins; among its matches the
 * latest date is returned. Dates are read as UTC. `null` when nothing parses.
 */
export function parseDateText(text: string, formats: readonly string[] = DEFAULT_DATE_FORMATS): Date | null {
  const trimmed = text.trim();
  if (!trimmed) {
    return null;
  }

  for (const format of formats) {
    const compiled = compileFormat(format);
    if (!compiled) {
      continue;
    }

    let latest: Date | null = null;
    for (const match of trimmed.matchAll(compiled.pattern)) {
      const values: Partial<Record<DateField, number>> = {};
      compiled.fields.forEach((field, position) => {
        values[field] = Number.parseInt(match[position + 1], 10);
      });
      const date = toUtcDate(values);
      if (date && (!latest || date.getTime() > latest.getTime())) {
        latest = date;
      }
    }
    if (latest) {
      return latest;
    }
  }

  return null;
}

export function withParsedDates(candidates: readonly Candidate[], formats: readonly string[]): Candidate[] {
  return candidates.map((candidate) => ({
    ...candidate,
    parsedDate: candidate.parsedDate ?? parseDateText(candidate.rawDate, formats),
  }));
}

/** Keeps candidates published strictly after the baseline; unparseable dates are dropped. */
export function filterNewerCandidates(
  candidates: readonly Candidate[],
  baselineDate: Date,
  formats: readonly string[] = DEFAULT_DATE_FORMATS,
): Candidate[] {
  const baseline = baselineDate.getTime();
  return withParsedDates(candidates, formats).filter(
    (candidate) => candidate.parsedDate !== null && candidate.parsedDate.getTime() > baseline,
  );
}

export function formatDay(date: Date | null): string {
  if (!date) {
    return "unknown_date";
  }
  return date.toISOString().slice(0, 10).replace(/-/g, "");
}
