import crypto from "node:crypto";
import path from "node:path";
import { formatDay } from "../crawl/dateFilter";
import { sanitizeFilename } from "../crawl/detailParser";

const MAX_SEGMENT_LENGTH = 80;
const LINK_HASH_LENGTH = 8;

function segment(value: string, fallback: string): string {
  const cleaned = sanitizeFilename(value, fallback);
  return cleaned.length > MAX_SEGMENT_LENGTH ? cleaned.slice(0, MAX_SEGMENT_LENGTH).trim() : cleaned;
}

/** Short stable tag of a detail link; keeps same-titled candidates of one day apart. */
export function linkTag(detailLink: string): string {
  return crypto.createHash("sha256").update(detailLink).digest("hex").slice(0, LINK_HASH_LENGTH);
}

/** `<root>/<host>/<query>/<YYYYMMDD|unknown_date>_<title>_<link tag>` */
export function candidateDirectory(
  downloadRoot: string,
  host: string,
  query: string,
  date: Date | null,
  title: string,
  detailLink: string,
): string {
  return path.resolve(
    downloadRoot,
    segment(host, "unknown_host"),
    segment(query, "query"),
    `${formatDay(date)}_${segment(title, "untitled")}_${linkTag(detailLink)}`,
  );
}
