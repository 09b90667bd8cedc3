import path from "node:path";
import { CheerioAPI, load } from "cheerio";
import { DetailDateRule, DetailRule } from "../sites/types";
import { Attachment, DetailInfo } from "../types";
import { parseDateText } from "./dateFilter";
import { resolveLink, sanitizeText } from "./html";

const MAX_FILENAME_LENGTH = 180;

const DATE_LABELS = ["发布日期", "发布时间", "日期", "published", "date"];

const CONTENT_TYPE_EXTENSIONS: Record<string, string> = {
  "application/pdf": "pdf",
  "application/msword": "doc",
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document": "docx",
  "application/vnd.ms-excel": "xls",
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet": "xlsx",
  "application/vnd.ms-powerpoint": "ppt",
  "application/vnd.openxmlformats-officedocument.presentationml.presentation": "pptx",
  "application/zip": "zip",
  "application/x-zip-compressed": "zip",
  "application/x-rar-compressed": "rar",
  "application/vnd.rar": "rar",
  "application/x-7z-compressed": "7z",
  "text/csv": "csv",
};

/** Lowercased path extension, with query string and fragment ignored. */
export function attachmentExtension(url: string): string | undefined {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url.split(/[?#]/)[0];
  }
  const extension = path.posix.extname(pathname).slice(1).toLowerCase();
  return extension || undefined;
}

export function extensionFromContentType(contentType: string | undefined): string | undefined {
  const mime = contentType?.split(";")[0].trim().toLowerCase();
  return mime ? CONTENT_TYPE_EXTENSIONS[mime] : undefined;
}

export function isAllowedAttachment(url: string, extensions: ReadonlySet<string>): boolean {
  const extension = attachmentExtension(url);
  return extension !== undefined && extensions.has(extension);
}

export function cleanAttachmentLabel(text: string): string {
  return text.replace(/^\s*(?:附件|attachment)\s*\d*\s*[:：]?\s*/i, "").trim();
}

export function sanitizeFilename(value: string, fallback = "file"): string {
  const cleaned = value
    .replace(/[\\/:*?"<>|\u0000-\u001f]/g, "")
    .replace(/\s+/g, " ")
    .trim()
    .replace(/[. ]+$/, "");
  if (!cleaned) {
    return fallback;
  }
  if (cleaned.length <= MAX_FILENAME_LENGTH) {
    return cleaned;
  }
  const extension = path.posix.extname(cleaned);
  return cleaned.slice(0, MAX_FILENAME_LENGTH - extension.length) + extension;
}

function basenameFromUrl(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return "";
  }
  const last = pathname.split("/").pop() ?? "";
  try {
    return decodeURIComponent(last);
  } catch {
    return last;
  }
}

function withExtension(name: string, extension: string): string {
  const current = path.posix.extname(name).slice(1).toLowerCase();
  return current === extension ? name : `${name}.${extension}`;
}

/** Link label first, then the URL's file name, then a numbered placeholder. */
export function inferFilename(url: string, label: string | undefined, extension: string, index: number): string {
  const fromLabel = label ? sanitizeFilename(label, "") : "";
  if (fromLabel) {
    return withExtension(fromLabel, extension);
  }
  const fromUrl = sanitizeFilename(basenameFromUrl(url), "");
  if (fromUrl) {
    return withExtension(fromUrl, extension);
  }
  return `attachment_${index}.${extension}`;
}

function uniqueFilename(name: string, used: Set<string>): string {
  let candidate = name;
  const extension = path.posix.extname(name);
  const stem = name.slice(0, name.length - extension.length);
  for (let counter = 2; used.has(candidate.toLowerCase()); counter += 1) {
    candidate = `${stem}_${counter}${extension}`;
  }
  used.add(candidate.toLowerCase());
  return candidate;
}

export function extractTitle($: CheerioAPI, selectors: readonly string[]): string | undefined {
  for (const selector of selectors) {
    const node = $(selector).first();
    if (node.length === 0) {
      continue;
    }
    const text = node.is("meta") ? sanitizeText(node.attr("content")) : sanitizeText(node.text());
    if (text) {
      return text;
    }
  }
  return sanitizeText($("meta[property='og:title']").attr("content")) || undefined;
}

function extractAttachments($: CheerioAPI, pageUrl: string, rule: DetailRule): Attachment[] {
  const attachments: Attachment[] = [];
  const seen = new Set<string>();
  const usedNames = new Set<string>();

  for (const selector of rule.attachmentSelectors) {
    $(selector).each((_, element) => {
      const node = $(element);
      const url = resolveLink(pageUrl, node.attr("href"));
      if (!url || seen.has(url)) {
        return;
      }

      const extension = attachmentExtension(url);
      if (!extension || !rule.attachmentExtensions.has(extension)) {
        return;
      }

      if (rule.attachmentTextKeywords.length > 0) {
        const context = `${sanitizeText(node.text())} ${sanitizeText(node.parent().text())}`.toLowerCase();
        if (!rule.attachmentTextKeywords.some((keyword) => context.includes(keyword))) {
          return;
        }
      }

      seen.add(url);
      const label = cleanAttachmentLabel(
        sanitizeText(node.text()) || sanitizeText(node.attr("title")) || sanitizeText(node.attr("aria-label")),
      );
      attachments.push({
        url,
        extension,
        inferredFilename: uniqueFilename(inferFilename(url, label, extension, attachments.length + 1), usedNames),
        label: label || undefined,
      });
    });
  }

  return attachments;
}

export function extractDetail(html: string, pageUrl: string, rule: DetailRule, fallbackTitle: string): DetailInfo {
  const $ = load(html);
  return {
    title: extractTitle($, rule.titleSelectors) ?? fallbackTitle,
    attachments: extractAttachments($, pageUrl, rule),
  };
}

/** The listing link itself as the only attachment, when its type is allowed. */
export function directAttachment(
  link: string,
  extensions: ReadonlySet<string>,
  extensionHint?: string,
): Attachment | undefined {
  const extension = attachmentExtension(link) ?? extensionHint;
  if (!extension || !extensions.has(extension)) {
    return undefined;
  }
  return {
    url: link,
    extension,
    inferredFilename: inferFilename(link, undefined, extension, 1),
  };
}

/** Text holding the publication date of a detail page, or undefined. */
export function extractDetailDateText(
  html: string,
  rule: DetailDateRule,
  formats: readonly string[],
): string | undefined {
  const $ = load(html);

  for (const selector of rule.selectors) {
    const node = $(selector).first();
    const text = sanitizeText(node.attr("datetime") || node.attr("content") || node.text());
    if (text && parseDateText(text, formats)) {
      return text;
    }
  }

  const bodyText = $("body").length > 0 ? $("body").text() : $.root().text();
  for (const pattern of rule.patterns) {
    const match = pattern.exec(bodyText);
    const text = sanitizeText(match?.[1] ?? match?.[0]);
    if (text && parseDateText(text, formats)) {
      return text;
    }
  }

  for (const line of bodyText.split(/\n+/)) {
    const text = sanitizeText(line);
    const lowered = text.toLowerCase();
    if (DATE_LABELS.some((label) => lowered.includes(label)) && parseDateText(text, formats)) {
      return text;
    }
  }

  return undefined;
}
