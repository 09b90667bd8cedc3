import { load } from "cheerio";
import { ListingRule } from "../sites/types";
import { Candidate } from "../types";
import { matchesKeyword, resolveLink, sanitizeText } from "./html";

export function extractCandidates(html: string, pageUrl: string, rule: ListingRule, query: string): Candidate[] {
  const $ = load(html);
  const candidates: Candidate[] = [];
  const seen = new Set<string>();

  $(rule.item).each((_, element) => {
    const item = $(element);
    const isAnchor = item.is("a");
    const titleNode = isAnchor ? item : item.find(rule.title).first();
    if (titleNode.length === 0) {
      return;
    }

    const href =
      titleNode.attr("href") ??
      titleNode.find("a[href]").first().attr("href") ??
      titleNode.closest("a[href]").attr("href") ??
      item.find("a[href]").first().attr("href");
    const title = sanitizeText(titleNode.attr("title") || titleNode.text());
    const detailLink = resolveLink(pageUrl, href);
    if (!title || !href || !detailLink) {
      return;
    }

    if (rule.linkHrefContains && !href.includes(rule.linkHrefContains)) {
      return;
    }

    // a bare anchor carries its date in the surrounding markup
    const itemText = isAnchor ? sanitizeText(`${title} ${item.parent().text()}`) : sanitizeText(item.text());
    if (rule.matchKeyword && !matchesKeyword(rule.matchInTitleOnly ? title : itemText, query)) {
      return;
    }

    let rawDate = "";
    if (rule.date) {
      const dateNode = item.find(rule.date).first();
      rawDate = sanitizeText(dateNode.attr("datetime") || dateNode.attr("content") || dateNode.text());
    }
    if (!rawDate && rule.dateFromItem) {
      rawDate = sanitizeText(`${itemText} ${href}`);
    }

    if (seen.has(detailLink)) {
      return;
    }
    seen.add(detailLink);
    candidates.push({ title, rawDate, parsedDate: null, detailLink });
  });

  return candidates;
}
