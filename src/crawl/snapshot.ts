import { CheerioAPI, load } from "cheerio";
import { AnyNode, Element, isTag, isText } from "domhandler";
import { SnapshotRule } from "../sites/types";
import { extractTitle } from "./detailParser";
import { sanitizeText } from "./html";

const HEADING_TAGS = new Set(["h1", "h2", "h3", "h4", "h5", "h6"]);
const BLOCK_TAGS = new Set([...HEADING_TAGS, "p", "ul", "ol", "li", "table", "blockquote"]);
const SKIPPED_TAGS = new Set(["script", "style", "noscript"]);

const SNAPSHOT_SHELL = `<html><head><meta charset="utf-8"></head><body></body></html>`;

function firstText($: CheerioAPI, selectors: readonly string[]): string {
  for (const selector of selectors) {
    const node = $(selector).first();
    const text = node.is("meta") ? sanitizeText(node.attr("content")) : sanitizeText(node.text());
    if (text) {
      return text;
    }
  }
  return "";
}

/**
 * The detail page reduced to title, publication date and body blocks. Without
 * body selectors the page is kept whole; when none match, the whole page or
 * nothing, per `fallbackToOriginal`.
 */
export function buildSnapshotHtml(html: string, rule: SnapshotRule): string | undefined {
  if (rule.bodySelectors.length === 0) {
    return html;
  }

  const $ = load(html);
  const blocks: string[] = [];
  for (const selector of rule.bodySelectors) {
    $(selector).each((_, element) => {
      const block = $(element).clone();
      for (const removeSelector of rule.removeSelectors) {
        block.find(removeSelector).remove();
      }
      const rendered = $.html(block).trim();
      if (rendered) {
        blocks.push(rendered);
      }
    });
    if (blocks.length > 0) {
      break;
    }
  }

  if (blocks.length === 0) {
    return rule.fallbackToOriginal ? html : undefined;
  }

  const title = extractTitle($, rule.titleSelectors) ?? "";
  const date = firstText($, rule.dateSelectors);
  const out = load(SNAPSHOT_SHELL);
  const body = out("body");
  if (title) {
    body.append(out("<h1></h1>").text(title));
  }
  if (date) {
    body.append(out(`<div class="publish-date"></div>`).text(date));
  }
  body.append(out(`<div class="content"></div>`).append(blocks.join("")));
  return out.html();
}

function collapse(text: string): string {
  return text.replace(/\s+/g, " ");
}

function plainText(node: AnyNode): string {
  if (isText(node)) {
    return node.data;
  }
  return isTag(node) ? node.children.map(plainText).join(" ") : "";
}

function inlineMarkdown(node: AnyNode): string {
  if (isText(node)) {
    return collapse(node.data);
  }
  if (!isTag(node) || SKIPPED_TAGS.has(node.name)) {
    return "";
  }
  if (node.name === "br") {
    return "\n";
  }

  const inner = node.children
    .map(inlineMarkdown)
    .join("")
    .replace(/ {2,}/g, " ")
    .replace(/ *\n */g, "\n")
    .trim();
  switch (node.name) {
    case "strong":
    case "b":
      return inner ? ` **${inner}** ` : "";
    case "em":
    case "i":
      return inner ? ` *${inner}* ` : "";
    case "a": {
      const href = (node.attribs.href ?? "").trim();
      return href && inner ? ` [${inner}](${href}) ` : inner;
    }
    default:
      return inner;
  }
}

function inlineBlock(node: Element): string {
  return inlineMarkdown(node).replace(/ {2,}/g, " ").trim();
}

function hasBlockDescendant(node: Element): boolean {
  return node.children.some((child) => isTag(child) && (BLOCK_TAGS.has(child.name) || hasBlockDescendant(child)));
}

function collectBlocks(nodes: readonly AnyNode[], lines: string[]): void {
  for (const node of nodes) {
    if (isText(node)) {
      lines.push(sanitizeText(node.data));
      continue;
    }
    if (!isTag(node) || SKIPPED_TAGS.has(node.name)) {
      continue;
    }

    const name = node.name;
    if (HEADING_TAGS.has(name)) {
      const text = sanitizeText(plainText(node));
      if (text) {
        lines.push(`${"#".repeat(Number(name.slice(1)))} ${text}`);
      }
    } else if (name === "p") {
      lines.push(inlineBlock(node));
    } else if (name === "ul" || name === "ol") {
      let index = 1;
      for (const item of node.children) {
        if (!isTag(item) || item.name !== "li") {
          continue;
        }
        const text = inlineBlock(item);
        if (text) {
          lines.push(`${name === "ol" ? `${index}.` : "-"} ${text}`);
          index += 1;
        }
      }
    } else if (name === "blockquote") {
      const text = inlineBlock(node);
      if (text) {
        lines.push(`> ${text}`);
      }
    } else if (name === "div" && !hasBlockDescendant(node)) {
      lines.push(inlineBlock(node));
    } else {
      collectBlocks(node.children, lines);
    }
  }
}

/** Headings, paragraphs, lists, quotes and inline emphasis/links; everything else as plain text. */
export function htmlToMarkdown(html: string): string {
  const $ = load(html);
  const lines: string[] = [];
  collectBlocks($("body").contents().toArray(), lines);
  return lines.filter(Boolean).join("\n\n").trim();
}
