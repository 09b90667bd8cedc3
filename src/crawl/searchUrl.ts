import { AdapterRule, QueryEncoding } from "../sites/types";
import { Job } from "../types";

export const QUERY_PLACEHOLDER = "{query}";

/** Form-style encoding: spaces become `+`. */
function formEncode(value: string): string {
  return encodeURIComponent(value).replace(/%20/g, "+");
}

export function encodeQuery(value: string, encoding: QueryEncoding): string {
  switch (encoding) {
    case "none":
      return value;
    case "double":
      return formEncode(formEncode(value));
    case "single":
    default:
      return formEncode(value);
  }
}

export function buildSearchUrl(rule: AdapterRule, job: Pick<Job, "query" | "siteUrl">): string {
  const template = rule.searchUrlTemplate ?? job.siteUrl;
  if (!template.includes(QUERY_PLACEHOLDER)) {
    return template;
  }
  return template.split(QUERY_PLACEHOLDER).join(encodeQuery(job.query, rule.queryEncoding));
}
