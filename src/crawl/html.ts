export function sanitizeText(value: string | undefined): string {
  return (value ?? "").replace(/\s+/g, " ").trim();
}

export function normalizeForMatch(value: string): string {
  return value.replace(/\s+/g, "").toLowerCase();
}

export function matchesKeyword(text: string, keyword: string): boolean {
  const normalizedKeyword = normalizeForMatch(keyword);
  if (!normalizedKeyword) {
    return false;
  }
  return normalizeForMatch(text).includes(normalizedKeyword);
}

/** Absolute http(s) URL for an href, or undefined for script, mail and fragment links. */
export function resolveLink(baseUrl: string, href: string | undefined): string | undefined {
  const trimmed = href?.trim();
  if (!trimmed) {
    return undefined;
  }
  const lowered = trimmed.toLowerCase();
  if (lowered.startsWith("javascript:") || lowered.startsWith("mailto:") || lowered.startsWith("#")) {
    return undefined;
  }
  try {
    const url = new URL(trimmed, baseUrl);
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      return undefined;
    }
    url.hash = "";
    return url.toString();
  } catch {
    return undefined;
  }
}
