import { AppConfig } from "../config";
import { classifyHttpStatus, classifyNetworkError, FetchError, toErrorMessage } from "../core/errors";
import { getFetchDispatcher, HttpClient } from "../core/fetch";
import { FetchedPage } from "./types";

const HTML_CONTENT_TYPES = ["text/html", "application/xhtml+xml", "text/plain", "text/xml", "application/xml"];

function charsetFromContentType(contentType: string | undefined): string | undefined {
  const match = contentType?.match(/charset\s*=\s*["']?([\w-]+)/i);
  return match?.[1];
}

function charsetFromMeta(bytes: Uint8Array): string | undefined {
  const head = Buffer.from(bytes.subarray(0, 4096)).toString("latin1");
  const match = head.match(/<meta[^>]+charset\s*=\s*["']?([\w-]+)/i);
  return match?.[1];
}

/** Decodes with the declared charset (header, then meta tag), falling back to UTF-8. */
export function decodeHtml(bytes: Uint8Array, contentType: string | undefined): string {
  const label = charsetFromContentType(contentType) ?? charsetFromMeta(bytes) ?? "utf-8";
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(label);
  } catch {
    decoder = new TextDecoder("utf-8");
  }
  return decoder.decode(bytes);
}

export function isHtmlContentType(contentType: string | undefined): boolean {
  if (!contentType) {
    return true;
  }
  const mime = contentType.split(";")[0].trim().toLowerCase();
  return HTML_CONTENT_TYPES.includes(mime);
}

export async function fetchStaticPage(url: string, config: AppConfig, httpClient: HttpClient): Promise<FetchedPage> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), config.requestTimeoutMs);

  try {
    const response = await httpClient(url, {
      method: "GET",
      headers: {
        "user-agent": config.userAgent,
        accept: "text/html,application/xhtml+xml,*/*;q=0.8",
      },
      dispatcher: getFetchDispatcher(config.ignoreHttpsErrors),
      signal: controller.signal,
      redirect: "follow",
    });

    if (!response.ok) {
      await response.body?.cancel();
      throw new FetchError(`HTTP ${response.status} while fetching ${url}`, {
        url,
        statusCode: response.status,
        ...classifyHttpStatus(response.status),
      });
    }

    const contentType = response.headers.get("content-type") ?? undefined;
    const finalUrl = response.url || url;
    if (!isHtmlContentType(contentType)) {
      await response.body?.cancel();
      return { url: finalUrl, html: "", contentType, isHtml: false };
    }

    const bytes = new Uint8Array(await response.arrayBuffer());
    return { url: finalUrl, html: decodeHtml(bytes, contentType), contentType, isHtml: true };
  } catch (error) {
    if (error instanceof FetchError) {
      throw error;
    }
    throw new FetchError(`Request failed for ${url}: ${toErrorMessage(error)}`, {
      url,
      cause: error,
      ...classifyNetworkError(error),
    });
  } finally {
    clearTimeout(timeout);
  }
}
