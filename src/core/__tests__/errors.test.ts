import { describe, expect, it } from "vitest";
import { classifyHttpStatus, classifyNetworkError, DownloadError, FetchError } from "../errors";

describe("classifyHttpStatus", () => {
  it("maps access errors to forbidden", () => {
    for (const status of [401, 403, 407, 451]) {
      expect(classifyHttpStatus(status)).toEqual({ category: "forbidden", retryable: false });
    }
  });

  it("treats throttling and server errors as retryable network failures", () => {
    for (const status of [408, 429, 500, 503]) {
      expect(classifyHttpStatus(status)).toEqual({ category: "network", retryable: true });
    }
  });

  it("leaves other client errors as unknown", () => {
    expect(classifyHttpStatus(404)).toEqual({ category: "unknown", retryable: false });
    expect(classifyHttpStatus(410)).toEqual({ category: "unknown", retryable: false });
  });
});

describe("classifyNetworkError", () => {
  it("keeps the classification of its own errors", () => {
    const error = new DownloadError("HTTP 403", { url: "https://example.gov/a.pdf", category: "forbidden", retryable: false });
    expect(classifyNetworkError(error)).toEqual({ category: "forbidden", retryable: false });
    const fetchError = new FetchError("HTTP 503", { url: "https://example.gov", category: "network", retryable: true });
    expect(classifyNetworkError(fetchError)).toEqual({ category: "network", retryable: true });
  });

  it("retries aborts and connection resets", () => {
    const abort = new Error("This operation was aborted");
    abort.name = "AbortError";
    expect(classifyNetworkError(abort)).toEqual({ category: "network", retryable: true });

    const reset = new TypeError("fetch failed", { cause: Object.assign(new Error("socket"), { code: "ECONNRESET" }) });
    expect(classifyNetworkError(reset)).toEqual({ category: "network", retryable: true });
  });

  it("does not retry unknown hosts", () => {
    const dns = new TypeError("fetch failed", { cause: Object.assign(new Error("getaddrinfo"), { code: "ENOTFOUND" }) });
    expect(classifyNetworkError(dns)).toEqual({ category: "network", retryable: false });
    expect(classifyNetworkError(new Error("page.goto: net::ERR_NAME_NOT_RESOLVED at https://x"))).toEqual({
      category: "network",
      retryable: false,
    });
  });

  it("falls back to unknown", () => {
    expect(classifyNetworkError(new Error("boom"))).toEqual({ category: "unknown", retryable: false });
    expect(classifyNetworkError("plain string")).toEqual({ category: "unknown", retryable: false });
  });
});
