import { ErrorKind } from "../types";

export interface ErrorClassification {
  category: ErrorKind;
  retryable: boolean;
}

export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/** A job row that cannot enter the pipeline. Skipped, never recorded as a failure. */
export class ValidationError extends Error {
  readonly rowNumber?: number;

  constructor(message: string, rowNumber?: number) {
    super(message);
    this.name = "ValidationError";
    this.rowNumber = rowNumber;
  }
}

export class ResolutionError extends Error {
  readonly host: string;

  constructor(host: string) {
    super(`No adapter rule and no default rule for host: ${host}`);
    this.name = "ResolutionError";
    this.host = host;
  }
}

interface ClassifiedErrorDetails extends ErrorClassification {
  url: string;
  statusCode?: number;
  cause?: unknown;
}

export class FetchError extends Error {
  readonly url: string;
  readonly category: ErrorKind;
  readonly retryable: boolean;
  readonly statusCode?: number;

  constructor(message: string, details: ClassifiedErrorDetails) {
    super(message, { cause: details.cause });
    this.name = "FetchError";
    this.url = details.url;
    this.category = details.category;
    this.retryable = details.retryable;
    this.statusCode = details.statusCode;
  }
}

export class DownloadError extends Error {
  readonly url: string;
  readonly category: ErrorKind;
  readonly retryable: boolean;
  readonly statusCode?: number;

  constructor(message: string, details: ClassifiedErrorDetails) {
    super(message, { cause: details.cause });
    this.name = "DownloadError";
    this.url = details.url;
    this.category = details.category;
    this.retryable = details.retryable;
    this.statusCode = details.statusCode;
  }
}

const FORBIDDEN_STATUSES = new Set([401, 403, 407, 451]);

const RETRYABLE_NETWORK_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
  "UND_ERR_SOCKET",
  "UND_ERR_CLOSED",
]);

const TERMINAL_NETWORK_CODES = new Set([
  "ENOTFOUND",
  "CERT_HAS_EXPIRED",
  "DEPTH_ZERO_SELF_SIGNED_CERT",
  "SELF_SIGNED_CERT_IN_CHAIN",
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
  "ERR_TLS_CERT_ALTNAME_INVALID",
]);

export function classifyHttpStatus(status: number): ErrorClassification {
  if (FORBIDDEN_STATUSES.has(status)) {
    return { category: "forbidden", retryable: false };
  }
  if (status === 408 || status === 425 || status === 429 || status >= 500) {
    return { category: "network", retryable: true };
  }
  return { category: "unknown", retryable: false };
}

function readErrorCode(value: unknown): string | undefined {
  if (typeof value === "object" && value !== null && "code" in value && typeof value.code === "string") {
    return value.code;
  }
  return undefined;
}

function readErrorName(value: unknown): string | undefined {
  if (typeof value === "object" && value !== null && "name" in value && typeof value.name === "string") {
    return value.name;
  }
  return undefined;
}

export function classifyNetworkError(error: unknown): ErrorClassification {
  if (error instanceof FetchError || error instanceof DownloadError) {
    return { category: error.category, retryable: error.retryable };
  }

  const name = readErrorName(error);
  if (name === "AbortError" || name === "TimeoutError") {
    return { category: "network", retryable: true };
  }

  const cause = error instanceof Error ? error.cause : undefined;
  const code = readErrorCode(error) ?? readErrorCode(cause);
  if (code === "ERR_INVALID_URL") {
    return { category: "unknown", retryable: false };
  }
  if (code && TERMINAL_NETWORK_CODES.has(code)) {
    return { category: "network", retryable: false };
  }
  if (code && RETRYABLE_NETWORK_CODES.has(code)) {
    return { category: "network", retryable: true };
  }
  if (readErrorName(cause) === "ConnectTimeoutError") {
    return { category: "network", retryable: true };
  }

  const message = toErrorMessage(error);
  if (message.includes("net::ERR_NAME_NOT_RESOLVED")) {
    return { category: "network", retryable: false };
  }
  if (message.includes("net::ERR_") || message === "fetch failed") {
    return { category: "network", retryable: true };
  }

  return { category: "unknown", retryable: false };
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
