export type FetchMode = "static" | "dynamic";

export type QueryEncoding = "none" | "single" | "double";

export interface ListingRule {
  item: string;
  title: string;
  date?: string;
  waitFor?: string;
  /** False when `waitFor` only defaults to the item selector: an empty result list is then not an error. */
  waitForRequired: boolean;
  dateFromItem: boolean;
  matchKeyword: boolean;
  matchInTitleOnly: boolean;
  linkHrefContains?: string;
}

/** Saving the detail page itself, optionally trimmed to title, date and body. */
export interface SnapshotRule {
  enabled: boolean;
  markdown: boolean;
  titleSelectors: readonly string[];
  dateSelectors: readonly string[];
  /** Empty: the whole page is kept. The first selector with matches wins. */
  bodySelectors: readonly string[];
  removeSelectors: readonly string[];
  /** Keep the whole page when no body selector matches; otherwise save nothing. */
  fallbackToOriginal: boolean;
}

export interface DetailRule {
  enabled: boolean;
  fetchMode: FetchMode;
  titleSelectors: readonly string[];
  attachmentSelectors: readonly string[];
  attachmentExtensions: ReadonlySet<string>;
  attachmentTextKeywords: readonly string[];
  snapshot: Readonly<SnapshotRule>;
}

export interface DetailDateRule {
  enabled: boolean;
  fetchMode: FetchMode;
  selectors: readonly string[];
  patterns: readonly RegExp[];
}

export interface AdapterRule {
  readonly domain: string;
  readonly isDefault: boolean;
  /** Contains a `{query}` placeholder. Without one the job's own site URL is requested. */
  readonly searchUrlTemplate?: string;
  readonly queryEncoding: QueryEncoding;
  readonly fetchMode: FetchMode;
  readonly listing: Readonly<ListingRule>;
  readonly detail: Readonly<DetailRule>;
  readonly detailDate: Readonly<DetailDateRule>;
}
