import { FetchMode } from "../sites/types";

export interface FetchOptions {
  mode: FetchMode;
  /** Dynamic mode only: selector that must appear before the page is captured. */
  waitFor?: string;
  /** Capture the page anyway when `waitFor` never appears. */
  softWait?: boolean;
}

export interface FetchedPage {
  url: string;
  html: string;
  contentType?: string;
  /** False when the response was a file (PDF, spreadsheet, ...) rather than a page. */
  isHtml: boolean;
}

export interface PageFetcher {
  fetch(url: string, options: FetchOptions): Promise<FetchedPage>;
  close(): Promise<void>;
}
