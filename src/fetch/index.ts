export * from "./browserFetcher";
export * from "./pageFetcher";
export * from "./staticFetcher";
export * from "./types";
