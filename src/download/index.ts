export * from "./downloader";
export * from "./paths";
export * from "./snapshot";
