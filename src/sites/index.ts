export * from "./registry";
export * from "./rules";
export * from "./schema";
export * from "./types";
