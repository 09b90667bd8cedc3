export * from "./crawler";
export * from "./dateFilter";
export * from "./detailParser";
export * from "./html";
export * from "./listingParser";
export * from "./searchUrl";
