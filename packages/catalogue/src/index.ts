export * from "./catalogue";
export * from "./filter";
export * from "./filter-options";
export * from "./stats";
