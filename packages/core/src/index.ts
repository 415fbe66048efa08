export * from "./errors";
export * from "./media";
