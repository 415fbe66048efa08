export * from "./analyze";
export * from "./command-runner";
export * from "./errors";
export * from "./rules";
