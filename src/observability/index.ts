export * from "./format";
export * from "./logger";
export * from "./metrics";
export * from "./progress";
export * from "./runId";
export * from "./types";
