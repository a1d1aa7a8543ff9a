export * from "./byteCounter";
export * from "./errors";
export * from "./transfer";
