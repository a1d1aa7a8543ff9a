export * from "./channel";
export * from "./limiter";
export * from "./scheduler";
export * from "./speedSampler";
