export * from "./contentHasher";
export * from "./existingFile";
