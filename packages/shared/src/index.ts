export * from "./errors";
export * from "./parse";
export * from "./providers";
export * from "./types/data";
export * from "./types/page";
export * from "./types/workflow";
