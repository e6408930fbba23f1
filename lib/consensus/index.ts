export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./rating-parser";
export * from "./agreement";
export * from "./consensus-filler";
export * from "./harmonizer";
export * from "./debate-parser";
export * from "./prompts";
export * from "./analysis-parser";
export * from "./openrouter";
export * from "./analysts";
export * from "./debate";
export * from "./scoring";
export * from "./report";
export * from "./persistence";
export * from "./db-sink";
export * from "./session-log";
export * from "./pipeline";
