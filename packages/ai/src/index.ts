export * from "./lib/ai-clients";
export * from "./language-id/config";
export * from "./language-id/classify-language";
