export * from "./messages";
export * from "./offer-extractor";
export * from "./openai-client";
export * from "./prompts";
