export * from "./crawler";
export * from "./dates";
export * from "./metadata";
export * from "./patterns";
export * from "./retry";
export * from "./types";
export * from "./utils";
