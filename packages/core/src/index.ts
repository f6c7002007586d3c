export * from "./errors";
export * from "./symbols";
export * from "./config";
export * from "./stats";
export * from "./pairs";
export * from "./patterns";
export * from "./branches";
export * from "./progression";
export * from "./focus";
export * from "./model";
export * from "./scoring";
export * from "./trend";
export * from "./streak";
