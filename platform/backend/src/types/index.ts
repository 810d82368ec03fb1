export * from "./conversation";
export * from "./generated-prompt";
export * from "./message";
export * from "./prompt-document";
export * from "./session";
