export * from "./builder";
export { default as config, parseConfig } from "./config";
export { Database } from "./database";
export { DuplicateNameError, PromptStoreError } from "./errors";
export { default as logger } from "./logging";
export * from "./models";
export * from "./session";
export * from "./types";
