export { default as conversationsTable } from "./conversation";
export { default as generatedPromptsTable } from "./generated-prompt";
export { default as messagesTable } from "./message";
export { default as promptDocumentsTable } from "./prompt-document";
