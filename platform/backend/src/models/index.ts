export { default as ConversationModel } from "./conversation";
export { default as GeneratedPromptModel } from "./generated-prompt";
export { default as MessageModel } from "./message";
export { default as PromptDocumentModel } from "./prompt-document";
export { openStore, type Store } from "./store";
