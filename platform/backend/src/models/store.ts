import config from "@/config";
import { Database } from "@/database";
import ConversationModel from "./conversation";
import GeneratedPromptModel from "./generated-prompt";
import MessageModel from "./message";
import PromptDocumentModel from "./prompt-document";

/**
 * The four tables of one database file, one model each.
 */
export interface Store {
  database: Database;
  documents: PromptDocumentModel;
  conversations: ConversationModel;
  messages: MessageModel;
  generatedPrompts: GeneratedPromptModel;
}

/**
 * Open (creating or upgrading as needed) the database at `dbPath`.
 */
export function openStore(dbPath: string = config.database.path): Store {
  const database = Database.open(dbPath);
  return {
    database,
    documents: new PromptDocumentModel(database),
    conversations: new ConversationModel(database),
    messages: new MessageModel(database),
    generatedPrompts: new GeneratedPromptModel(database),
  };
}
