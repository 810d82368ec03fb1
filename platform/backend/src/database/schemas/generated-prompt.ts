import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";
import conversationsTable from "./conversation";

const generatedPromptsTable = sqliteTable("generated_prompts", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  // null when the prompt was saved outside a tracked conversation
  conversationId: integer("conversation_id").references(
    () => conversationsTable.id,
  ),
  name: text("name").notNull(),
  content: text("content").notNull(),
  /** Opaque to the store, e.g. serialized tags */
  metadata: text("metadata"),
  createdAt: text("created_at")
    .notNull()
    .$defaultFn(() => new Date().toISOString()),
});

export default generatedPromptsTable;
