/* SPDX-License-Identifier: MIT */
import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";
import conversationsTable from "./conversation";

export const MESSAGE_ROLES = ["user", "assistant"] as const;

/**
 * Append-only turns of a conversation, ordered by `id`.
 */
const messagesTable = sqliteTable("messages", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  conversationId: integer("conversation_id")
    .notNull()
    .references(() => conversationsTable.id),
  role: text("role", { enum: MESSAGE_ROLES }).notNull(),
  content: text("content").notNull(),
  timestamp: text("timestamp")
    .notNull()
    .$defaultFn(() => new Date().toISOString()),
});

export default messagesTable;
