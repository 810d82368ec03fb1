import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const CONVERSATION_STATUSES = ["active", "completed"] as const;

const conversationsTable = sqliteTable("conversations", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  // external correlation key, several conversations may share it
  sessionId: text("session_id").notNull(),
  startedAt: text("started_at")
    .notNull()
    .$defaultFn(() => new Date().toISOString()),
  endedAt: text("ended_at"),
  agentName: text("agent_name"),
  status: text("status", { enum: CONVERSATION_STATUSES })
    .notNull()
    .default("active"),
});

export default conversationsTable;
