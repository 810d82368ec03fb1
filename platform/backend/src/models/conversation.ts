import { and, asc, desc, eq } from "drizzle-orm";
import { type Database, schema } from "@/database";
import logger from "@/logging";
import type { Conversation } from "@/types";

const { conversationsTable } = schema;

class ConversationModel {
  constructor(private readonly database: Database) {}

  /**
   * Start an active conversation for a session. Any conversation still
   * active for the same session is completed in the same transaction, so a
   * session never has more than one active conversation.
   */
  async create(sessionId: string, agentName?: string): Promise<Conversation> {
    const now = new Date().toISOString();

    const { conversation, completedCount } = this.database.run((db) =>
      db.transaction((tx) => {
        const { changes } = tx
          .update(conversationsTable)
          .set({ status: "completed", endedAt: now })
          .where(
            and(
              eq(conversationsTable.sessionId, sessionId),
              eq(conversationsTable.status, "active"),
            ),
          )
          .run();

        const created = tx
          .insert(conversationsTable)
          .values({
            sessionId,
            agentName: agentName ?? null,
            startedAt: now,
            status: "active",
          })
          .returning()
          .get();

        return { conversation: created, completedCount: changes };
      }),
    );

    if (completedCount > 0) {
      logger.warn(
        { sessionId, completedCount },
        "[ConversationModel] Completed conversations left active for session",
      );
    }

    return conversation;
  }

  /**
   * Mark an active conversation completed. Returns false (and writes
   * nothing) when the conversation does not exist or is already completed.
   */
  async end(id: number): Promise<boolean> {
    const { changes } = this.database.run((db) =>
      db
        .update(conversationsTable)
        .set({ status: "completed", endedAt: new Date().toISOString() })
        .where(
          and(
            eq(conversationsTable.id, id),
            eq(conversationsTable.status, "active"),
          ),
        )
        .run(),
    );
    return changes > 0;
  }

  async findById(id: number): Promise<Conversation | null> {
    const conversation = this.database.run((db) =>
      db
        .select()
        .from(conversationsTable)
        .where(eq(conversationsTable.id, id))
        .get(),
    );
    return conversation ?? null;
  }

  /**
   * The newest active conversation of a session. Newest wins if rows written
   * by older versions left more than one active.
   */
  async findActiveBySessionId(sessionId: string): Promise<Conversation | null> {
    const conversation = this.database.run((db) =>
      db
        .select()
        .from(conversationsTable)
        .where(
          and(
            eq(conversationsTable.sessionId, sessionId),
            eq(conversationsTable.status, "active"),
          ),
        )
        .orderBy(desc(conversationsTable.id))
        .limit(1)
        .get(),
    );
    return conversation ?? null;
  }

  async findBySessionId(sessionId: string): Promise<Conversation[]> {
    return this.database.run((db) =>
      db
        .select()
        .from(conversationsTable)
        .where(eq(conversationsTable.sessionId, sessionId))
        .orderBy(asc(conversationsTable.id))
        .all(),
    );
  }
}

export default ConversationModel;
