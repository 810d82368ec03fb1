import { asc, eq } from "drizzle-orm";
import { type Database, schema } from "@/database";
import type { Message, MessageRole } from "@/types";

const { messagesTable } = schema;

class MessageModel {
  constructor(private readonly database: Database) {}

  /**
   * Append a message. The conversation must exist; the foreign key is
   * enforced by SQLite.
   */
  async create(
    conversationId: number,
    role: MessageRole,
    content: string,
  ): Promise<Message> {
    return this.database.run((db) =>
      db
        .insert(messagesTable)
        .values({ conversationId, role, content })
        .returning()
        .get(),
    );
  }

  /**
   * Messages of a conversation in the order they were added. A positive
   * `limit` keeps the *oldest* `limit` messages.
   */
  async findByConversationId(
    conversationId: number,
    limit?: number,
  ): Promise<Message[]> {
    return this.database.run((db) => {
      const query = db
        .select()
        .from(messagesTable)
        .where(eq(messagesTable.conversationId, conversationId))
        .orderBy(asc(messagesTable.id));

      if (limit !== undefined && limit > 0) {
        return query.limit(limit).all();
      }
      return query.all();
    });
  }
}

export default MessageModel;
