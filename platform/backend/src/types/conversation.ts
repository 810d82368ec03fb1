import { createSelectSchema } from "drizzle-zod";
import { z } from "zod";
import { schema } from "@/database";
import { CONVERSATION_STATUSES } from "@/database/schemas/conversation";

export const ConversationStatusSchema = z.enum(CONVERSATION_STATUSES);

export const SelectConversationSchema = createSelectSchema(
  schema.conversationsTable,
);

export type ConversationStatus = z.infer<typeof ConversationStatusSchema>;
export type Conversation = z.infer<typeof SelectConversationSchema>;
