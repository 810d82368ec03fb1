/* SPDX-License-Identifier: MIT */
import { createSelectSchema } from "drizzle-zod";
import { z } from "zod";
import { schema } from "@/database";
import { MESSAGE_ROLES } from "@/database/schemas/message";

export const MessageRoleSchema = z.enum(MESSAGE_ROLES);

export const SelectMessageSchema = createSelectSchema(schema.messagesTable);

export type MessageRole = z.infer<typeof MessageRoleSchema>;
export type Message = z.infer<typeof SelectMessageSchema>;
