/* SPDX-License-Identifier: MIT */
import {
  createInsertSchema,
  createSelectSchema,
  createUpdateSchema,
} from "drizzle-zod";
import type { z } from "zod";
import { schema } from "@/database";

export const SelectPromptDocumentSchema = createSelectSchema(
  schema.promptDocumentsTable,
);

export const InsertPromptDocumentSchema = createInsertSchema(
  schema.promptDocumentsTable,
).omit({
  id: true,
  createdAt: true,
  updatedAt: true,
});

/**
 * Fields a caller may change on an existing document. Keys outside this set
 * are stripped on parse.
 */
export const UpdatePromptDocumentSchema = createUpdateSchema(
  schema.promptDocumentsTable,
).pick({
  description: true,
  sourceUrl: true,
  localPath: true,
  category: true,
  priority: true,
  sourceUpdatedAt: true,
});

export type PromptDocument = z.infer<typeof SelectPromptDocumentSchema>;
export type InsertPromptDocument = Omit<
  typeof schema.promptDocumentsTable.$inferInsert,
  "id" | "createdAt" | "updatedAt"
>;
export type UpdatePromptDocument = z.infer<typeof UpdatePromptDocumentSchema>;

export interface PromptDocumentListOptions {
  category?: string;
  /** When false, order by category and name only. Defaults to true. */
  orderByPriority?: boolean;
}
