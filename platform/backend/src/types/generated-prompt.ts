import { createSelectSchema } from "drizzle-zod";
import type { z } from "zod";
import { schema } from "@/database";

export const SelectGeneratedPromptSchema = createSelectSchema(
  schema.generatedPromptsTable,
);

export type GeneratedPrompt = z.infer<typeof SelectGeneratedPromptSchema>;
export type InsertGeneratedPrompt = Omit<
  typeof schema.generatedPromptsTable.$inferInsert,
  "id" | "createdAt"
>;
