import { desc, eq } from "drizzle-orm";
import { type Database, schema } from "@/database";
import type { GeneratedPrompt, InsertGeneratedPrompt } from "@/types";

const { generatedPromptsTable } = schema;

class GeneratedPromptModel {
  constructor(private readonly database: Database) {}

  async create(prompt: InsertGeneratedPrompt): Promise<GeneratedPrompt> {
    return this.database.run((db) =>
      db.insert(generatedPromptsTable).values(prompt).returning().get(),
    );
  }

  async findById(id: number): Promise<GeneratedPrompt | null> {
    const prompt = this.database.run((db) =>
      db
        .select()
        .from(generatedPromptsTable)
        .where(eq(generatedPromptsTable.id, id))
        .get(),
    );
    return prompt ?? null;
  }

  /**
   * Newest first; prompts saved in the same millisecond keep insertion order
   * reversed.
   */
  async findAll(): Promise<GeneratedPrompt[]> {
    return this.database.run((db) =>
      db
        .select()
        .from(generatedPromptsTable)
        .orderBy(
          desc(generatedPromptsTable.createdAt),
          desc(generatedPromptsTable.id),
        )
        .all(),
    );
  }
}

export default GeneratedPromptModel;
