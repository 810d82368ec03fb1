import fs from "node:fs/promises";
import { asc, desc, eq } from "drizzle-orm";
import { type Database, schema } from "@/database";
import { isUniqueConstraintError } from "@/database/utils/errors";
import { DuplicateNameError } from "@/errors";
import logger from "@/logging";
import {
  type InsertPromptDocument,
  type PromptDocument,
  type PromptDocumentListOptions,
  type UpdatePromptDocument,
  UpdatePromptDocumentSchema,
} from "@/types";

function isMissingFileError(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

class PromptDocumentModel {
  constructor(private readonly database: Database) {}

  /**
   * Add a reference document. Throws DuplicateNameError when the name is
   * taken.
   */
  async create(document: InsertPromptDocument): Promise<PromptDocument> {
    try {
      return this.database.run((db) =>
        db
          .insert(schema.promptDocumentsTable)
          .values(document)
          .returning()
          .get(),
      );
    } catch (error) {
      if (isUniqueConstraintError(error)) {
        throw new DuplicateNameError(document.name, { cause: error });
      }
      throw error;
    }
  }

  async findByName(name: string): Promise<PromptDocument | null> {
    const document = this.database.run((db) =>
      db
        .select()
        .from(schema.promptDocumentsTable)
        .where(eq(schema.promptDocumentsTable.name, name))
        .get(),
    );

    return document ?? null;
  }

  /**
   * List documents, most important first.
   *
   * Without a category filter the order is priority (desc), category, name;
   * with one it is priority (desc), name.
   */
  async findAll(
    options: PromptDocumentListOptions = {},
  ): Promise<PromptDocument[]> {
    const { category, orderByPriority = true } = options;
    const table = schema.promptDocumentsTable;

    const order = category
      ? [asc(table.name)]
      : [asc(table.category), asc(table.name)];
    if (orderByPriority) {
      order.unshift(desc(table.priority));
    }

    return this.database.run((db) => {
      const query = db.select().from(table);
      if (category) {
        return query
          .where(eq(table.category, category))
          .orderBy(...order)
          .all();
      }
      return query.orderBy(...order).all();
    });
  }

  /**
   * Apply the allow-listed fields of `fields` to the named document.
   * Other keys are dropped. Returns false without writing when nothing
   * allow-listed is given, and false when the document does not exist.
   */
  async update(
    name: string,
    fields: UpdatePromptDocument | Readonly<Record<string, unknown>>,
  ): Promise<boolean> {
    const updates = UpdatePromptDocumentSchema.parse(fields);
    if (Object.values(updates).every((value) => value === undefined)) {
      return false;
    }

    const { changes } = this.database.run((db) =>
      db
        .update(schema.promptDocumentsTable)
        .set(updates)
        .where(eq(schema.promptDocumentsTable.name, name))
        .run(),
    );

    if (changes > 0) {
      logger.debug({ name }, "[PromptDocumentModel] Updated document");
    }
    return changes > 0;
  }

  async delete(name: string): Promise<boolean> {
    const { changes } = this.database.run((db) =>
      db
        .delete(schema.promptDocumentsTable)
        .where(eq(schema.promptDocumentsTable.name, name))
        .run(),
    );
    return changes > 0;
  }

  /**
   * Read the prompt text at the document's local path. Read from disk on
   * every call; null when the document, its path, or the file is missing.
   */
  async readContent(name: string): Promise<string | null> {
    const document = await this.findByName(name);
    if (!document?.localPath) {
      return null;
    }

    try {
      return await fs.readFile(document.localPath, "utf-8");
    } catch (error) {
      if (isMissingFileError(error)) {
        logger.debug(
          { name, localPath: document.localPath },
          "[PromptDocumentModel] Content file not found",
        );
        return null;
      }
      throw error;
    }
  }
}

export default PromptDocumentModel;
