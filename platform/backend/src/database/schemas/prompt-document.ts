/* SPDX-License-Identifier: MIT */
import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

const nowIso = () => new Date().toISOString();

/**
 * Prompt Documents Table
 *
 * Catalog of reference system prompts. Rows are looked up by `name`, which is
 * unique; `localPath` points at the literal prompt text on disk.
 */
const promptDocumentsTable = sqliteTable("prompt_documents", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  name: text("name").notNull().unique(),
  description: text("description"),
  /** Where the prompt was published upstream */
  sourceUrl: text("source_url"),
  localPath: text("local_path"),
  category: text("category"),
  /** Higher is more important: 100 = primary reference, 90 = secondary, ... */
  priority: integer("priority").notNull().default(0),
  /** When the upstream source was last updated (ISO date) */
  sourceUpdatedAt: text("source_updated_at"),
  createdAt: text("created_at").notNull().$defaultFn(nowIso),
  updatedAt: text("updated_at")
    .notNull()
    .$defaultFn(nowIso)
    .$onUpdateFn(nowIso),
});

export default promptDocumentsTable;
