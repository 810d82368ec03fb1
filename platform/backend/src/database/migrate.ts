import type BetterSqlite3 from "better-sqlite3";
import { z } from "zod";
import logger from "@/logging";
import { isDuplicateColumnError } from "./utils/errors";

const CREATE_TABLES = [
  `CREATE TABLE IF NOT EXISTS prompt_documents (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT UNIQUE NOT NULL,
    description TEXT,
    source_url TEXT,
    local_path TEXT,
    category TEXT,
    priority INTEGER NOT NULL DEFAULT 0,
    source_updated_at TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS conversations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    session_id TEXT NOT NULL,
    started_at TEXT NOT NULL,
    ended_at TEXT,
    agent_name TEXT,
    status TEXT NOT NULL DEFAULT 'active'
  )`,
  `CREATE TABLE IF NOT EXISTS messages (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    conversation_id INTEGER NOT NULL,
    role TEXT NOT NULL,
    content TEXT NOT NULL,
    timestamp TEXT NOT NULL,
    FOREIGN KEY (conversation_id) REFERENCES conversations(id)
  )`,
  `CREATE TABLE IF NOT EXISTS generated_prompts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    conversation_id INTEGER,
    name TEXT NOT NULL,
    content TEXT NOT NULL,
    metadata TEXT,
    created_at TEXT NOT NULL,
    FOREIGN KEY (conversation_id) REFERENCES conversations(id)
  )`,
  "CREATE INDEX IF NOT EXISTS conversations_session_status_idx ON conversations (session_id, status)",
  "CREATE INDEX IF NOT EXISTS messages_conversation_id_idx ON messages (conversation_id)",
];

/**
 * Optional `prompt_documents` columns. Files that predate any of them get
 * them added in place; existing rows read them as null (priority as 0).
 */
const PROMPT_DOCUMENT_COLUMNS = [
  { name: "description", definition: "TEXT" },
  { name: "local_path", definition: "TEXT" },
  { name: "category", definition: "TEXT" },
  { name: "priority", definition: "INTEGER NOT NULL DEFAULT 0" },
  { name: "source_updated_at", definition: "TEXT" },
  { name: "source_url", definition: "TEXT" },
];

// earlier files stored the upstream location here
const LEGACY_SOURCE_URL_COLUMN = "github_url";

const TableInfoSchema = z.array(z.object({ name: z.string() }));

function getColumnNames(
  sqlite: BetterSqlite3.Database,
  table: string,
): Set<string> {
  const rows = TableInfoSchema.parse(
    sqlite.prepare(`PRAGMA table_info(${table})`).all(),
  );
  return new Set(rows.map((row) => row.name));
}

function addColumn(
  sqlite: BetterSqlite3.Database,
  table: string,
  column: string,
  definition: string,
): boolean {
  try {
    sqlite.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`);
    return true;
  } catch (error) {
    if (isDuplicateColumnError(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * Create missing tables and backfill missing optional columns. Additive only:
 * nothing is dropped, renamed or rewritten apart from copying a legacy
 * `github_url` into an empty `source_url`.
 */
export function ensureSchema(sqlite: BetterSqlite3.Database): void {
  sqlite.transaction(() => {
    for (const statement of CREATE_TABLES) {
      sqlite.exec(statement);
    }

    const existing = getColumnNames(sqlite, "prompt_documents");
    for (const { name, definition } of PROMPT_DOCUMENT_COLUMNS) {
      if (existing.has(name)) {
        continue;
      }
      if (addColumn(sqlite, "prompt_documents", name, definition)) {
        logger.info(
          { table: "prompt_documents", column: name },
          "[Database] Added missing column",
        );
      }
    }

    if (existing.has(LEGACY_SOURCE_URL_COLUMN)) {
      const { changes } = sqlite
        .prepare(
          `UPDATE prompt_documents SET source_url = ${LEGACY_SOURCE_URL_COLUMN}
           WHERE source_url IS NULL AND ${LEGACY_SOURCE_URL_COLUMN} IS NOT NULL`,
        )
        .run();
      if (changes > 0) {
        logger.info(
          { rows: changes },
          "[Database] Copied legacy github_url values into source_url",
        );
      }
    }
  })();
}
