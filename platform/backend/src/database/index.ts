import fs from "node:fs";
import path from "node:path";
import BetterSqlite3 from "better-sqlite3";
import {
  type BetterSQLite3Database,
  drizzle,
} from "drizzle-orm/better-sqlite3";
import logger from "@/logging";
import { ensureSchema } from "./migrate";
import * as schema from "./schemas";

export type Connection = BetterSQLite3Database<typeof schema> & {
  $client: BetterSqlite3.Database;
};

/**
 * Handle on a SQLite database file.
 *
 * No connection is held between calls: `run` opens one, enables foreign-key
 * enforcement, hands a drizzle instance to the callback and closes the
 * connection before returning. Callbacks must be synchronous; every statement
 * has finished (and been committed) when `run` returns.
 *
 * Usage:
 * ```typescript
 * const database = Database.open("data/prompts.db");
 * const rows = database.run((db) =>
 *   db.select().from(schema.promptDocumentsTable).all(),
 * );
 * ```
 */
export class Database {
  private constructor(readonly path: string) {}

  /**
   * Create the file and its parent directories if needed, then bring the
   * schema up to date. Safe to call any number of times on the same path.
   */
  static open(dbPath: string): Database {
    const resolved = path.resolve(dbPath);
    fs.mkdirSync(path.dirname(resolved), { recursive: true });

    const database = new Database(resolved);
    database.withSqlite(ensureSchema);

    logger.debug({ path: resolved }, "[Database] Opened");
    return database;
  }

  run<T>(fn: (db: Connection) => T): T {
    return this.withSqlite((sqlite) => fn(drizzle(sqlite, { schema })));
  }

  private withSqlite<T>(fn: (sqlite: BetterSqlite3.Database) => T): T {
    const sqlite = new BetterSqlite3(this.path);
    try {
      sqlite.pragma("foreign_keys = ON");
      return fn(sqlite);
    } finally {
      sqlite.close();
    }
  }
}

export { schema };
