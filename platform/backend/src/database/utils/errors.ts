import BetterSqlite3 from "better-sqlite3";

/**
 * Find the SQLite error behind `error`. Drizzle may wrap driver errors, so
 * the `cause` chain is followed.
 */
function findSqliteError(
  error: unknown,
): { code: string; message: string } | null {
  let current: unknown = error;
  while (current instanceof Error) {
    if (current instanceof BetterSqlite3.SqliteError) {
      return { code: current.code, message: current.message };
    }
    current = current.cause;
  }
  return null;
}

export function isUniqueConstraintError(error: unknown): boolean {
  return findSqliteError(error)?.code === "SQLITE_CONSTRAINT_UNIQUE";
}

export function isDuplicateColumnError(error: unknown): boolean {
  const sqliteError = findSqliteError(error);
  return (
    sqliteError !== null &&
    sqliteError.message.startsWith("duplicate column name")
  );
}
