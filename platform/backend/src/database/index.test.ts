import fs from "node:fs";
import path from "node:path";
import BetterSqlite3 from "better-sqlite3";
import { openStore } from "@/models";
import { describe, expect, test } from "@/test";
import { Database } from "./index";

function columnNames(dbPath: string, table: string): string[] {
  const sqlite = new BetterSqlite3(dbPath, { readonly: true });
  try {
    return sqlite
      .prepare(`PRAGMA table_info(${table})`)
      .all()
      .map((row) =>
        typeof row === "object" && row !== null && "name" in row
          ? String(row.name)
          : "",
      );
  } finally {
    sqlite.close();
  }
}

describe("Database", () => {
  describe("open", () => {
    test("creates missing directories, the file and all tables", async ({
      tmpDir,
    }) => {
      const dbPath = path.join(tmpDir, "nested", "deeper", "prompts.db");

      const database = Database.open(dbPath);

      expect(database.path).toBe(dbPath);
      expect(fs.existsSync(dbPath)).toBe(true);
      const sqlite = new BetterSqlite3(dbPath, { readonly: true });
      const tables = sqlite
        .prepare(
          "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
        )
        .pluck()
        .all();
      sqlite.close();
      expect(tables).toEqual([
        "conversations",
        "generated_prompts",
        "messages",
        "prompt_documents",
      ]);
    });

    test("can be called again on an existing file without losing rows", async ({
      dbPath,
      makeDocument,
      makeConversation,
    }) => {
      await makeDocument({ name: "planner", priority: 7 });
      await makeConversation({ sessionId: "s1" });

      const reopened = openStore(dbPath);
      openStore(dbPath);

      expect(await reopened.documents.findByName("planner")).toMatchObject({
        priority: 7,
      });
      expect(
        await reopened.conversations.findActiveBySessionId("s1"),
      ).not.toBeNull();
    });

    test("adds columns missing from an older prompt_documents table", async ({
      tmpDir,
    }) => {
      const dbPath = path.join(tmpDir, "legacy.db");
      const legacy = new BetterSqlite3(dbPath);
      legacy.exec(`CREATE TABLE prompt_documents (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT UNIQUE NOT NULL,
        description TEXT,
        github_url TEXT,
        local_path TEXT,
        category TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      )`);
      legacy
        .prepare(
          "INSERT INTO prompt_documents (name, github_url, created_at, updated_at) VALUES (?, ?, ?, ?)",
        )
        .run(
          "legacy-prompt",
          "https://example.com/legacy.md",
          "2024-06-01T00:00:00.000Z",
          "2024-06-01T00:00:00.000Z",
        );
      legacy.close();

      const store = openStore(dbPath);

      expect(columnNames(dbPath, "prompt_documents")).toEqual([
        "id",
        "name",
        "description",
        "github_url",
        "local_path",
        "category",
        "created_at",
        "updated_at",
        "priority",
        "source_updated_at",
        "source_url",
      ]);
      expect(await store.documents.findByName("legacy-prompt")).toEqual({
        id: 1,
        name: "legacy-prompt",
        description: null,
        sourceUrl: "https://example.com/legacy.md",
        localPath: null,
        category: null,
        priority: 0,
        sourceUpdatedAt: null,
        createdAt: "2024-06-01T00:00:00.000Z",
        updatedAt: "2024-06-01T00:00:00.000Z",
      });

      // a second open finds nothing left to add
      openStore(dbPath);
      expect(columnNames(dbPath, "prompt_documents")).toHaveLength(11);
    });

    test("does not overwrite a source_url with the legacy column", async ({
      tmpDir,
    }) => {
      const dbPath = path.join(tmpDir, "legacy.db");
      const legacy = new BetterSqlite3(dbPath);
      legacy.exec(`CREATE TABLE prompt_documents (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT UNIQUE NOT NULL,
        github_url TEXT,
        source_url TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      )`);
      legacy
        .prepare(
          "INSERT INTO prompt_documents (name, github_url, source_url, created_at, updated_at) VALUES (?, ?, ?, ?, ?)",
        )
        .run(
          "moved",
          "https://example.com/old.md",
          "https://example.com/new.md",
          "2024-06-01T00:00:00.000Z",
          "2024-06-01T00:00:00.000Z",
        );
      legacy.close();

      const store = openStore(dbPath);

      expect(columnNames(dbPath, "prompt_documents")).toEqual([
        "id",
        "name",
        "github_url",
        "source_url",
        "created_at",
        "updated_at",
        "description",
        "local_path",
        "category",
        "priority",
        "source_updated_at",
      ]);
      expect(await store.documents.findByName("moved")).toEqual({
        id: 1,
        name: "moved",
        description: null,
        sourceUrl: "https://example.com/new.md",
        localPath: null,
        category: null,
        priority: 0,
        sourceUpdatedAt: null,
        createdAt: "2024-06-01T00:00:00.000Z",
        updatedAt: "2024-06-01T00:00:00.000Z",
      });
    });
  });

  describe("run", () => {
    test("enforces foreign keys", async ({ tmpDir }) => {
      const database = Database.open(path.join(tmpDir, "fk.db"));

      const enabled = database.run((db) =>
        db.$client.pragma("foreign_keys", { simple: true }),
      );

      expect(enabled).toBe(1);
    });
  });
});
