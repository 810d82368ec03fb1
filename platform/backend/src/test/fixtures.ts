/**
 * biome-ignore-all lint/correctness/noEmptyPattern: oddly enough in extend below this is required
 * see https://vitest.dev/guide/test-context.html#extend-test-context
 */
import { randomUUID } from "node:crypto";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import BetterSqlite3 from "better-sqlite3";
import { test as baseTest } from "vitest";
import { openStore, type Store } from "@/models";
import { SessionManager } from "@/session";
import type {
  Conversation,
  InsertPromptDocument,
  Message,
  MessageRole,
  PromptDocument,
} from "@/types";

/**
 * Vitest test extension with fixtures
 * https://vitest.dev/guide/test-context.html#extend-test-context
 */
interface TestFixtures {
  /** Scratch directory removed after the test */
  tmpDir: string;
  dbPath: string;
  store: Store;
  /** Direct connection to the store's file, for writing rows the models would refuse */
  rawSqlite: BetterSqlite3.Database;
  sessions: SessionManager;
  makeDocument: (
    overrides?: Partial<InsertPromptDocument>,
  ) => Promise<PromptDocument>;
  makeConversation: (overrides?: {
    sessionId?: string;
    agentName?: string;
  }) => Promise<Conversation>;
  makeMessage: (
    conversationId: number,
    overrides?: { role?: MessageRole; content?: string },
  ) => Promise<Message>;
}

export const test = baseTest.extend<TestFixtures>({
  tmpDir: async ({}, use) => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "prompt-builder-"));
    await use(dir);
    fs.rmSync(dir, { recursive: true, force: true });
  },
  dbPath: async ({ tmpDir }, use) => {
    await use(path.join(tmpDir, "data", "prompts.db"));
  },
  store: async ({ dbPath }, use) => {
    await use(openStore(dbPath));
  },
  rawSqlite: async ({ store }, use) => {
    const sqlite = new BetterSqlite3(store.database.path);
    await use(sqlite);
    sqlite.close();
  },
  sessions: async ({ store }, use) => {
    await use(new SessionManager(store));
  },
  makeDocument: async ({ store }, use) => {
    /**
     * Creates a prompt document with a unique name unless one is given
     */
    await use(async (overrides = {}) =>
      store.documents.create({
        name: `test-prompt-${randomUUID().substring(0, 8)}`,
        ...overrides,
      }),
    );
  },
  makeConversation: async ({ store }, use) => {
    await use(async (overrides = {}) =>
      store.conversations.create(
        overrides.sessionId ?? `session-${randomUUID().substring(0, 8)}`,
        overrides.agentName,
      ),
    );
  },
  makeMessage: async ({ store }, use) => {
    await use(async (conversationId, overrides = {}) =>
      store.messages.create(
        conversationId,
        overrides.role ?? "user",
        overrides.content ?? "Test message",
      ),
    );
  },
});
