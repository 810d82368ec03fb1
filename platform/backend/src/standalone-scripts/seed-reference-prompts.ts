import fs from "node:fs/promises";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { z } from "zod";
import config from "@/config";
import { DuplicateNameError } from "@/errors";
import logger from "@/logging";
import { openStore, type Store } from "@/models";
import {
  InsertPromptDocumentSchema,
  type InsertPromptDocument,
  type PromptDocument,
} from "@/types";

const ReferenceCatalogSchema = z.array(InsertPromptDocumentSchema);

export const DEFAULT_CATALOG_URL = new URL(
  "./reference-prompts.json",
  import.meta.url,
);

export async function loadReferenceCatalog(
  catalogUrl: URL = DEFAULT_CATALOG_URL,
): Promise<InsertPromptDocument[]> {
  const raw = await fs.readFile(catalogUrl, "utf-8");
  return ReferenceCatalogSchema.parse(JSON.parse(raw));
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Insert catalog entries whose name is not in the store yet. Relative
 * `localPath` values are resolved against `referencesDir`; an entry whose
 * file is not there is skipped.
 */
export async function seedReferencePrompts(
  store: Store,
  entries: InsertPromptDocument[],
  referencesDir: string = config.references.dir,
): Promise<{ added: string[]; skipped: string[] }> {
  const added: string[] = [];
  const skipped: string[] = [];

  for (const entry of entries) {
    const localPath = entry.localPath
      ? path.resolve(referencesDir, entry.localPath)
      : entry.localPath;

    if (localPath && !(await fileExists(localPath))) {
      logger.warn(
        { name: entry.name, localPath },
        "Prompt file not found, skipped",
      );
      skipped.push(entry.name);
      continue;
    }

    try {
      await store.documents.create({ ...entry, localPath });
      added.push(entry.name);
    } catch (error) {
      if (error instanceof DuplicateNameError) {
        logger.info({ name: entry.name }, "Already present, skipped");
        skipped.push(entry.name);
        continue;
      }
      throw error;
    }
  }

  return { added, skipped };
}

/**
 * Document names per category, keeping the order of `documents`.
 * Uncategorized documents are listed under "uncategorized".
 */
export function groupByCategory(
  documents: PromptDocument[],
): Map<string, string[]> {
  const groups = new Map<string, string[]>();
  for (const { name, category } of documents) {
    const key = category ?? "uncategorized";
    groups.set(key, [...(groups.get(key) ?? []), name]);
  }
  return groups;
}

async function main() {
  const store = openStore();
  const entries = await loadReferenceCatalog();

  logger.info(
    { database: store.database.path, entries: entries.length },
    "Seeding reference prompts...",
  );
  const { added, skipped } = await seedReferencePrompts(store, entries);
  logger.info(
    { added: added.length, skipped: skipped.length },
    "✅ Reference prompts seeded",
  );

  const catalog = await store.documents.findAll();
  for (const [category, names] of groupByCategory(catalog)) {
    logger.info({ category, prompts: names }, "Reference prompts by priority");
  }
}

/**
 * CLI entry point for seeding the database
 */
if (import.meta.url === pathToFileURL(process.argv[1]).href) {
  main()
    .then(() => {
      process.exit(0);
    })
    .catch((error) => {
      logger.error({ err: error }, "❌ Error seeding reference prompts");
      process.exit(1);
    });
}
