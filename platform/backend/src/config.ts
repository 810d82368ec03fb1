import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const LogLevelSchema = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

const EnvSchema = z.object({
  PROMPT_BUILDER_DATA_DIR: z.string().min(1).default("data"),
  PROMPT_BUILDER_DB_PATH: z.string().min(1).optional(),
  PROMPT_BUILDER_REFERENCES_DIR: z
    .string()
    .min(1)
    .default(path.join("prompts", "references")),
  PROMPT_BUILDER_CONTEXT_LIMIT: z.coerce.number().int().positive().default(10),
  LOG_LEVEL: LogLevelSchema.default("info"),
});

export type LogLevel = z.infer<typeof LogLevelSchema>;

export interface DatabaseConfig {
  /** Path of the SQLite file; parent directories are created on open */
  path: string;
}

export interface SessionConfig {
  /** Number of messages rendered into the agent's conversation context */
  contextLimit: number;
}

export interface Config {
  dataDir: string;
  database: DatabaseConfig;
  references: {
    /** Base directory for relative `localPath` values in the seed catalog */
    dir: string;
  };
  session: SessionConfig;
  logging: {
    level: LogLevel;
  };
}

export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const parsed = EnvSchema.parse(env);
  const dataDir = path.resolve(parsed.PROMPT_BUILDER_DATA_DIR);

  return {
    dataDir,
    database: {
      path: path.resolve(
        parsed.PROMPT_BUILDER_DB_PATH ?? path.join(dataDir, "prompts.db"),
      ),
    },
    references: {
      dir: path.resolve(parsed.PROMPT_BUILDER_REFERENCES_DIR),
    },
    session: {
      contextLimit: parsed.PROMPT_BUILDER_CONTEXT_LIMIT,
    },
    logging: {
      level: parsed.LOG_LEVEL,
    },
  };
}

const config: Config = parseConfig(process.env);

export default config;
