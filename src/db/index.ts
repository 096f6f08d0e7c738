// src/db/index.ts
import fs from "node:fs";
import path from "node:path";
import initSqlJs, { type Database, type SqlJsStatic } from "sql.js";
import { drizzle, type SQLJsDatabase } from "drizzle-orm/sql-js";
import * as schema from "./schema";
import { ensureSchema } from "./migrate";
import { StorageError } from "../utils/errors";

export type AppDatabase = SQLJsDatabase<typeof schema>;

/** The query surface shared by the database and its transactions. */
export type DbExecutor = Pick<AppDatabase, "select" | "insert" | "update" | "delete">;

export interface DatabaseHandle {
  db: AppDatabase;
  sqlite: Database;
  /** Writes the database image back to its file. Does nothing for ":memory:". */
  save: () => void;
  /** Saves, then releases the database. */
  close: () => void;
}

export const IN_MEMORY = ":memory:";

let engine: Promise<SqlJsStatic> | undefined;

const loadEngine = (): Promise<SqlJsStatic> => {
  if (!engine) engine = initSqlJs();
  return engine;
};

const reasonOf = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

// Connection pragmas do not survive export(), which reopens the database.
const applyPragmas = (sqlite: Database): void => {
  sqlite.run("PRAGMA foreign_keys = ON");
};

/**
 * Loads the SQLite file at `filePath` (creating it if needed) and applies the schema.
 * The database lives in memory; call `save` to write it back.
 * Pass ":memory:" for a throwaway database.
 */
export const openDatabase = async (filePath: string): Promise<DatabaseHandle> => {
  const file = filePath === IN_MEMORY ? null : path.resolve(filePath);
  let sqlite: Database;
  try {
    const SQL = await loadEngine();
    if (file) {
      fs.mkdirSync(path.dirname(file), { recursive: true });
    }
    sqlite = file && fs.existsSync(file) ? new SQL.Database(fs.readFileSync(file)) : new SQL.Database();
    applyPragmas(sqlite);
    ensureSchema(sqlite);
  } catch (error) {
    throw new StorageError(`Unable to open database at ${filePath}: ${reasonOf(error)}`, error);
  }

  const save = (): void => {
    if (!file) return;
    try {
      const image = sqlite.export();
      applyPragmas(sqlite);
      const pending = `${file}.tmp`;
      fs.writeFileSync(pending, image);
      fs.renameSync(pending, file);
    } catch (error) {
      throw new StorageError(`Unable to save database to ${filePath}: ${reasonOf(error)}`, error);
    }
  };

  save();
  const db = drizzle(sqlite, { schema });
  return {
    db,
    sqlite,
    save,
    close: () => {
      try {
        save();
      } finally {
        sqlite.close();
      }
    },
  };
};

export { schema };
