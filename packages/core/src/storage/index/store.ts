import type Database from "better-sqlite3";
import { StorageError, errorMessage } from "../../errors/catalog.js";
import type {
  ClearResult,
  IndexedFile,
  ReferenceIdentifier,
  ReferenceImportResult,
} from "./types.js";

/**
 * Durable record sets for scanned files and reference identifiers.
 *
 * Writes run inside transactions, so a concurrent snapshot read never sees a
 * half-applied batch. Duplicate inserts are skipped, never thrown.
 */
export interface IndexStore {
  /** Returns true when the path was new. */
  upsertFile(path: string, name: string, discoveredAt: string): boolean;
  /** Inserts a batch in one transaction; returns how many paths were new. */
  upsertFiles(files: readonly IndexedFile[]): number;
  /** Returns true when the identifier was new (case-insensitive). */
  upsertReferenceId(text: string, importedAt: string): boolean;
  upsertReferenceIds(
    texts: readonly string[],
    importedAt: string,
  ): ReferenceImportResult;
  listFiles(): IndexedFile[];
  listReferenceIds(): ReferenceIdentifier[];
  countFiles(): number;
  countReferenceIds(): number;
  clearAll(): ClearResult;
  close(): void;
}

interface FileRow {
  path: string;
  name: string;
  discovered_at: string;
}

interface ReferenceRow {
  text: string;
  imported_at: string;
}

interface ReferenceInsert extends ReferenceRow {
  text_key: string;
}

/**
 * Uniqueness key for an identifier. SQLite's NOCASE folds ASCII only, so
 * case is folded here for every script.
 */
export function identifierKey(text: string): string {
  return text.normalize("NFC").toLowerCase();
}

function rowToFile(row: FileRow): IndexedFile {
  return {
    path: row.path,
    name: row.name,
    discoveredAt: row.discovered_at,
  };
}

function guard<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof StorageError) throw err;
    throw new StorageError(
      `Index store failed to ${operation}: ${errorMessage(err)}`,
      { operation },
      { cause: err },
    );
  }
}

export function createIndexStore(db: Database.Database): IndexStore {
  const insertFileStmt = db.prepare<FileRow>(
    `INSERT OR IGNORE INTO indexed_files (path, name, discovered_at)
     VALUES (@path, @name, @discovered_at)`,
  );

  const insertReferenceStmt = db.prepare<ReferenceInsert>(
    `INSERT OR IGNORE INTO reference_ids (text, text_key, imported_at)
     VALUES (@text, @text_key, @imported_at)`,
  );

  const listFilesStmt = db.prepare<[], FileRow>(
    "SELECT path, name, discovered_at FROM indexed_files",
  );

  const listReferencesStmt = db.prepare<[], ReferenceRow>(
    "SELECT text, imported_at FROM reference_ids ORDER BY text_key",
  );

  const countFilesStmt = db.prepare<[], { cnt: number }>(
    "SELECT COUNT(*) AS cnt FROM indexed_files",
  );

  const countReferencesStmt = db.prepare<[], { cnt: number }>(
    "SELECT COUNT(*) AS cnt FROM reference_ids",
  );

  const deleteFilesStmt = db.prepare("DELETE FROM indexed_files");
  const deleteReferencesStmt = db.prepare("DELETE FROM reference_ids");

  const insertFiles = db.transaction((files: readonly IndexedFile[]) => {
    let inserted = 0;
    for (const file of files) {
      const result = insertFileStmt.run({
        path: file.path,
        name: file.name,
        discovered_at: file.discoveredAt,
      });
      inserted += result.changes;
    }
    return inserted;
  });

  const insertReferences = db.transaction(
    (texts: readonly string[], importedAt: string): ReferenceImportResult => {
      let inserted = 0;
      for (const text of texts) {
        inserted += insertReferenceStmt.run({
          text,
          text_key: identifierKey(text),
          imported_at: importedAt,
        }).changes;
      }
      return { inserted, skipped: texts.length - inserted };
    },
  );

  const clear = db.transaction((): ClearResult => {
    const files = deleteFilesStmt.run().changes;
    const referenceIds = deleteReferencesStmt.run().changes;
    return { files, referenceIds };
  });

  return {
    upsertFile(path, name, discoveredAt) {
      return guard("upsert file", () => {
        const result = insertFileStmt.run({
          path,
          name,
          discovered_at: discoveredAt,
        });
        return result.changes > 0;
      });
    },

    upsertFiles(files) {
      return guard("upsert files", () => insertFiles(files));
    },

    upsertReferenceId(text, importedAt) {
      return guard("upsert reference identifier", () => {
        const result = insertReferenceStmt.run({
          text,
          text_key: identifierKey(text),
          imported_at: importedAt,
        });
        return result.changes > 0;
      });
    },

    upsertReferenceIds(texts, importedAt) {
      return guard("upsert reference identifiers", () =>
        insertReferences(texts, importedAt),
      );
    },

    listFiles() {
      return guard("list files", () => listFilesStmt.all().map(rowToFile));
    },

    listReferenceIds() {
      return guard("list reference identifiers", () =>
        listReferencesStmt.all().map((row) => ({
          text: row.text,
          importedAt: row.imported_at,
        })),
      );
    },

    countFiles() {
      return guard("count files", () => countFilesStmt.get()?.cnt ?? 0);
    },

    countReferenceIds() {
      return guard(
        "count reference identifiers",
        () => countReferencesStmt.get()?.cnt ?? 0,
      );
    },

    clearAll() {
      return guard("clear the cache", () => clear());
    },

    close() {
      db.close();
    },
  };
}
