import Database from 'better-sqlite3'
import { StorageError, errorMessage } from '../../errors/catalog.js'

const CREATE_TABLES_SQL = [
  `CREATE TABLE IF NOT EXISTS indexed_files (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  path TEXT NOT NULL UNIQUE,
  name TEXT NOT NULL,
  discovered_at TEXT NOT NULL
)`,
  `CREATE TABLE IF NOT EXISTS reference_ids (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  text TEXT NOT NULL,
  text_key TEXT NOT NULL UNIQUE,
  imported_at TEXT NOT NULL
)`,
]

const CREATE_INDEXES_SQL = [
  'CREATE INDEX IF NOT EXISTS idx_indexed_files_name ON indexed_files (name)',
]

/**
 * Open/create the SQLite index, run CREATE TABLE IF NOT EXISTS, set WAL mode.
 * Unreadable or corrupt files surface as StorageError.
 */
export function initializeDatabase(dbPath: string): Database.Database {
  let db: Database.Database | undefined
  try {
    db = new Database(dbPath)

    db.pragma('journal_mode = WAL')
    db.pragma('busy_timeout = 5000')

    for (const sql of [...CREATE_TABLES_SQL, ...CREATE_INDEXES_SQL]) {
      db.exec(sql)
    }

    return db
  } catch (err) {
    db?.close()
    throw new StorageError(
      `Failed to open index database at ${dbPath}: ${errorMessage(err)}`,
      { dbPath },
      { cause: err },
    )
  }
}
