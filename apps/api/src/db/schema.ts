import Database from "better-sqlite3";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = dirname(fileURLToPath(import.meta.url));
const DEFAULT_DB_PATH = join(__dirname, "../../../../data/ipam.db");

let db: Database.Database | null = null;

const SCHEMA = `
-- Load balancer service records
CREATE TABLE IF NOT EXISTS services (
  uid TEXT PRIMARY KEY,
  namespace TEXT NOT NULL,
  name TEXT NOT NULL,
  labels JSON NOT NULL,
  assigned_address TEXT NOT NULL DEFAULT '',
  status JSON NOT NULL,
  resource_version INTEGER NOT NULL DEFAULT 1,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  UNIQUE(namespace, name)
);

-- Keyed configuration documents (pool definitions)
CREATE TABLE IF NOT EXISTS config_documents (
  namespace TEXT NOT NULL,
  name TEXT NOT NULL,
  data JSON NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  PRIMARY KEY (namespace, name)
);

CREATE INDEX IF NOT EXISTS idx_services_namespace ON services(namespace);
`;

/**
 * Initialize the database connection and schema
 */
export function initializeDatabase(dbPath?: string): Database.Database {
  const path = dbPath ?? process.env.DATABASE_PATH ?? DEFAULT_DB_PATH;

  db = new Database(path);
  db.pragma("journal_mode = WAL");

  db.exec(SCHEMA);

  console.log(`Database initialized at ${path}`);
  return db;
}

/**
 * Get the database instance
 */
export function getDatabase(): Database.Database {
  if (!db) {
    throw new Error("Database not initialized. Call initializeDatabase() first.");
  }
  return db;
}

/**
 * Close the database connection
 */
export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}
