import { getDatabase } from "../schema.js";
import type { ConfigurationSnapshot } from "@lb-ipam/shared";

interface ConfigDocumentRow {
  data: string;
}

/**
 * Get the data of a configuration document
 */
export function getConfigDocument(name: string, namespace: string): ConfigurationSnapshot | null {
  const db = getDatabase();
  const stmt = db.prepare("SELECT data FROM config_documents WHERE namespace = ? AND name = ?");
  const row = stmt.get(namespace, name) as ConfigDocumentRow | undefined;
  return row ? Object.freeze(JSON.parse(row.data) as Record<string, string>) : null;
}

/**
 * Create a configuration document unless it already exists, and return
 * the stored data. An existing document is never overwritten.
 */
export function ensureConfigDocument(
  name: string,
  namespace: string,
  initialData: Record<string, string> = {}
): ConfigurationSnapshot {
  const db = getDatabase();
  const now = new Date().toISOString();

  const stmt = db.prepare(`
    INSERT INTO config_documents (namespace, name, data, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?)
    ON CONFLICT (namespace, name) DO NOTHING
  `);

  const result = stmt.run(namespace, name, JSON.stringify(initialData), now, now);
  if (result.changes > 0) {
    console.log(`Created configuration document [${namespace}/${name}]`);
  }

  const document = getConfigDocument(name, namespace);
  if (!document) {
    throw new Error(`Configuration document [${namespace}/${name}] missing after create`);
  }
  return document;
}

