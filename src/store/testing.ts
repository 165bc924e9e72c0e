/**
 * In-memory store for tests. Each call gets its own private database.
 */
import type Database from "better-sqlite3";

import { ensureSchema, openDatabase } from "./migrate.js";
import { type Store, createStore } from "./service.js";

export function createMemoryStore(): { db: Database.Database; store: Store } {
  const db = openDatabase(":memory:")._unsafeUnwrap();
  ensureSchema(db)._unsafeUnwrap();
  return { db, store: createStore(db) };
}
