/**
 * Database connection setup.
 */

import Database from 'better-sqlite3';
import { MIGRATIONS, applyMigration } from './schema';

export type Db = Database.Database;

/**
 * Open (or create) the SQLite database and apply the schema.
 *
 * @param path File path, or ':memory:' for tests
 */
export function openDatabase(path: string): Db {
    const db = new Database(path);
    if (path !== ':memory:') {
        db.pragma('journal_mode = WAL');
    }
    db.pragma('busy_timeout = 5000');

    for (const migration of MIGRATIONS) {
        applyMigration(migration, db);
    }

    return db;
}

export * from './schema';
