/**
 * SQLite schema for the credential store and the OAuth state store.
 */

export interface Migration {
    readonly id: string;
    readonly statements: ReadonlyArray<string>;
}

export interface SqlExecutor {
    exec(sql: string): unknown;
}

const USERS_TABLE = `
CREATE TABLE IF NOT EXISTS users (
    id TEXT PRIMARY KEY,
    email TEXT NOT NULL,
    credentials TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    last_used_at INTEGER NOT NULL,
    is_active INTEGER NOT NULL DEFAULT 1
);
`.trim();

const OAUTH_STATES_TABLE = `
CREATE TABLE IF NOT EXISTS oauth_states (
    state TEXT PRIMARY KEY,
    created_at INTEGER NOT NULL
);
`.trim();

const OAUTH_STATES_CREATED_INDEX = `
CREATE INDEX IF NOT EXISTS idx_oauth_states_created_at ON oauth_states (created_at);
`.trim();

export const INITIAL_MIGRATION: Migration = {
    id: '0001_initial',
    statements: [USERS_TABLE, OAUTH_STATES_TABLE, OAUTH_STATES_CREATED_INDEX],
};

export const MIGRATIONS: ReadonlyArray<Migration> = [INITIAL_MIGRATION];

export function applyMigration(migration: Migration, executor: SqlExecutor): void {
    for (const statement of migration.statements) {
        executor.exec(statement);
    }
}
