/**
 * Credential store: opaque user id -> Google credential bundle.
 *
 * The bundle is encrypted per user before it is written. Read paths only see
 * active rows; a deactivated id behaves exactly like one that never existed.
 */

import { z } from 'zod';
import { openForUser, sealForUser } from '../crypto';
import type { Db } from '../db';
import type { DbUser } from '../env';
import { AuthenticationError } from '../errors';

/**
 * Google OAuth credential bundle. Secret; never leaves the store except
 * through readCredential() for the refresh path.
 */
export interface GoogleCredential {
    accessToken: string;
    refreshToken: string | null;
    tokenUri: string;
    clientId: string;
    clientSecret: string;
    scopes: string[];
    /** Access token expiry in epoch ms; null when the provider gave none. */
    expiresAt: number | null;
}

/**
 * User as returned by queries. Holds the credential only in sealed form.
 */
export interface UserRecord {
    id: string;
    email: string;
    createdAt: number;
    lastUsedAt: number;
    active: boolean;
    sealedCredential: string;
}

export interface SaveUserOptions {
    id: string;
    email: string;
    credential: GoogleCredential;
    /** SESSION_SECRET used to seal the credential. */
    secret: string;
    now?: number;
}

/**
 * Insert or update a user.
 *
 * A conflict on id keeps the existing created_at and active flag, so a
 * refresh write-back can never resurrect a revoked user.
 */
export function saveUser(db: Db, options: SaveUserOptions): void {
    const { id, email, credential, secret, now = Date.now() } = options;
    const sealed = sealForUser(credential, secret, id);

    db.prepare(`
        INSERT INTO users (id, email, credentials, created_at, last_used_at, is_active)
        VALUES (?, ?, ?, ?, ?, 1)
        ON CONFLICT(id) DO UPDATE SET
            email = excluded.email,
            credentials = excluded.credentials,
            last_used_at = excluded.last_used_at
    `).run(id, email, sealed, now, now);
}

/**
 * Get an active user by id and record the access.
 *
 * The timestamp bump and the read are one statement.
 */
export function getUser(
    db: Db,
    userId: string,
    now: number = Date.now()
): UserRecord | null {
    if (!userId) {
        return null;
    }

    const row = db.prepare<[number, string], DbUser>(`
        UPDATE users SET last_used_at = MAX(last_used_at, ?)
        WHERE id = ? AND is_active = 1
        RETURNING *
    `).get(now, userId);

    return row ? mapDbUser(row) : null;
}

/**
 * Soft-delete a user. Idempotent; the row and its sealed credential stay.
 *
 * @returns true if an active user was deactivated by this call
 */
export function deactivateUser(db: Db, userId: string): boolean {
    const result = db.prepare(`
        UPDATE users SET is_active = 0 WHERE id = ? AND is_active = 1
    `).run(userId);

    return result.changes > 0;
}

/**
 * Decrypt and shape-check a user's credential bundle.
 *
 * @throws AuthenticationError if the bundle cannot be read with this secret
 */
export function readCredential(user: UserRecord, secret: string): GoogleCredential {
    let value: unknown;
    try {
        value = openForUser(user.sealedCredential, secret, user.id);
    } catch {
        throw new AuthenticationError(
            'Stored credentials could not be read. Please sign in again.'
        );
    }

    const credential = parseCredential(value);
    if (!credential) {
        throw new AuthenticationError(
            'Stored credentials are incomplete. Please sign in again.'
        );
    }
    return credential;
}

const storedCredentialSchema = z.object({
    accessToken: z.string(),
    refreshToken: z.string().nullable().catch(null),
    tokenUri: z.string(),
    clientId: z.string(),
    clientSecret: z.string(),
    scopes: z.array(z.unknown()).catch([])
        .transform((scopes) => scopes.filter((scope): scope is string => typeof scope === 'string')),
    expiresAt: z.number().nullable().catch(null),
});

function parseCredential(value: unknown): GoogleCredential | null {
    const parsed = storedCredentialSchema.safeParse(value);
    return parsed.success ? parsed.data : null;
}

/**
 * Map database row to UserRecord interface.
 */
function mapDbUser(row: DbUser): UserRecord {
    return {
        id: row.id,
        email: row.email,
        createdAt: row.created_at,
        lastUsedAt: row.last_used_at,
        active: row.is_active === 1,
        sealedCredential: row.credentials,
    };
}
