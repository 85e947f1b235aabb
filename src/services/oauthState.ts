/**
 * CSRF state store for the Google OAuth flow.
 *
 * Each login attempt gets a single-use, time-boxed token. Verification is a
 * single DELETE ... RETURNING statement, so at most one caller can ever
 * consume a given value.
 */

import { generateStateToken } from '../crypto';
import type { Db } from '../db';
import type { DbOAuthState } from '../env';

/** State tokens older than this never verify (10 minutes). */
export const OAUTH_STATE_TTL_MS = 10 * 60 * 1000;

/**
 * Generate and persist a new state token.
 *
 * @returns The token to embed as the `state` parameter
 */
export function issueOAuthState(db: Db, now: number = Date.now()): string {
    const state = generateStateToken();

    db.prepare(`
        INSERT INTO oauth_states (state, created_at) VALUES (?, ?)
    `).run(state, now);

    return state;
}

/**
 * Verify and consume a state token.
 *
 * Unknown, already-consumed and expired tokens all return false. An expired
 * token is removed as part of the check.
 */
export function verifyAndConsumeOAuthState(
    db: Db,
    state: string,
    now: number = Date.now(),
    maxAgeMs: number = OAUTH_STATE_TTL_MS
): boolean {
    if (!state) {
        return false;
    }

    const row = db.prepare<[string], Pick<DbOAuthState, 'created_at'>>(`
        DELETE FROM oauth_states WHERE state = ? RETURNING created_at
    `).get(state);

    if (!row) {
        return false;
    }

    return now - row.created_at <= maxAgeMs;
}

/**
 * Delete every state token older than maxAgeMs.
 *
 * @returns Number of tokens removed
 */
export function purgeExpiredOAuthStates(
    db: Db,
    maxAgeMs: number = OAUTH_STATE_TTL_MS,
    now: number = Date.now()
): number {
    const result = db.prepare(`
        DELETE FROM oauth_states WHERE created_at < ?
    `).run(now - maxAgeMs);

    return result.changes;
}
