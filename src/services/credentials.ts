/**
 * Credential refresh manager.
 *
 * Resolves an opaque id to a usable Google access token, refreshing it
 * lazily when the stored one has expired.
 *
 * Two concurrent resolves for the same user may both refresh. Both use the
 * same refresh token and whichever write lands last wins; Google issues
 * access tokens idempotently, so no lock is taken.
 */

import type { Db } from '../db';
import { AuthenticationError, RefreshError, errorMessage } from '../errors';
import { redactId, type Logger } from '../logger';
import {
    expiryFromNow,
    GoogleApiError,
    refreshGoogleAccessToken,
    type GoogleTokenResponse,
} from './google';
import { getUser, readCredential, saveUser, type GoogleCredential } from './user';

/** Refresh if the token expires within 5 minutes. */
export const TOKEN_EXPIRY_BUFFER_MS = 5 * 60 * 1000;

/**
 * Credential ready for a Search Console call.
 */
export interface LiveCredential {
    userId: string;
    email: string;
    accessToken: string;
    scopes: string[];
    expiresAt: number | null;
}

export interface ResolveCredentialsOptions {
    db: Db;
    userId: string;
    /** SESSION_SECRET used to open and re-seal the bundle. */
    secret: string;
    logger?: Logger;
    now?: number;
}

/**
 * True when the bundle's access token is expired or about to be.
 * A bundle without an expiry is never considered expired.
 */
export function isCredentialExpired(credential: GoogleCredential, now: number = Date.now()): boolean {
    if (credential.expiresAt === null) {
        return false;
    }
    return credential.expiresAt < now + TOKEN_EXPIRY_BUFFER_MS;
}

/**
 * Resolve a user's live credential.
 *
 * @throws AuthenticationError if the user is unknown, inactive or unreadable
 * @throws RefreshError if an expired token could not be refreshed
 */
export async function resolveCredentials(options: ResolveCredentialsOptions): Promise<LiveCredential> {
    const { db, userId, secret, logger } = options;
    const now = options.now ?? Date.now();

    const user = getUser(db, userId, now);
    if (!user) {
        throw new AuthenticationError('not authenticated');
    }

    const credential = readCredential(user, secret);

    if (!isCredentialExpired(credential, now) || !credential.refreshToken) {
        return toLiveCredential(user.id, user.email, credential);
    }

    let refreshed: GoogleTokenResponse;
    try {
        refreshed = await refreshGoogleAccessToken({
            refreshToken: credential.refreshToken,
            clientId: credential.clientId,
            clientSecret: credential.clientSecret,
            tokenUri: credential.tokenUri,
        });
    } catch (err) {
        logger?.warn('credentials_refresh_failed', {
            user: redactId(userId),
            status: err instanceof GoogleApiError ? err.status : undefined,
            error: errorMessage(err),
        });
        throw new RefreshError(
            `Google access could not be refreshed. Please sign in again. (${errorMessage(err)})`,
            err instanceof GoogleApiError ? err.status : undefined
        );
    }

    const updated: GoogleCredential = {
        ...credential,
        accessToken: refreshed.access_token,
        expiresAt: expiryFromNow(refreshed.expires_in, now),
    };

    saveUser(db, { id: user.id, email: user.email, credential: updated, secret, now });
    logger?.info('credentials_refreshed', { user: redactId(userId) });

    return toLiveCredential(user.id, user.email, updated);
}

function toLiveCredential(userId: string, email: string, credential: GoogleCredential): LiveCredential {
    return {
        userId,
        email,
        accessToken: credential.accessToken,
        scopes: credential.scopes,
        expiresAt: credential.expiresAt,
    };
}
