/**
 * Random identifier generation.
 */

import { randomBytes } from 'node:crypto';
import { CryptoValidationError } from '../errors';

const MAX_TOKEN_BYTES = 256;

/** Entropy of an opaque user id (matches 160-bit bearer keys). */
export const USER_ID_BYTES = 20;

/** Entropy of an OAuth state token. */
export const STATE_TOKEN_BYTES = 32;

/**
 * Generate a cryptographically secure random token.
 *
 * @param bytes Number of random bytes (default 32 = 256 bits)
 * @returns Base64url-encoded token string
 * @throws CryptoValidationError if bytes is invalid
 */
export function generateToken(bytes: number = 32): string {
    if (!Number.isInteger(bytes) || bytes <= 0 || bytes > MAX_TOKEN_BYTES) {
        throw new CryptoValidationError(`bytes must be an integer from 1 to ${MAX_TOKEN_BYTES}, got ${bytes}`);
    }
    return randomBytes(bytes).toString('base64url');
}

/**
 * Generate a single-use CSRF state value for an authorization redirect.
 */
export function generateStateToken(): string {
    return generateToken(STATE_TOKEN_BYTES);
}

/**
 * Generate the opaque id handed to a user after sign-in.
 *
 * Drawn independently of state tokens; it is both the lookup key and the
 * bearer credential for the streaming endpoint.
 */
export function generateUserId(): string {
    return generateToken(USER_ID_BYTES);
}
