/**
 * Encryption of stored Google credentials.
 *
 * The key is derived with HKDF from the server's session secret, salted with
 * the user id, so every row is encrypted under its own key. AES-256-GCM
 * detects tampering on decrypt.
 */

import { createCipheriv, createDecipheriv, hkdfSync, randomBytes } from 'node:crypto';
import { CryptoValidationError } from '../errors';

/** Minimum SESSION_SECRET length (16 characters = 128 bits of ASCII). */
export const MIN_SECRET_LENGTH = 16;

const KEY_INFO = 'gsc-credential-encryption-v1';
const IV_LENGTH = 12;
const TAG_LENGTH = 16;

/**
 * Minimum encrypted data length: 12 (IV) + 16 (auth tag) + 1 (ciphertext) = 29 bytes
 */
const MIN_ENCRYPTED_LENGTH = IV_LENGTH + TAG_LENGTH + 1;

const BASE64URL = /^[A-Za-z0-9_-]+$/;

function requireNonEmpty(value: string, name: string): void {
    if (value.length === 0) {
        throw new CryptoValidationError(`${name} must not be empty`);
    }
}

/**
 * Length-prefix a string so ("ab", "c") and ("a", "bc") derive different keys.
 *
 * Format: 4-byte big-endian length + UTF-8 encoded string
 */
function lengthPrefix(str: string): Buffer {
    const bytes = Buffer.from(str, 'utf8');
    const prefix = Buffer.alloc(4);
    prefix.writeUInt32BE(bytes.length, 0);
    return Buffer.concat([prefix, bytes]);
}

/**
 * Derive the AES-256 key for one user's credential row.
 *
 * @param serverSecret SESSION_SECRET from configuration
 * @param userId Opaque user id (salt)
 */
export function deriveCredentialKey(serverSecret: string, userId: string): Buffer {
    if (serverSecret.length < MIN_SECRET_LENGTH) {
        throw new CryptoValidationError(`serverSecret must be at least ${MIN_SECRET_LENGTH} characters`);
    }
    requireNonEmpty(userId, 'userId');

    const derived = hkdfSync('sha256', serverSecret, lengthPrefix(userId), KEY_INFO, 32);
    return Buffer.from(derived);
}

/**
 * Encrypt a string with AES-256-GCM.
 *
 * @returns Base64url string: IV (12 bytes) + ciphertext + auth tag (16 bytes)
 */
export function encryptString(plaintext: string, key: Buffer): string {
    requireNonEmpty(plaintext, 'plaintext');

    // IV must never repeat under the same key
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv('aes-256-gcm', key, iv);
    const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);

    return Buffer.concat([iv, ciphertext, cipher.getAuthTag()]).toString('base64url');
}

/**
 * Decrypt a value produced by encryptString().
 *
 * @throws CryptoValidationError on malformed input, wrong key or tampering
 */
export function decryptString(encrypted: string, key: Buffer): string {
    if (!BASE64URL.test(encrypted)) {
        throw new CryptoValidationError('encrypted contains invalid base64url characters');
    }

    const combined = Buffer.from(encrypted, 'base64url');
    if (combined.length < MIN_ENCRYPTED_LENGTH) {
        throw new CryptoValidationError(
            `Encrypted data too short: expected at least ${MIN_ENCRYPTED_LENGTH} bytes, got ${combined.length}`
        );
    }

    const iv = combined.subarray(0, IV_LENGTH);
    const tag = combined.subarray(combined.length - TAG_LENGTH);
    const ciphertext = combined.subarray(IV_LENGTH, combined.length - TAG_LENGTH);

    try {
        const decipher = createDecipheriv('aes-256-gcm', key, iv);
        decipher.setAuthTag(tag);
        return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf8');
    } catch {
        throw new CryptoValidationError(
            'Decryption failed: data may be corrupted or key may be incorrect'
        );
    }
}

/**
 * Encrypt a JSON-serialisable value for one user.
 */
export function sealForUser(value: unknown, serverSecret: string, userId: string): string {
    return encryptString(JSON.stringify(value), deriveCredentialKey(serverSecret, userId));
}

/**
 * Decrypt a value sealed with sealForUser(). Shape checking is the caller's job.
 */
export function openForUser(sealed: string, serverSecret: string, userId: string): unknown {
    const json = decryptString(sealed, deriveCredentialKey(serverSecret, userId));
    try {
        return JSON.parse(json);
    } catch {
        throw new CryptoValidationError('Decrypted payload is not valid JSON');
    }
}
