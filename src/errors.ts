/**
 * Domain errors for the gateway.
 *
 * Routes and the tool dispatcher translate these into HTTP statuses or
 * tool result text; none of them is allowed to escape a request handler.
 */

/**
 * Required configuration is missing or invalid.
 * Fatal to the request that needed it, never to the process.
 */
export class ConfigurationError extends Error {
    constructor(public readonly keys: readonly string[], message?: string) {
        super(message ?? `Missing or invalid configuration: ${keys.join(', ')}`);
        this.name = 'ConfigurationError';
    }
}

/**
 * OAuth state parameter was missing, unknown, expired or already used.
 * The message is the same for every cause.
 */
export class CsrfValidationError extends Error {
    constructor() {
        super('Invalid or expired authentication attempt. Please try again.');
        this.name = 'CsrfValidationError';
    }
}

/**
 * Authorization code exchange or account lookup failed.
 */
export class ProviderExchangeError extends Error {
    constructor(message: string, public readonly status?: number) {
        super(message);
        this.name = 'ProviderExchangeError';
    }
}

/**
 * The presented opaque id does not resolve to usable credentials.
 */
export class AuthenticationError extends Error {
    constructor(message = 'User not authenticated. Please login first.') {
        super(message);
        this.name = 'AuthenticationError';
    }
}

/**
 * The stored refresh token was rejected or the refresh call failed.
 * Does not deactivate the user; they re-authenticate themselves.
 */
export class RefreshError extends AuthenticationError {
    constructor(message: string, public readonly status?: number) {
        super(message);
        this.name = 'RefreshError';
    }
}

/**
 * A crypto helper was given a malformed secret, id or ciphertext, or
 * decryption failed.
 */
export class CryptoValidationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CryptoValidationError';
    }
}

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(err: unknown): string {
    if (err instanceof Error) {
        return err.message;
    }
    return typeof err === 'string' ? err : 'Unknown error';
}
