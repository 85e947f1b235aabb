/**
 * Cryptographic utilities for the gateway.
 */

export * from './tokens';
export * from './encryption';
