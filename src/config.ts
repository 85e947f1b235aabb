/**
 * Environment configuration.
 *
 * Loading never throws: bad values are recorded as issues so the process can
 * start and the endpoints that need them answer with a configuration error.
 */

import { randomBytes } from 'node:crypto';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import { MIN_SECRET_LENGTH } from './crypto';

interface RawEnv {
    readonly [key: string]: string | undefined;
}

export interface ConfigIssue {
    key: string;
    message: string;
}

export interface GatewayConfig {
    port: number;
    baseUrl: string;
    databasePath: string;
    googleClientId: string | null;
    googleClientSecret: string | null;
    redirectUri: string | null;
    sessionSecret: string | null;
    /** True when no secret was configured and one was generated for this process. */
    sessionSecretGenerated: boolean;
    issues: ConfigIssue[];
}

export interface OAuthClientConfig {
    clientId: string;
    clientSecret: string;
    redirectUri: string;
}

export const DEFAULT_PORT = 8000;
export const DEFAULT_BASE_URL = 'http://localhost:8000';
export const DEFAULT_REDIRECT_URI = 'http://localhost:8000/oauth/callback';
export const DEFAULT_DATABASE_PATH = 'gsc_tokens.db';

const httpUrl = z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), 'must be an http(s) URL');

const portSchema = z.coerce.number().int().positive().max(65535);
const nonEmpty = z.string().trim().min(1);
const secretSchema = z.string().min(MIN_SECRET_LENGTH, `must be at least ${MIN_SECRET_LENGTH} characters`);

function readOptional<T>(
    env: RawEnv,
    key: string,
    schema: z.ZodType<T>,
    issues: ConfigIssue[]
): T | null {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') {
        return null;
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
        issues.push({ key, message: parsed.error.issues[0]?.message ?? 'invalid value' });
        return null;
    }
    return parsed.data;
}

function readRequired<T>(
    env: RawEnv,
    key: string,
    schema: z.ZodType<T>,
    issues: ConfigIssue[]
): T | null {
    const value = readOptional(env, key, schema, issues);
    if (value === null && !issues.some((issue) => issue.key === key)) {
        issues.push({ key, message: 'not set' });
    }
    return value;
}

/**
 * Load gateway configuration from environment variables.
 */
export function loadConfig(env: RawEnv = process.env): GatewayConfig {
    const issues: ConfigIssue[] = [];

    const port = readOptional(env, 'PORT', portSchema, issues) ?? DEFAULT_PORT;
    const baseUrl = (readOptional(env, 'BASE_URL', httpUrl, issues) ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    const databasePath = readOptional(env, 'DATABASE_PATH', nonEmpty, issues) ?? DEFAULT_DATABASE_PATH;

    const googleClientId = readRequired(env, 'GOOGLE_CLIENT_ID', nonEmpty, issues);
    const googleClientSecret = readRequired(env, 'GOOGLE_CLIENT_SECRET', nonEmpty, issues);

    const redirectIssuesBefore = issues.length;
    const configuredRedirect = readOptional(env, 'GOOGLE_REDIRECT_URI', httpUrl, issues);
    const redirectUri = configuredRedirect
        ?? (issues.length > redirectIssuesBefore ? null : DEFAULT_REDIRECT_URI);

    const secretKey = env.SESSION_SECRET !== undefined ? 'SESSION_SECRET' : 'SECRET_KEY';
    const secretIssuesBefore = issues.length;
    let sessionSecret = readOptional(env, secretKey, secretSchema, issues);
    let sessionSecretGenerated = false;
    if (sessionSecret === null && issues.length === secretIssuesBefore) {
        sessionSecret = randomBytes(32).toString('hex');
        sessionSecretGenerated = true;
    }

    return {
        port,
        baseUrl,
        databasePath,
        googleClientId,
        googleClientSecret,
        redirectUri,
        sessionSecret,
        sessionSecretGenerated,
        issues,
    };
}

/**
 * Return the OAuth client settings or throw naming every unusable key.
 */
export function requireOAuthClient(config: GatewayConfig): OAuthClientConfig {
    const missing: string[] = [];
    if (!config.googleClientId) missing.push('GOOGLE_CLIENT_ID');
    if (!config.googleClientSecret) missing.push('GOOGLE_CLIENT_SECRET');
    if (!config.redirectUri) missing.push('GOOGLE_REDIRECT_URI');

    if (!config.googleClientId || !config.googleClientSecret || !config.redirectUri) {
        throw new ConfigurationError(missing);
    }

    return {
        clientId: config.googleClientId,
        clientSecret: config.googleClientSecret,
        redirectUri: config.redirectUri,
    };
}

export function requireSessionSecret(config: GatewayConfig): string {
    if (!config.sessionSecret) {
        throw new ConfigurationError(['SESSION_SECRET']);
    }
    return config.sessionSecret;
}
