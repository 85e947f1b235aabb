/**
 * Google identity-provider calls: authorization URL, code exchange,
 * userinfo and access-token refresh.
 */

import { z } from 'zod';

export const GOOGLE_AUTH_URI = 'https://accounts.google.com/o/oauth2/auth';
export const GOOGLE_TOKEN_URI = 'https://oauth2.googleapis.com/token';
export const GOOGLE_USERINFO_URI = 'https://www.googleapis.com/oauth2/v2/userinfo';

/**
 * Scopes requested at sign-in: Search Console read/write and read-only,
 * account email, Indexing API, OpenID.
 */
export const GOOGLE_SCOPES = [
    'https://www.googleapis.com/auth/webmasters',
    'https://www.googleapis.com/auth/webmasters.readonly',
    'https://www.googleapis.com/auth/userinfo.email',
    'https://www.googleapis.com/auth/indexing',
    'openid',
] as const;

const tokenResponseSchema = z.object({
    access_token: z.string().min(1),
    expires_in: z.number().optional(),
    refresh_token: z.string().optional(),
    scope: z.string().optional(),
    token_type: z.string().optional(),
    id_token: z.string().optional(),
});

const userInfoSchema = z.object({
    id: z.string().optional(),
    email: z.string().optional(),
    verified_email: z.boolean().optional(),
});

/** Token endpoint error, or an API error envelope from userinfo. */
const errorBodySchema = z.object({
    error: z.union([z.string(), z.object({ message: z.string() })]).optional(),
    error_description: z.string().optional(),
});

/**
 * Google OAuth token response.
 */
export type GoogleTokenResponse = z.infer<typeof tokenResponseSchema>;

/**
 * Google account from the userinfo endpoint.
 */
export type GoogleUserInfo = z.infer<typeof userInfoSchema>;

/**
 * Error thrown when a Google identity endpoint call fails.
 */
export class GoogleApiError extends Error {
    constructor(
        public readonly status: number,
        public readonly body: unknown,
        message: string
    ) {
        super(message);
        this.name = 'GoogleApiError';
    }
}

export interface AuthorizationUrlOptions {
    clientId: string;
    redirectUri: string;
    state: string;
    scopes?: readonly string[];
}

/**
 * Build the Google authorization URL for an offline, consent-forced login.
 */
export function buildAuthorizationUrl(options: AuthorizationUrlOptions): string {
    const params = new URLSearchParams({
        response_type: 'code',
        client_id: options.clientId,
        redirect_uri: options.redirectUri,
        scope: (options.scopes ?? GOOGLE_SCOPES).join(' '),
        state: options.state,
        access_type: 'offline',
        include_granted_scopes: 'true',
        prompt: 'consent',
    });

    return `${GOOGLE_AUTH_URI}?${params}`;
}

/**
 * Pull Google's human-readable error out of a token/userinfo error body.
 */
function describeError(body: unknown, fallback: string): string {
    const parsed = errorBodySchema.safeParse(body);
    if (!parsed.success) {
        return fallback;
    }
    const { error, error_description: description } = parsed.data;
    if (description) {
        return typeof error === 'string' ? `${error}: ${description}` : description;
    }
    if (typeof error === 'string') {
        return error;
    }
    return error?.message ?? fallback;
}

function parseTokenResponse(body: unknown, context: string): GoogleTokenResponse {
    const parsed = tokenResponseSchema.safeParse(body);
    if (!parsed.success) {
        throw new GoogleApiError(200, body, `${context}: unexpected token response`);
    }
    return parsed.data;
}

async function postTokenEndpoint(
    tokenUri: string,
    params: Record<string, string>,
    context: string
): Promise<GoogleTokenResponse> {
    const response = await fetch(tokenUri, {
        method: 'POST',
        headers: {
            'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: new URLSearchParams(params).toString(),
    });

    if (!response.ok) {
        const errorBody = await response.json().catch(() => null);
        throw new GoogleApiError(
            response.status,
            errorBody,
            `${context} failed (${response.status}): ${describeError(errorBody, response.statusText)}`
        );
    }

    return parseTokenResponse(await response.json(), context);
}

export interface ExchangeCodeOptions {
    code: string;
    clientId: string;
    clientSecret: string;
    redirectUri: string;
    tokenUri?: string;
}

/**
 * Exchange an authorization code for tokens.
 */
export async function exchangeGoogleCode(options: ExchangeCodeOptions): Promise<GoogleTokenResponse> {
    return postTokenEndpoint(
        options.tokenUri ?? GOOGLE_TOKEN_URI,
        {
            code: options.code,
            client_id: options.clientId,
            client_secret: options.clientSecret,
            redirect_uri: options.redirectUri,
            grant_type: 'authorization_code',
        },
        'Token exchange'
    );
}

/**
 * Fetch the signed-in account's profile.
 */
export async function fetchGoogleUserInfo(accessToken: string): Promise<GoogleUserInfo> {
    const response = await fetch(GOOGLE_USERINFO_URI, {
        headers: {
            Authorization: `Bearer ${accessToken}`,
        },
    });

    if (!response.ok) {
        const errorBody = await response.json().catch(() => null);
        throw new GoogleApiError(
            response.status,
            errorBody,
            `Failed to fetch account info (${response.status}): ${describeError(errorBody, response.statusText)}`
        );
    }

    const parsed = userInfoSchema.safeParse(await response.json());
    if (!parsed.success) {
        throw new GoogleApiError(response.status, null, 'Failed to fetch account info: unexpected response');
    }
    return parsed.data;
}

export interface RefreshTokenOptions {
    refreshToken: string;
    clientId: string;
    clientSecret: string;
    tokenUri?: string;
}

/**
 * Obtain a new access token with a stored refresh token.
 */
export async function refreshGoogleAccessToken(options: RefreshTokenOptions): Promise<GoogleTokenResponse> {
    return postTokenEndpoint(
        options.tokenUri ?? GOOGLE_TOKEN_URI,
        {
            client_id: options.clientId,
            client_secret: options.clientSecret,
            grant_type: 'refresh_token',
            refresh_token: options.refreshToken,
        },
        'Token refresh'
    );
}

/**
 * Convert a relative `expires_in` into an absolute epoch-ms expiry.
 */
export function expiryFromNow(expiresIn: number | undefined, now: number = Date.now()): number | null {
    return expiresIn === undefined ? null : now + expiresIn * 1000;
}
