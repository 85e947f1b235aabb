/**
 * OAuth flow controller.
 *
 *   idle --initiate--> awaiting_callback --complete--> resolved
 *                                                  \-> failed
 *
 * The state token is consumed before the code exchange, so two deliveries
 * of the same callback cannot both proceed.
 */

import {
    requireOAuthClient,
    requireSessionSecret,
    type GatewayConfig,
    type OAuthClientConfig,
} from '../config';
import { generateUserId } from '../crypto';
import type { Db } from '../db';
import {
    ConfigurationError,
    CsrfValidationError,
    ProviderExchangeError,
    errorMessage,
} from '../errors';
import { redactId, type Logger } from '../logger';
import {
    buildAuthorizationUrl,
    exchangeGoogleCode,
    expiryFromNow,
    fetchGoogleUserInfo,
    GOOGLE_SCOPES,
    GOOGLE_TOKEN_URI,
    GoogleApiError,
} from './google';
import {
    OAUTH_STATE_TTL_MS,
    issueOAuthState,
    purgeExpiredOAuthStates,
    verifyAndConsumeOAuthState,
} from './oauthState';
import { saveUser, type GoogleCredential } from './user';

export type OAuthFailureReason =
    | 'provider_error'
    | 'invalid_state'
    | 'missing_code'
    | 'configuration'
    | 'exchange_failed';

export interface LoginInitiated {
    state: 'awaiting_callback';
    authorizationUrl: string;
    /** The CSRF token embedded in authorizationUrl. */
    stateToken: string;
}

export interface LoginResolved {
    state: 'resolved';
    userId: string;
    email: string;
}

export interface LoginFailed {
    state: 'failed';
    reason: OAuthFailureReason;
    message: string;
    status: 400 | 500;
}

export type LoginOutcome = LoginResolved | LoginFailed;

export interface CallbackParams {
    code?: string;
    state?: string;
    error?: string;
}

interface FlowContext {
    db: Db;
    config: GatewayConfig;
    logger?: Logger;
    now?: number;
}

/**
 * Start a login: purge stale state tokens, issue a new one and build the
 * Google authorization URL.
 *
 * @throws ConfigurationError if the OAuth client is not configured
 */
export function initiateLogin(ctx: FlowContext): LoginInitiated {
    const client = requireOAuthClient(ctx.config);
    const now = ctx.now ?? Date.now();

    const purged = purgeExpiredOAuthStates(ctx.db, OAUTH_STATE_TTL_MS, now);
    if (purged > 0) {
        ctx.logger?.info('oauth_states_purged', { deleted_count: purged });
    }

    const stateToken = issueOAuthState(ctx.db, now);
    const authorizationUrl = buildAuthorizationUrl({
        clientId: client.clientId,
        redirectUri: client.redirectUri,
        state: stateToken,
    });

    ctx.logger?.info('oauth_login_started');
    return { state: 'awaiting_callback', authorizationUrl, stateToken };
}

function failed(reason: OAuthFailureReason, message: string, status: 400 | 500): LoginFailed {
    return { state: 'failed', reason, message, status };
}

/**
 * Complete a login from the provider's redirect parameters.
 *
 * Never throws; every failure branch becomes a LoginFailed. No user record
 * is written unless the exchange and the account lookup both succeed.
 */
export async function completeLogin(ctx: FlowContext, params: CallbackParams): Promise<LoginOutcome> {
    const outcome = await runCallback(ctx, params);
    if (outcome.state === 'failed') {
        ctx.logger?.warn('oauth_callback_failed', { reason: outcome.reason, status: outcome.status });
    } else {
        ctx.logger?.info('oauth_callback_completed', { user: redactId(outcome.userId) });
    }
    return outcome;
}

async function runCallback(ctx: FlowContext, params: CallbackParams): Promise<LoginOutcome> {
    const { db, config } = ctx;

    if (params.error) {
        return failed('provider_error', params.error, 400);
    }

    if (!params.state || !verifyAndConsumeOAuthState(db, params.state, ctx.now ?? Date.now())) {
        return failed('invalid_state', new CsrfValidationError().message, 400);
    }

    if (!params.code) {
        return failed('missing_code', 'Missing authorization code', 400);
    }

    let client: OAuthClientConfig;
    let secret: string;
    try {
        client = requireOAuthClient(config);
        secret = requireSessionSecret(config);
    } catch (err) {
        if (err instanceof ConfigurationError) {
            return failed('configuration', err.message, 500);
        }
        throw err;
    }

    try {
        const tokens = await exchangeGoogleCode({
            code: params.code,
            clientId: client.clientId,
            clientSecret: client.clientSecret,
            redirectUri: client.redirectUri,
        });

        const userInfo = await fetchGoogleUserInfo(tokens.access_token);
        const now = ctx.now ?? Date.now();

        const credential: GoogleCredential = {
            accessToken: tokens.access_token,
            refreshToken: tokens.refresh_token ?? null,
            tokenUri: GOOGLE_TOKEN_URI,
            clientId: client.clientId,
            clientSecret: client.clientSecret,
            scopes: tokens.scope ? tokens.scope.split(' ').filter(Boolean) : [...GOOGLE_SCOPES],
            expiresAt: expiryFromNow(tokens.expires_in, now),
        };

        const userId = generateUserId();
        const email = userInfo.email ?? 'unknown';
        saveUser(db, { id: userId, email, credential, secret, now });

        return { state: 'resolved', userId, email };
    } catch (err) {
        const exchangeError = new ProviderExchangeError(
            errorMessage(err),
            err instanceof GoogleApiError ? err.status : undefined
        );
        return failed('exchange_failed', exchangeError.message, 500);
    }
}
