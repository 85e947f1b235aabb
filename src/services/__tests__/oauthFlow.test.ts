import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { openDatabase, type Db } from '../../db';
import { ConfigurationError } from '../../errors';
import { GOOGLE_TOKEN_URI, GOOGLE_USERINFO_URI } from '../google';
import { completeLogin, initiateLogin } from '../oauthFlow';
import { OAUTH_STATE_TTL_MS, issueOAuthState, verifyAndConsumeOAuthState } from '../oauthState';
import { getUser, readCredential } from '../user';
import {
    TEST_SECRET,
    createMemoryLogger,
    jsonResponse,
    stubFetch,
    testConfig,
} from './fixtures';

const NOW = 1_700_000_000_000;

function countUsers(db: Db): number {
    return db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM users').get()?.n ?? 0;
}

function stubGoogle(options: {
    token?: Response;
    userInfo?: Response;
} = {}) {
    return stubFetch(
        (url) =>
            url === GOOGLE_TOKEN_URI
                ? options.token ?? jsonResponse({
                    access_token: 'fresh-access-token',
                    refresh_token: 'fresh-refresh-token',
                    expires_in: 3600,
                    scope: 'openid https://www.googleapis.com/auth/webmasters',
                    token_type: 'Bearer',
                })
                : undefined,
        (url) =>
            url === GOOGLE_USERINFO_URI
                ? options.userInfo ?? jsonResponse({ id: '1234', email: 'owner@example.com', verified_email: true })
                : undefined
    );
}

describe('oauthFlow', () => {
    let db: Db;

    beforeEach(() => {
        db = openDatabase(':memory:');
    });

    afterEach(() => {
        db.close();
        vi.unstubAllGlobals();
    });

    describe('initiateLogin', () => {
        it('should issue a state and build the consent URL around it', () => {
            const result = initiateLogin({ db, config: testConfig(), now: NOW });

            expect(result.state).toBe('awaiting_callback');

            const url = new URL(result.authorizationUrl);
            expect(`${url.origin}${url.pathname}`).toBe('https://accounts.google.com/o/oauth2/auth');
            expect(url.searchParams.get('state')).toBe(result.stateToken);
            expect(url.searchParams.get('client_id')).toBe('test-client-id');
            expect(url.searchParams.get('redirect_uri')).toBe('http://localhost:8000/oauth/callback');
            expect(url.searchParams.get('response_type')).toBe('code');
            expect(url.searchParams.get('access_type')).toBe('offline');
            expect(url.searchParams.get('prompt')).toBe('consent');
            expect(url.searchParams.get('scope')?.split(' ')).toContain(
                'https://www.googleapis.com/auth/webmasters.readonly'
            );

            expect(verifyAndConsumeOAuthState(db, result.stateToken, NOW)).toBe(true);
        });

        it('should purge stale states first', () => {
            const logger = createMemoryLogger();
            issueOAuthState(db, NOW - OAUTH_STATE_TTL_MS - 1);

            initiateLogin({ db, config: testConfig(), logger, now: NOW });

            expect(logger.events()).toEqual(['oauth_states_purged', 'oauth_login_started']);
            expect(logger.entries[0]?.context).toEqual({ deleted_count: 1 });
        });

        it('should throw ConfigurationError without client credentials', () => {
            const config = testConfig({ GOOGLE_CLIENT_ID: undefined, GOOGLE_CLIENT_SECRET: undefined });

            expect(() => initiateLogin({ db, config })).toThrow(ConfigurationError);
            expect(() => initiateLogin({ db, config })).toThrow(
                'Missing or invalid configuration: GOOGLE_CLIENT_ID, GOOGLE_CLIENT_SECRET'
            );
        });
    });

    describe('completeLogin', () => {
        it('should fail on a state that was never issued and create no user', async () => {
            const mockFetch = stubGoogle();

            const outcome = await completeLogin(
                { db, config: testConfig(), now: NOW },
                { code: 'auth-code', state: 'never-issued' }
            );

            expect(outcome).toEqual({
                state: 'failed',
                reason: 'invalid_state',
                message: 'Invalid or expired authentication attempt. Please try again.',
                status: 400,
            });
            expect(countUsers(db)).toBe(0);
            expect(mockFetch).not.toHaveBeenCalled();
        });

        it('should fail when the state is missing', async () => {
            const outcome = await completeLogin({ db, config: testConfig() }, { code: 'auth-code' });

            expect(outcome).toMatchObject({ state: 'failed', reason: 'invalid_state', status: 400 });
        });

        it('should relay a provider error', async () => {
            const state = issueOAuthState(db, NOW);

            const outcome = await completeLogin(
                { db, config: testConfig(), now: NOW },
                { error: 'access_denied', state }
            );

            expect(outcome).toEqual({
                state: 'failed',
                reason: 'provider_error',
                message: 'access_denied',
                status: 400,
            });
        });

        it('should consume the state even when the code is missing', async () => {
            const state = issueOAuthState(db, NOW);

            const outcome = await completeLogin({ db, config: testConfig(), now: NOW }, { state });

            expect(outcome).toEqual({
                state: 'failed',
                reason: 'missing_code',
                message: 'Missing authorization code',
                status: 400,
            });
            expect(verifyAndConsumeOAuthState(db, state, NOW)).toBe(false);
        });

        it('should create a user with the exchanged credential', async () => {
            const mockFetch = stubGoogle();
            const logger = createMemoryLogger();
            const state = issueOAuthState(db, NOW);

            const outcome = await completeLogin(
                { db, config: testConfig(), logger, now: NOW },
                { code: 'auth-code', state }
            );

            expect(outcome.state).toBe('resolved');
            if (outcome.state !== 'resolved') return;

            expect(outcome.email).toBe('owner@example.com');
            expect(outcome.userId).toMatch(/^[A-Za-z0-9_-]{27}$/);
            expect(mockFetch).toHaveBeenCalledTimes(2);

            const exchange = new URLSearchParams(String(mockFetch.mock.calls[0]?.[1]?.body));
            expect(exchange.get('grant_type')).toBe('authorization_code');
            expect(exchange.get('code')).toBe('auth-code');

            const user = getUser(db, outcome.userId, NOW);
            if (!user) throw new Error('user was not saved');
            expect(user.email).toBe('owner@example.com');
            expect(readCredential(user, TEST_SECRET)).toEqual({
                accessToken: 'fresh-access-token',
                refreshToken: 'fresh-refresh-token',
                tokenUri: GOOGLE_TOKEN_URI,
                clientId: 'test-client-id',
                clientSecret: 'test-client-secret',
                scopes: ['openid', 'https://www.googleapis.com/auth/webmasters'],
                expiresAt: NOW + 3600 * 1000,
            });
            expect(logger.events()).toEqual(['oauth_callback_completed']);
        });

        it('should refuse to replay a consumed state', async () => {
            const mockFetch = stubGoogle();
            const state = issueOAuthState(db, NOW);
            const ctx = { db, config: testConfig(), now: NOW };

            const first = await completeLogin(ctx, { code: 'auth-code', state });
            const second = await completeLogin(ctx, { code: 'auth-code', state });

            expect(first.state).toBe('resolved');
            expect(second).toMatchObject({ state: 'failed', reason: 'invalid_state' });
            expect(mockFetch).toHaveBeenCalledTimes(2);
            expect(countUsers(db)).toBe(1);
        });

        it('should record the email as unknown when the account has none', async () => {
            stubGoogle({ userInfo: jsonResponse({ id: '1234' }) });
            const state = issueOAuthState(db, NOW);

            const outcome = await completeLogin({ db, config: testConfig(), now: NOW }, { code: 'c', state });

            expect(outcome).toMatchObject({ state: 'resolved', email: 'unknown' });
        });

        it('should relay an exchange failure and save nothing', async () => {
            stubGoogle({ token: jsonResponse({ error: 'invalid_grant', error_description: 'Bad Request' }, 400) });
            const logger = createMemoryLogger();
            const state = issueOAuthState(db, NOW);

            const outcome = await completeLogin(
                { db, config: testConfig(), logger, now: NOW },
                { code: 'bad-code', state }
            );

            expect(outcome).toEqual({
                state: 'failed',
                reason: 'exchange_failed',
                message: 'Token exchange failed (400): invalid_grant: Bad Request',
                status: 500,
            });
            expect(countUsers(db)).toBe(0);
            expect(logger.entries).toEqual([
                {
                    level: 'warn',
                    event: 'oauth_callback_failed',
                    context: { reason: 'exchange_failed', status: 500 },
                },
            ]);
        });

        it('should save nothing when the account lookup fails', async () => {
            stubGoogle({ userInfo: jsonResponse({ error: { message: 'Invalid Credentials' } }, 401) });
            const state = issueOAuthState(db, NOW);

            const outcome = await completeLogin({ db, config: testConfig(), now: NOW }, { code: 'c', state });

            expect(outcome).toMatchObject({
                state: 'failed',
                reason: 'exchange_failed',
                message: 'Failed to fetch account info (401): Invalid Credentials',
            });
            expect(countUsers(db)).toBe(0);
        });

        it('should report a missing session secret as a configuration failure', async () => {
            const mockFetch = stubGoogle();
            const state = issueOAuthState(db, NOW);

            const outcome = await completeLogin(
                { db, config: testConfig({ SESSION_SECRET: 'short' }), now: NOW },
                { code: 'c', state }
            );

            expect(outcome).toEqual({
                state: 'failed',
                reason: 'configuration',
                message: 'Missing or invalid configuration: SESSION_SECRET',
                status: 500,
            });
            expect(mockFetch).not.toHaveBeenCalled();
        });
    });
});
