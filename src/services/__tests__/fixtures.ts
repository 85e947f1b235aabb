/**
 * Shared fixtures for service tests.
 */

import { vi } from 'vitest';
import { loadConfig, type GatewayConfig } from '../../config';
import type { LogContext, Logger } from '../../logger';
import type { GoogleCredential } from '../user';

export const TEST_SECRET = 'test-session-secret';

export const TEST_ENV = {
    GOOGLE_CLIENT_ID: 'test-client-id',
    GOOGLE_CLIENT_SECRET: 'test-client-secret',
    GOOGLE_REDIRECT_URI: 'http://localhost:8000/oauth/callback',
    SESSION_SECRET: TEST_SECRET,
    BASE_URL: 'http://localhost:8000',
};

export function testConfig(overrides: Record<string, string | undefined> = {}): GatewayConfig {
    return loadConfig({ ...TEST_ENV, ...overrides });
}

export function testCredential(overrides: Partial<GoogleCredential> = {}): GoogleCredential {
    return {
        accessToken: 'access-token-1',
        refreshToken: 'refresh-token-1',
        tokenUri: 'https://oauth2.googleapis.com/token',
        clientId: 'test-client-id',
        clientSecret: 'test-client-secret',
        scopes: ['https://www.googleapis.com/auth/webmasters'],
        expiresAt: null,
        ...overrides,
    };
}

export interface LogEntry {
    level: 'info' | 'warn' | 'error';
    event: string;
    context?: LogContext;
}

/**
 * Logger that records entries instead of printing them.
 */
export function createMemoryLogger(): Logger & { entries: LogEntry[]; events(): string[] } {
    const entries: LogEntry[] = [];
    return {
        entries,
        events: () => entries.map((entry) => entry.event),
        info: (event, context) => entries.push({ level: 'info', event, context }),
        warn: (event, context) => entries.push({ level: 'warn', event, context }),
        error: (event, context) => entries.push({ level: 'error', event, context }),
    };
}

export function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
    });
}

type FetchRoute = (url: string, init: RequestInit | undefined) => Response | undefined;

/**
 * Stub global fetch with a list of routes tried in order. Unmatched calls get 404.
 */
export function stubFetch(...routes: FetchRoute[]) {
    const mockFetch = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
        const url = input instanceof Request ? input.url : input.toString();
        for (const route of routes) {
            const response = route(url, init);
            if (response) return response;
        }
        return new Response(null, { status: 404 });
    });

    vi.stubGlobal('fetch', mockFetch);
    return mockFetch;
}
