/**
 * Bindings handed to every request handler as `c.env`.
 *
 * The Node entry point merges these with the `incoming`/`outgoing` bindings
 * from @hono/node-server; tests pass them to `app.request()` directly.
 */

import type { Http2Bindings, HttpBindings } from '@hono/node-server';
import type { GatewayConfig } from './config';
import type { Db } from './db';
import type { Logger } from './logger';
import type { SessionRegistry } from './mcp/sessions';
import type { RateLimitStore } from './middleware/rateLimit';

export interface Env {
    DB: Db;
    CONFIG: GatewayConfig;
    SESSIONS: SessionRegistry;
    RATE_LIMITS: RateLimitStore;
    LOGGER: Logger;

    // Present only when served by @hono/node-server
    incoming?: HttpBindings['incoming'] | Http2Bindings['incoming'];
    outgoing?: HttpBindings['outgoing'] | Http2Bindings['outgoing'];
}

/**
 * User record from the database.
 */
export interface DbUser {
    id: string;
    email: string;
    credentials: string;
    created_at: number;
    last_used_at: number;
    is_active: number;
}

/**
 * OAuth state record from the database.
 */
export interface DbOAuthState {
    state: string;
    created_at: number;
}
