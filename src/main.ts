/**
 * Node.js entry point: load config, open the database, serve the app.
 */

import { serve } from '@hono/node-server';
import { loadConfig } from './config';
import { openDatabase, type Db } from './db';
import type { Env } from './env';
import { errorMessage } from './errors';
import { createApp } from './index';
import { createConsoleLogger } from './logger';
import { SESSION_IDLE_TTL_MS, SessionRegistry } from './mcp/sessions';
import { RateLimitStore } from './middleware/rateLimit';
import { OAUTH_STATE_TTL_MS, purgeExpiredOAuthStates } from './services/oauthState';

const SWEEP_INTERVAL_MS = 5 * 60 * 1000;
const RATE_LIMIT_RETENTION_MS = 10 * 60 * 1000;

const logger = createConsoleLogger();
const config = loadConfig();

for (const issue of config.issues) {
    logger.warn('config_issue', { key: issue.key, message: issue.message });
}
if (config.sessionSecretGenerated) {
    logger.warn('config_issue', {
        key: 'SESSION_SECRET',
        message: 'not set; generated one for this process. Stored credentials will be unreadable after a restart',
    });
}

let db: Db;
try {
    db = openDatabase(config.databasePath);
} catch (err) {
    logger.error('database_open_failed', { path: config.databasePath, error: errorMessage(err) });
    process.exit(1);
}

const services: Env = {
    DB: db,
    CONFIG: config,
    SESSIONS: new SessionRegistry(),
    RATE_LIMITS: new RateLimitStore(),
    LOGGER: logger,
};

const app = createApp();

// Opportunistic cleanup; verification never depends on it
const sweep = setInterval(() => {
    const purged = purgeExpiredOAuthStates(db, OAUTH_STATE_TTL_MS);
    if (purged > 0) {
        logger.info('oauth_states_purged', { deleted_count: purged });
    }
    services.RATE_LIMITS.sweep(RATE_LIMIT_RETENTION_MS);
    void services.SESSIONS.closeIdle(SESSION_IDLE_TTL_MS)
        .then((closed) => {
            if (closed > 0) {
                logger.info('mcp_sessions_expired', { count: closed });
            }
        })
        .catch((err: unknown) => logger.error('session_sweep_failed', { error: errorMessage(err) }));
}, SWEEP_INTERVAL_MS);
sweep.unref();

const server = serve(
    {
        fetch: (request, bindings) => app.fetch(request, { ...services, ...bindings }),
        port: config.port,
    },
    (info) => {
        logger.info('server_started', {
            port: info.port,
            base_url: config.baseUrl,
            sse_endpoint: `${config.baseUrl}/mcp/{userId}/sse`,
        });
    }
);

function shutdown(signal: string): void {
    logger.info('server_stopping', { signal, sessions: services.SESSIONS.size });
    clearInterval(sweep);
    void services.SESSIONS.closeAll()
        .catch((err: unknown) => logger.error('shutdown_failed', { error: errorMessage(err) }))
        .finally(() => {
            server.close(() => {
                db.close();
                process.exit(0);
            });
        });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
