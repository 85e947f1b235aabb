/**
 * GET /oauth/callback
 *
 * Google redirects here after user consent. Verifies the state token,
 * exchanges the code and discloses the new API key.
 */

import { Hono } from 'hono';
import type { Env } from '../../env';
import { completeLogin, type OAuthFailureReason } from '../../services/oauthFlow';
import { renderErrorPage, renderSuccessPage } from '../pages';

const FAILURE_TITLES: Record<OAuthFailureReason, string> = {
    provider_error: 'Authentication Error',
    invalid_state: 'Invalid State',
    missing_code: 'Invalid Request',
    configuration: 'Configuration Error',
    exchange_failed: 'Authentication Failed',
};

const callbackRoute = new Hono<{ Bindings: Env }>();

callbackRoute.get('/', async (c) => {
    const outcome = await completeLogin(
        { db: c.env.DB, config: c.env.CONFIG, logger: c.env.LOGGER },
        {
            code: c.req.query('code'),
            state: c.req.query('state'),
            error: c.req.query('error'),
        }
    );

    // The page carries a bearer credential
    c.header('Cache-Control', 'no-store');

    if (outcome.state === 'failed') {
        return c.html(renderErrorPage(FAILURE_TITLES[outcome.reason], outcome.message), outcome.status);
    }

    return c.html(renderSuccessPage(outcome.userId, outcome.email, c.env.CONFIG.baseUrl));
});

export { callbackRoute };
