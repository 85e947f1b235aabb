/**
 * GET /oauth/login
 *
 * Issues a CSRF state token and redirects to Google's consent screen.
 */

import { Hono } from 'hono';
import type { Env } from '../../env';
import { ConfigurationError } from '../../errors';
import { initiateLogin } from '../../services/oauthFlow';
import { renderErrorPage } from '../pages';

const loginRoute = new Hono<{ Bindings: Env }>();

loginRoute.get('/', (c) => {
    try {
        const { authorizationUrl } = initiateLogin({
            db: c.env.DB,
            config: c.env.CONFIG,
            logger: c.env.LOGGER,
        });
        return c.redirect(authorizationUrl, 302);
    } catch (err) {
        if (err instanceof ConfigurationError) {
            c.env.LOGGER.error('config_issue', { keys: err.keys, route: 'oauth_login' });
            return c.html(
                renderErrorPage(
                    'Configuration Error',
                    `Please set the ${err.keys.join(', ')} environment variable${err.keys.length === 1 ? '' : 's'}.`
                ),
                500
            );
        }
        throw err;
    }
});

export { loginRoute };
