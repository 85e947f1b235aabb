/**
 * OAuth routes for the Google sign-in flow.
 */

import { Hono } from 'hono';
import type { Env } from '../../env';
import { rateLimiters } from '../../middleware';
import { loginRoute } from './login';
import { callbackRoute } from './callback';
import { revokeRoute } from './revoke';

const oauth = new Hono<{ Bindings: Env }>();

oauth.use('*', rateLimiters.oauth);

// GET /oauth/login
oauth.route('/login', loginRoute);

// GET /oauth/callback
oauth.route('/callback', callbackRoute);

// GET /oauth/revoke/:userId
oauth.route('/revoke', revokeRoute);

export { oauth };
