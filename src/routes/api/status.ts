/**
 * GET /api/status/:userId
 *
 * Reports whether an API key is still usable and which account it belongs to.
 */

import { Hono } from 'hono';
import type { Env } from '../../env';
import { rateLimiters } from '../../middleware';
import { getUser } from '../../services/user';
import { errors } from '../errors';

/**
 * Response body for a known, active user.
 */
export interface UserStatusResponse {
    authenticated: true;
    email: string;
    /** ISO 8601 */
    created: string;
    /** ISO 8601 */
    lastUsed: string;
}

const statusRoute = new Hono<{ Bindings: Env }>();

statusRoute.get('/:userId', rateLimiters.status, (c) => {
    const user = getUser(c.env.DB, c.req.param('userId'));
    if (!user) {
        return errors.notFound(c, 'User not found');
    }

    const body: UserStatusResponse = {
        authenticated: true,
        email: user.email,
        created: new Date(user.createdAt).toISOString(),
        lastUsed: new Date(user.lastUsedAt).toISOString(),
    };
    return c.json(body);
});

export { statusRoute };
