/**
 * GET /oauth/revoke/:userId
 *
 * Deactivates a user and closes their open MCP sessions. The stored
 * credential stays but can no longer be used.
 */

import { Hono } from 'hono';
import type { Env } from '../../env';
import { redactId } from '../../logger';
import { deactivateUser, getUser } from '../../services/user';
import { errors } from '../errors';

const revokeRoute = new Hono<{ Bindings: Env }>();

revokeRoute.get('/:userId', async (c) => {
    const userId = c.req.param('userId');

    if (!getUser(c.env.DB, userId)) {
        return errors.notFound(c, 'User not found');
    }

    deactivateUser(c.env.DB, userId);
    const closed = await c.env.SESSIONS.closeForUser(userId);
    c.env.LOGGER.info('user_revoked', {
        user: redactId(userId),
        closed_sessions: closed,
    });

    return c.json({ status: 'revoked', message: 'Access has been revoked' });
});

export { revokeRoute };
