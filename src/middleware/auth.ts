/**
 * Authentication middleware.
 *
 * The opaque user id embedded in the request path is the bearer credential.
 * Resolves it to an active user and sets it in context for downstream handlers.
 */

import { createMiddleware } from 'hono/factory';
import type { Env } from '../env';
import { redactId } from '../logger';
import { errors } from '../routes/errors';
import { getUser, type UserRecord } from '../services/user';

/**
 * Variables set by auth middleware.
 */
export interface AuthVariables {
    /** The authenticated user */
    user: UserRecord;
}

/**
 * Middleware that requires the `:userId` path parameter to name an active user.
 *
 * On failure, returns 401 Unauthorized before any MCP traffic is accepted.
 *
 * @example
 * mcpRouter.get('/:userId/sse', requireUser, (c) => {
 *   const user = c.get('user');
 * });
 */
export const requireUser = createMiddleware<{
    Bindings: Env;
    Variables: AuthVariables;
}>(async (c, next) => {
    const userId = c.req.param('userId');
    const user = userId ? getUser(c.env.DB, userId) : null;

    if (!user) {
        c.env.LOGGER.warn('mcp_connection_rejected', {
            user: userId ? redactId(userId) : null,
            path: userId ? c.req.path.replace(userId, ':userId') : c.req.path,
        });
        return errors.unauthorized(c);
    }

    c.set('user', user);
    return next();
});
