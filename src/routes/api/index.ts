/**
 * JSON API routes.
 */

import { Hono } from 'hono';
import type { Env } from '../../env';
import { statusRoute } from './status';

const apiRouter = new Hono<{ Bindings: Env }>();

// GET /api/status/:userId
apiRouter.route('/status', statusRoute);

export { apiRouter };
