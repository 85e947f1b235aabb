/**
 * MCP streaming endpoints.
 *
 *   GET  /mcp/:userId/sse                      legacy SSE stream
 *   POST /mcp/:userId/messages?sessionId=...   legacy SSE client messages
 *   POST|GET|DELETE /mcp/:userId               streamable HTTP
 *
 * The transports write straight to the Node response, so these handlers
 * only work behind @hono/node-server and return RESPONSE_ALREADY_SENT.
 */

import { randomUUID } from 'node:crypto';
import { IncomingMessage, ServerResponse } from 'node:http';
import { RESPONSE_ALREADY_SENT } from '@hono/node-server/utils/response';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';
import { Hono, type Context } from 'hono';
import { requireSessionSecret } from '../../config';
import type { Env } from '../../env';
import { redactId } from '../../logger';
import { createGscMcpServer, type CredentialResolver } from '../../mcp/server';
import { SessionBinding } from '../../mcp/sessions';
import { requireUser, type AuthVariables } from '../../middleware';
import { resolveCredentials } from '../../services/credentials';
import { errors } from '../errors';

type McpEnv = { Bindings: Env; Variables: AuthVariables };

const mcpRouter = new Hono<McpEnv>();

interface NodeStreams {
    req: IncomingMessage;
    res: ServerResponse;
}

function nodeStreams(c: Context<McpEnv>): NodeStreams | null {
    const { incoming, outgoing } = c.env;
    if (incoming instanceof IncomingMessage && outgoing instanceof ServerResponse) {
        return { req: incoming, res: outgoing };
    }
    return null;
}

function credentialResolver(env: Env): CredentialResolver {
    return (userId) =>
        resolveCredentials({
            db: env.DB,
            userId,
            secret: requireSessionSecret(env.CONFIG),
            logger: env.LOGGER,
        });
}

/**
 * Register a binding under its transport session id.
 */
function bindSession(env: Env, sessionId: string, binding: SessionBinding, transport: string): void {
    env.SESSIONS.register(sessionId, binding);
    env.LOGGER.info('mcp_session_bound', {
        transport,
        user: redactId(binding.userId),
        sessions: env.SESSIONS.size,
    });
}

function releaseSession(env: Env, sessionId: string | undefined): void {
    if (!sessionId) return;
    const binding = env.SESSIONS.release(sessionId);
    if (binding) {
        env.LOGGER.info('mcp_session_released', {
            user: redactId(binding.userId),
            duration_ms: Date.now() - binding.createdAt,
        });
    }
}

async function readJsonBody(c: Context<McpEnv>): Promise<{ ok: true; body: unknown } | { ok: false }> {
    try {
        const body: unknown = await c.req.json();
        return { ok: true, body };
    } catch {
        return { ok: false };
    }
}

mcpRouter.get('/:userId/sse', requireUser, async (c) => {
    const streams = nodeStreams(c);
    if (!streams) {
        return errors.internal(c, 'Streaming requires the Node.js HTTP server');
    }

    const user = c.get('user');
    const transport = new SSEServerTransport(`/mcp/${user.id}/messages`, streams.res);
    const binding = new SessionBinding(user.id, transport);
    const server = createGscMcpServer({
        binding,
        resolve: credentialResolver(c.env),
        logger: c.env.LOGGER,
    });

    const env = c.env;
    transport.onclose = () => releaseSession(env, transport.sessionId);
    bindSession(env, transport.sessionId, binding, 'sse');

    await server.connect(transport);
    return RESPONSE_ALREADY_SENT;
});

mcpRouter.post('/:userId/messages', requireUser, async (c) => {
    const streams = nodeStreams(c);
    if (!streams) {
        return errors.internal(c, 'Streaming requires the Node.js HTTP server');
    }

    const sessionId = c.req.query('sessionId');
    if (!sessionId) {
        return errors.invalidRequest(c, 'Missing sessionId parameter');
    }

    const binding = c.env.SESSIONS.lookup(sessionId, c.get('user').id);
    if (!binding || !(binding.transport instanceof SSEServerTransport)) {
        return errors.notFound(c, 'Session not found');
    }

    const parsed = await readJsonBody(c);
    if (!parsed.ok) {
        return errors.invalidRequest(c, 'Request body must be JSON');
    }

    binding.touch();
    await binding.transport.handlePostMessage(streams.req, streams.res, parsed.body);
    return RESPONSE_ALREADY_SENT;
});

mcpRouter.on(['GET', 'POST', 'DELETE'], '/:userId', requireUser, async (c) => {
    const streams = nodeStreams(c);
    if (!streams) {
        return errors.internal(c, 'Streaming requires the Node.js HTTP server');
    }

    let body: unknown;
    if (c.req.method === 'POST') {
        const parsed = await readJsonBody(c);
        if (!parsed.ok) {
            return errors.invalidRequest(c, 'Request body must be JSON');
        }
        body = parsed.body;
    }

    const user = c.get('user');
    const sessionId = c.req.header('mcp-session-id');

    if (sessionId) {
        const binding = c.env.SESSIONS.lookup(sessionId, user.id);
        if (!binding || !(binding.transport instanceof StreamableHTTPServerTransport)) {
            return errors.notFound(c, 'Session not found');
        }
        binding.touch();
        await binding.transport.handleRequest(streams.req, streams.res, body);
        return RESPONSE_ALREADY_SENT;
    }

    if (c.req.method !== 'POST' || !isInitializeRequest(body)) {
        return errors.invalidRequest(c, 'No valid session ID provided');
    }

    const env = c.env;
    const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => randomUUID(),
        onsessioninitialized: (id) => bindSession(env, id, binding, 'streamable_http'),
    });
    const binding = new SessionBinding(user.id, transport, { expiresWhenIdle: true });
    transport.onclose = () => releaseSession(env, transport.sessionId);

    const server = createGscMcpServer({
        binding,
        resolve: credentialResolver(env),
        logger: env.LOGGER,
    });

    await server.connect(transport);
    await transport.handleRequest(streams.req, streams.res, body);
    return RESPONSE_ALREADY_SENT;
});

export { mcpRouter };
