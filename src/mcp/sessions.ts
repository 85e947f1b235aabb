/**
 * Session binding layer.
 *
 * A binding ties one MCP connection to exactly one opaque user id for the
 * lifetime of that connection. Tool handlers close over their binding; there
 * is no process-wide "current user".
 */

import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { AuthenticationError } from '../errors';

/** Streamable HTTP sessions with no request for this long are closed (30 minutes). */
export const SESSION_IDLE_TTL_MS = 30 * 60 * 1000;

export interface SessionBindingOptions {
    now?: number;
    /**
     * Close the binding once it has been idle past the TTL. Streamable HTTP
     * sessions have no open socket that reports a disconnect.
     */
    expiresWhenIdle?: boolean;
}

/**
 * One connection's identity and its tool-call queue.
 */
export class SessionBinding {
    readonly createdAt: number;
    readonly expiresWhenIdle: boolean;
    private lastActivity: number;
    private tail: Promise<void> = Promise.resolve();
    private closed = false;

    constructor(
        readonly userId: string,
        readonly transport: Transport,
        options: SessionBindingOptions = {}
    ) {
        this.createdAt = options.now ?? Date.now();
        this.lastActivity = this.createdAt;
        this.expiresWhenIdle = options.expiresWhenIdle ?? false;
    }

    get lastActivityAt(): number {
        return this.lastActivity;
    }

    /** Record traffic on the connection. */
    touch(now: number = Date.now()): void {
        this.lastActivity = Math.max(this.lastActivity, now);
    }

    isIdle(maxIdleMs: number, now: number = Date.now()): boolean {
        return this.expiresWhenIdle && now - this.lastActivity >= maxIdleMs;
    }

    /** Transport-assigned session id; undefined until the transport has one. */
    get sessionId(): string | undefined {
        return this.transport.sessionId;
    }

    get isOpen(): boolean {
        return !this.closed;
    }

    /**
     * Run a task after every task queued before it on this connection has
     * settled. A failing task does not block the ones behind it.
     */
    run<T>(task: () => Promise<T>): Promise<T> {
        if (this.closed) {
            return Promise.reject(new AuthenticationError('Session has ended. Please reconnect.'));
        }

        this.touch();
        const result = this.tail.then(task);
        this.tail = result.then(
            () => undefined,
            () => undefined
        );
        return result;
    }

    /** Mark the binding closed. Tasks already queued still run. */
    close(): void {
        this.closed = true;
    }
}

/**
 * Live bindings keyed by transport session id.
 */
export class SessionRegistry {
    private readonly bindings = new Map<string, SessionBinding>();

    /**
     * @throws Error if the session id is already bound
     */
    register(sessionId: string, binding: SessionBinding): void {
        if (this.bindings.has(sessionId)) {
            throw new Error(`Session ${sessionId} is already bound`);
        }
        this.bindings.set(sessionId, binding);
    }

    get(sessionId: string): SessionBinding | undefined {
        return this.bindings.get(sessionId);
    }

    /**
     * Find a binding only if it belongs to the given user.
     */
    lookup(sessionId: string, userId: string): SessionBinding | undefined {
        const binding = this.bindings.get(sessionId);
        return binding?.userId === userId ? binding : undefined;
    }

    /**
     * Remove and close a binding. Safe to call more than once.
     */
    release(sessionId: string): SessionBinding | undefined {
        const binding = this.bindings.get(sessionId);
        if (!binding) {
            return undefined;
        }
        this.bindings.delete(sessionId);
        binding.close();
        return binding;
    }

    get size(): number {
        return this.bindings.size;
    }

    /**
     * Close and release the bindings matching a predicate. Closing a
     * transport fires its onclose, which may already have released it.
     *
     * @returns Number of bindings closed
     */
    private async closeWhere(match: (binding: SessionBinding) => boolean): Promise<number> {
        const matched = [...this.bindings].filter(([, binding]) => match(binding));
        await Promise.allSettled(matched.map(([, binding]) => binding.transport.close()));
        for (const [sessionId] of matched) {
            this.release(sessionId);
        }
        return matched.length;
    }

    /**
     * Close bindings that expire when idle and have seen no traffic for maxIdleMs.
     */
    closeIdle(maxIdleMs: number = SESSION_IDLE_TTL_MS, now: number = Date.now()): Promise<number> {
        return this.closeWhere((binding) => binding.isIdle(maxIdleMs, now));
    }

    /**
     * Close every binding of one user. Used when the user is revoked.
     */
    closeForUser(userId: string): Promise<number> {
        return this.closeWhere((binding) => binding.userId === userId);
    }

    /**
     * Close every transport. Used on shutdown.
     */
    async closeAll(): Promise<void> {
        await this.closeWhere(() => true);
    }
}
