/**
 * Rate limiting middleware.
 *
 * Sliding window over request timestamps, held in a process-local store.
 * IP-based; the gateway has no other caller identity before login.
 */

import type { Context, MiddlewareHandler, Next } from "hono";
import type { Env } from "../env";
import { ErrorCode, errorResponse } from "../routes/errors";

/**
 * Rate limit configuration.
 */
export interface RateLimitConfig {
    /** Maximum requests allowed in the window */
    limit: number;
    /** Window size in seconds */
    windowSeconds: number;
    /** Key prefix within the store */
    keyPrefix: string;
    /** Function to extract the rate limit key (e.g., IP) */
    keyExtractor: (c: Context<{ Bindings: Env }>) => string | null;
    /** Optional: skip rate limiting for certain requests */
    skip?: (c: Context<{ Bindings: Env }>) => boolean;
}

/**
 * Rate limit result returned by checkRateLimit.
 */
export interface RateLimitResult {
    /** Whether the request is allowed */
    allowed: boolean;
    /** Current request count in window */
    current: number;
    /** Maximum allowed requests */
    limit: number;
    /** Seconds until rate limit resets */
    resetIn: number;
    /** Seconds until retry is allowed (0 if allowed) */
    retryAfter: number;
}

/**
 * In-memory timestamp store keyed by `${prefix}:${key}`.
 */
export class RateLimitStore {
    private readonly windows = new Map<string, number[]>();

    get(key: string): number[] {
        return this.windows.get(key) ?? [];
    }

    set(key: string, timestamps: number[]): void {
        if (timestamps.length === 0) {
            this.windows.delete(key);
        } else {
            this.windows.set(key, timestamps);
        }
    }

    /** Drop windows whose newest entry is older than maxAgeMs. */
    sweep(maxAgeMs: number, now: number = Date.now()): number {
        let removed = 0;
        for (const [key, timestamps] of this.windows) {
            const newest = timestamps[timestamps.length - 1] ?? 0;
            if (newest <= now - maxAgeMs) {
                this.windows.delete(key);
                removed++;
            }
        }
        return removed;
    }

    get size(): number {
        return this.windows.size;
    }
}

/**
 * Default key extractor that uses client IP.
 */
export function extractClientIp(c: Context<{ Bindings: Env }>): string | null {
    const xForwardedFor = c.req.header("x-forwarded-for");
    if (xForwardedFor) return xForwardedFor.split(",")[0]?.trim() ?? null;

    const xRealIp = c.req.header("x-real-ip");
    if (xRealIp) return xRealIp;

    // Direct connection when served by @hono/node-server
    return c.env.incoming?.socket.remoteAddress ?? "unknown";
}

/**
 * Check rate limit for a given key.
 *
 * Uses sliding window algorithm:
 * - Keeps track of request timestamps in the window
 * - Removes expired timestamps on each check
 * - Allows request if count < limit
 */
export function checkRateLimit(
    store: RateLimitStore,
    key: string,
    config: Pick<RateLimitConfig, "limit" | "windowSeconds" | "keyPrefix">,
    now: number = Date.now()
): RateLimitResult {
    const windowMs = config.windowSeconds * 1000;
    const storeKey = `${config.keyPrefix}:${key}`;

    const windowStart = now - windowMs;
    const timestamps = store.get(storeKey).filter(ts => ts > windowStart);

    const current = timestamps.length;
    const allowed = current < config.limit;

    if (allowed) {
        timestamps.push(now);
    }
    store.set(storeKey, timestamps);

    // Time until the oldest request leaves the window and a slot opens
    let resetIn = 0;
    let retryAfter = 0;

    if (timestamps.length > 0) {
        const oldestTimestamp = Math.min(...timestamps);
        resetIn = Math.max(0, Math.ceil((oldestTimestamp + windowMs - now) / 1000));
    }

    if (!allowed) {
        retryAfter = Math.max(1, resetIn);
    }

    return {
        allowed,
        current: allowed ? current + 1 : current,
        limit: config.limit,
        resetIn,
        retryAfter,
    };
}

/**
 * Create rate limiting middleware.
 *
 * @example
 * // 20 requests per minute per IP
 * app.use('/oauth/*', createRateLimiter({
 *   limit: 20,
 *   windowSeconds: 60,
 *   keyPrefix: 'rl:oauth',
 *   keyExtractor: extractClientIp,
 * }));
 */
export function createRateLimiter(
    config: RateLimitConfig
): MiddlewareHandler<{ Bindings: Env }> {
    return async (c: Context<{ Bindings: Env }>, next: Next) => {
        if (config.skip?.(c)) {
            return next();
        }

        const key = config.keyExtractor(c);
        if (!key) {
            return next();
        }

        const result = checkRateLimit(c.env.RATE_LIMITS, key, config);

        c.header("X-RateLimit-Limit", result.limit.toString());
        c.header("X-RateLimit-Remaining", Math.max(0, result.limit - result.current).toString());
        c.header("X-RateLimit-Reset", result.resetIn.toString());

        if (!result.allowed) {
            c.header("Retry-After", result.retryAfter.toString());

            return errorResponse(
                c,
                429,
                ErrorCode.RATE_LIMITED,
                "Too many requests. Please try again later.",
                {
                    retry_after: result.retryAfter.toString(),
                    limit: result.limit.toString(),
                    window_seconds: config.windowSeconds.toString(),
                }
            );
        }

        return next();
    };
}

/**
 * Pre-configured rate limiters.
 */
export const rateLimiters = {
    /**
     * OAuth endpoints: 20 requests per minute per IP.
     */
    oauth: createRateLimiter({
        limit: 20,
        windowSeconds: 60,
        keyPrefix: "rl:oauth",
        keyExtractor: extractClientIp,
    }),

    /**
     * Status API: 60 requests per minute per IP.
     */
    status: createRateLimiter({
        limit: 60,
        windowSeconds: 60,
        keyPrefix: "rl:status",
        keyExtractor: extractClientIp,
    }),
};
