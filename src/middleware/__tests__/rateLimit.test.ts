import { describe, it, expect, beforeEach } from "vitest";
import { Hono } from "hono";
import {
    createRateLimiter,
    checkRateLimit,
    extractClientIp,
    RateLimitStore,
    type RateLimitConfig,
} from "../rateLimit";
import type { Env } from "../../env";
import { createTestEnv, type TestEnv } from "../../routes/__tests__/testUtils";

// Test app setup
function createTestApp(config: RateLimitConfig) {
    const app = new Hono<{ Bindings: Env }>();
    app.use("*", createRateLimiter(config));
    app.get("/test", (c) => c.json({ message: "ok" }));
    app.get("/ip", (c) => c.json({ ip: extractClientIp(c) }));
    return app;
}

// Helper to make requests
async function makeRequest(
    app: Hono<{ Bindings: Env }>,
    env: Env,
    options: {
        path?: string;
        headers?: Record<string, string>;
    } = {}
) {
    const { path = "/test", headers = { "x-forwarded-for": "192.168.1.1" } } = options;
    return app.request(path, { headers }, env);
}

const NOW = 1_700_000_000_000;

describe("rateLimit middleware", () => {
    let store: RateLimitStore;

    beforeEach(() => {
        store = new RateLimitStore();
    });

    describe("checkRateLimit", () => {
        const config = { limit: 3, windowSeconds: 60, keyPrefix: "test" };

        it("should track request count under the limit", () => {
            for (let i = 1; i <= 3; i++) {
                const result = checkRateLimit(store, "key", config, NOW + i);
                expect(result.allowed).toBe(true);
                expect(result.current).toBe(i);
            }
        });

        it("should block requests over the limit", () => {
            for (let i = 0; i < 3; i++) {
                checkRateLimit(store, "key", config, NOW);
            }

            const result = checkRateLimit(store, "key", config, NOW + 15_000);

            expect(result.allowed).toBe(false);
            expect(result.current).toBe(3);
            expect(result.retryAfter).toBe(45);
        });

        it("should allow requests again once the window slides past", () => {
            for (let i = 0; i < 3; i++) {
                checkRateLimit(store, "key", config, NOW);
            }

            const result = checkRateLimit(store, "key", config, NOW + 60_001);

            expect(result.allowed).toBe(true);
            expect(result.current).toBe(1);
        });

        it("should keep separate windows per key and prefix", () => {
            for (let i = 0; i < 3; i++) {
                checkRateLimit(store, "key-a", config, NOW);
            }

            expect(checkRateLimit(store, "key-b", config, NOW).allowed).toBe(true);
            expect(checkRateLimit(store, "key-a", { ...config, keyPrefix: "other" }, NOW).allowed).toBe(true);
        });
    });

    describe("RateLimitStore.sweep", () => {
        it("should drop idle windows only", () => {
            store.set("old", [NOW - 120_000]);
            store.set("fresh", [NOW - 120_000, NOW - 1000]);

            expect(store.sweep(60_000, NOW)).toBe(1);
            expect(store.get("old")).toEqual([]);
            expect(store.get("fresh")).toHaveLength(2);
            expect(store.size).toBe(1);
        });
    });

    describe("createRateLimiter", () => {
        let env: TestEnv;

        beforeEach(() => {
            env = createTestEnv();
        });

        it("should set rate limit headers", async () => {
            const app = createTestApp({
                limit: 5,
                windowSeconds: 60,
                keyPrefix: "test",
                keyExtractor: extractClientIp,
            });

            const res = await makeRequest(app, env);

            expect(res.status).toBe(200);
            expect(res.headers.get("X-RateLimit-Limit")).toBe("5");
            expect(res.headers.get("X-RateLimit-Remaining")).toBe("4");
        });

        it("should return 429 with Retry-After when exceeded", async () => {
            const app = createTestApp({
                limit: 1,
                windowSeconds: 60,
                keyPrefix: "test",
                keyExtractor: extractClientIp,
            });

            await makeRequest(app, env);
            const res = await makeRequest(app, env);

            expect(res.status).toBe(429);
            expect(res.headers.get("Retry-After")).not.toBeNull();
            const body: Record<string, unknown> = await res.json();
            expect(body.code).toBe("RATE_LIMITED");
            expect(body.details).toMatchObject({ limit: "1", window_seconds: "60" });
        });

        it("should skip when the extractor yields no key", async () => {
            const app = createTestApp({
                limit: 1,
                windowSeconds: 60,
                keyPrefix: "test",
                keyExtractor: () => null,
            });

            await makeRequest(app, env);
            const res = await makeRequest(app, env);

            expect(res.status).toBe(200);
            expect(res.headers.get("X-RateLimit-Limit")).toBeNull();
        });

        it("should honor the skip predicate", async () => {
            const app = createTestApp({
                limit: 1,
                windowSeconds: 60,
                keyPrefix: "test",
                keyExtractor: extractClientIp,
                skip: (c) => c.req.header("x-internal") === "1",
            });

            await makeRequest(app, env);
            const res = await makeRequest(app, env, { headers: { "x-forwarded-for": "192.168.1.1", "x-internal": "1" } });

            expect(res.status).toBe(200);
        });
    });

    describe("extractClientIp", () => {
        const app = createTestApp({
            limit: 100,
            windowSeconds: 60,
            keyPrefix: "ip",
            keyExtractor: () => null,
        });

        it("should take the first X-Forwarded-For address", async () => {
            const res = await makeRequest(app, createTestEnv(), {
                path: "/ip",
                headers: { "x-forwarded-for": "203.0.113.9, 10.0.0.1" },
            });
            expect(await res.json()).toEqual({ ip: "203.0.113.9" });
        });

        it("should fall back to X-Real-IP", async () => {
            const res = await makeRequest(app, createTestEnv(), {
                path: "/ip",
                headers: { "x-real-ip": "198.51.100.4" },
            });
            expect(await res.json()).toEqual({ ip: "198.51.100.4" });
        });

        it("should use unknown without headers or a socket", async () => {
            const res = await makeRequest(app, createTestEnv(), { path: "/ip", headers: {} });
            expect(await res.json()).toEqual({ ip: "unknown" });
        });
    });
});
