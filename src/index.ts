import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import type { Env } from "./env";
import { errorMessage } from "./errors";
import { SERVER_VERSION } from "./mcp/server";
import { api, errors, mcp, oauth, renderHomePage } from "./routes";

/**
 * Build the gateway application. Services arrive per request as bindings.
 */
export function createApp() {
	const app = new Hono<{ Bindings: Env }>();

	// Middleware
	app.use("*", logger());
	app.use("*", cors({
		origin: "*",
		allowMethods: ["GET", "POST", "DELETE", "OPTIONS"],
		allowHeaders: ["Content-Type", "Authorization", "Mcp-Session-Id", "Mcp-Protocol-Version", "Last-Event-ID"],
		exposeHeaders: ["Mcp-Session-Id"],
	}));

	// Landing page
	app.get("/", (c) => c.html(renderHomePage()));

	// Health check
	app.get("/health", (c) => {
		return c.json({ status: "healthy", version: SERVER_VERSION });
	});

	app.route("/oauth", oauth);
	app.route("/api", api);
	app.route("/mcp", mcp);

	app.notFound((c) => errors.notFound(c, "Not found"));

	app.onError((err, c) => {
		c.env.LOGGER.error("unhandled_error", {
			method: c.req.method,
			path: c.req.routePath,
			error: errorMessage(err),
		});
		return errors.internal(c);
	});

	return app;
}

export type App = ReturnType<typeof createApp>;
