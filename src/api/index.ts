/**
 * Main API setup
 *
 * Creates and configures the Hono application with all routes and middleware
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import type { MiddlewareHandler } from "hono";

import { errorHandler } from "./middleware";
import { health, accounts, account, orders, book } from "./routes";
import { logApp } from "../utils/logger";

// ============================================
// Custom Logger with Timestamps
// ============================================

/**
 * Request logging through the app logger, so HTTP lines share its
 * timestamp format and level gate. Includes the caller for tracing.
 */
const timestampedLogger = (): MiddlewareHandler => {
    return async (c, next) => {
        const method = c.req.method;
        const path = c.req.path;
        const start = Date.now();
        const userId = c.req.header("X-User-Id");

        logApp("API", `--> ${method} ${path}`, { user: userId ?? "anonymous" });

        await next();

        // Log response with duration and status
        const duration = Date.now() - start;
        const status = c.res.status;
        const statusLabel = status >= 400 ? `${status} ERROR` : `${status}`;
        logApp("API", `<-- ${method} ${path} ${statusLabel} ${duration}ms`);
    };
};

// Create main Hono app
const app = new Hono();

// ============================================
// Global Middleware
// ============================================

// Request logging with timestamps
app.use("*", timestampedLogger());

// CORS configuration
app.use(
    "*",
    cors({
        origin: "*", // Configure for specific origins in production
        allowHeaders: ["Content-Type", "X-User-Id"],
        allowMethods: ["GET", "POST", "OPTIONS"],
        maxAge: 600, // 10 minutes preflight cache
    }),
);

// ============================================
// Routes
// ============================================

// Health check (no auth)
app.route("/health", health);
app.route("/api/health", health);

// API routes
app.route("/api/accounts", accounts);
app.route("/api/account", account);
app.route("/api/orders", orders);
app.route("/api/book", book);

// ============================================
// Error Handling
// ============================================

// Global error handler
app.onError(errorHandler);

// 404 handler
app.notFound((c) => {
    return c.json(
        {
            error: "Not found",
            code: "NOT_FOUND",
        },
        404,
    );
});

// ============================================
// Exports
// ============================================

export { app };
