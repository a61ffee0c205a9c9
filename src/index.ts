/**
 * Exchange server entry point
 *
 * Configures decimal.js and logging, builds the order book and exchange
 * service, and serves the HTTP API
 */

import Decimal from "decimal.js";
import { serve, type ServerType } from "@hono/node-server";
import { app } from "./api";
import { getConfig, type EngineConfig } from "./config";
import { createAppContext, setAppContext, type AppContext } from "./context";
import { logApp, logAppError, setLogLevel } from "./utils/logger";

// ============================================
// Initialization
// ============================================

function initializeApp(config: EngineConfig): AppContext {
    setLogLevel(config.logLevel);

    console.log("=".repeat(50));
    console.log("  Exchange - Starting...");
    console.log("=".repeat(50));
    console.log(`  Environment: ${config.env}`);
    console.log(`  Server: ${config.host}:${config.port}`);
    console.log(`  Pair: ${config.market.pairId} (${config.market.baseAsset}/${config.market.quoteAsset})`);
    console.log("");

    // Configure Decimal.js for financial calculations
    Decimal.set({
        precision: config.decimal.precision,
        rounding: config.decimal.rounding,
    });
    logApp("Decimal", "Configured", { precision: config.decimal.precision });

    const context = createAppContext(config);
    setAppContext(context);
    logApp("OrderBook", "Ready", { pairId: config.market.pairId, pruneFilledOrders: config.market.pruneFilledOrders });

    return context;
}

// ============================================
// Graceful Shutdown
// ============================================

function setupGracefulShutdown(server: ServerType): void {
    const shutdown = (signal: string) => {
        console.log(`\n[Shutdown] Received ${signal}, cleaning up...`);

        server.close((error) => {
            if (error) {
                logAppError("Shutdown", "Error stopping HTTP server", error);
                process.exit(1);
            }
            console.log("[Shutdown] HTTP server stopped");
            console.log("[Shutdown] Goodbye!");
            process.exit(0);
        });
    };

    process.on("SIGINT", () => shutdown("SIGINT"));
    process.on("SIGTERM", () => shutdown("SIGTERM"));
}

// ============================================
// Main
// ============================================

function main(): void {
    try {
        const context = initializeApp(getConfig());

        const server = serve(
            {
                fetch: app.fetch,
                port: context.config.port,
                hostname: context.config.host,
            },
            (info) => {
                console.log("");
                console.log("=".repeat(50));
                console.log("  Exchange - Ready");
                console.log("=".repeat(50));
                console.log(`  HTTP server listening on ${info.address}:${info.port}`);
                console.log("");
                console.log("  API Endpoints:");
                console.log("    GET  /health               - Health check");
                console.log("    POST /api/accounts         - Open account");
                console.log("    GET  /api/account          - Balances");
                console.log("    POST /api/account/deposit  - Deposit");
                console.log("    POST /api/account/withdraw - Withdraw");
                console.log("    GET  /api/account/orders   - Resting orders");
                console.log("    POST /api/orders           - Place order");
                console.log("    GET  /api/book             - Orderbook");
                console.log("    GET  /api/book/ticks       - Ticks of one side");
                console.log("");
                console.log("Press Ctrl+C to stop");
            },
        );

        setupGracefulShutdown(server);
    } catch (error) {
        console.error("Fatal error during initialization:", error);
        process.exit(1);
    }
}

main();
