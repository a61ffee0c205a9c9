/**
 * Health check endpoint
 *
 * GET /health - Returns book statistics and ledger reconciliation
 */

import { Hono } from "hono";
import { getAppContext } from "../../context";
import { logAppWarn } from "../../utils/logger";
import { serializeReconciliation } from "../utils/serialize";
import type { HealthResponse } from "../types/api.types";

const health = new Hono();

/**
 * GET /health
 * Unhealthy (503) when any ledger total differs from its outstanding supply
 */
health.get("/", async (c) => {
    const ctx = getAppContext();
    const reports = ctx.exchange.reconcile();
    const { bids, asks } = ctx.orderBook;

    const response: HealthResponse = {
        status: reports.every((report) => report.balanced) ? "healthy" : "unhealthy",
        timestamp: new Date().toISOString(),
        version: "0.1.0",
        pairId: ctx.orderBook.pairId,
        components: {
            orderBook: {
                bidTicks: bids.tickCount,
                askTicks: asks.tickCount,
                restingOrders: bids.orderCount + asks.orderCount,
            },
            ledgers: reports.map(serializeReconciliation),
        },
    };

    if (response.status !== "healthy") {
        for (const report of reports.filter((r) => !r.balanced)) {
            logAppWarn("Health", "Ledger drift", { asset: report.asset, drift: report.drift.toString() });
        }
    }

    // Set appropriate HTTP status code
    const httpStatus = response.status === "healthy" ? 200 : 503;

    return c.json(response, httpStatus);
});

export { health };
