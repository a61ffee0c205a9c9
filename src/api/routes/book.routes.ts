/**
 * Orderbook endpoints
 *
 * GET /api/book               - Aggregated levels, best price first
 * GET /api/book/ticks?side=   - Ticks of one side with their FIFO queues
 */

import { Hono } from "hono";
import { getAppContext } from "../../context";
import { serializeOrderBook, serializeTicks } from "../utils/serialize";
import { validateEnum } from "../utils/validation";

const book = new Hono();

book.get("/", async (c) => {
    const ctx = getAppContext();
    return c.json(serializeOrderBook(ctx.exchange.getOrderBook()));
});

/**
 * GET /api/book/ticks
 * Ascending by price; fully filled orders still in the book are listed with quantity 0
 */
book.get("/ticks", async (c) => {
    const ctx = getAppContext();
    const side = validateEnum(c.req.query("side"), ["bid", "ask"] as const, "side");

    return c.json(serializeTicks(side, ctx.exchange.getTicks(side)));
});

export { book };
