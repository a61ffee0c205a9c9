/**
 * Orders endpoints
 *
 * POST /api/orders - Place a limit order
 */

import { Hono } from "hono";
import { getAppContext } from "../../context";
import { userAuth } from "../middleware";
import { serializePlacement } from "../utils/serialize";
import { validateBody, validateEnum, validateNumeric } from "../utils/validation";
import type { PlaceOrderBody } from "../types/api.types";

const orders = new Hono();

// All order routes require user authentication
orders.use("*", userAuth);

/**
 * POST /api/orders
 * Lock collateral, match against the opposite side, rest the remainder
 */
orders.post("/", async (c) => {
    const ctx = getAppContext();
    const userId = c.get("userId");
    const body = validateBody(await c.req.json<unknown>());

    // Validate request body
    const request: PlaceOrderBody = {
        side: validateEnum(body.side, ["bid", "ask"] as const, "side"),
        price: validateNumeric(body.price, "price"),
        quantity: validateNumeric(body.quantity, "quantity"),
    };

    const result = ctx.exchange.placeOrder(userId, request);
    return c.json(serializePlacement(result), 201);
});

export { orders };
