/**
 * Account endpoints
 *
 * GET  /api/account           - Get balances for both assets
 * POST /api/account/deposit   - Deposit funds
 * POST /api/account/withdraw  - Withdraw funds
 * GET  /api/account/orders    - List resting orders
 */

import { Hono } from "hono";
import { getAppContext } from "../../context";
import { userAuth } from "../middleware";
import { serializeAccount, serializeOrder } from "../utils/serialize";
import { validateBody, validateEnum, validateNumeric } from "../utils/validation";
import type { TransferRequest } from "../types/api.types";

const ASSET_LEGS = ["base", "quote"] as const;

const account = new Hono();

// All account routes require user authentication
account.use("*", userAuth);

async function readTransfer(json: Promise<unknown>): Promise<TransferRequest> {
    const body = validateBody(await json);
    return {
        asset: validateEnum(body.asset, ASSET_LEGS, "asset"),
        amount: validateNumeric(body.amount, "amount"),
    };
}

/**
 * GET /api/account
 * Locked, unlocked and total balance of each asset
 */
account.get("/", async (c) => {
    const ctx = getAppContext();
    const userId = c.get("userId");

    return c.json(serializeAccount(ctx.exchange.getAccountSummary(userId)));
});

/**
 * POST /api/account/deposit
 * Credit unlocked funds from outside the exchange
 */
account.post("/deposit", async (c) => {
    const ctx = getAppContext();
    const userId = c.get("userId");
    const { asset, amount } = await readTransfer(c.req.json<unknown>());

    const summary = ctx.exchange.deposit(userId, asset, amount);
    return c.json(serializeAccount(summary), 201);
});

/**
 * POST /api/account/withdraw
 * Debit unlocked funds; locked collateral can't be withdrawn
 */
account.post("/withdraw", async (c) => {
    const ctx = getAppContext();
    const userId = c.get("userId");
    const { asset, amount } = await readTransfer(c.req.json<unknown>());

    const summary = ctx.exchange.withdraw(userId, asset, amount);
    return c.json(serializeAccount(summary));
});

/**
 * GET /api/account/orders
 * Resting orders with quantity left, oldest first
 */
account.get("/orders", async (c) => {
    const ctx = getAppContext();
    const userId = c.get("userId");

    return c.json({
        data: ctx.exchange.getOrdersByUser(userId).map(serializeOrder),
    });
});

export { account };
