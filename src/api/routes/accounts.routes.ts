/**
 * Account creation endpoint
 *
 * POST /api/accounts - Open a new account in both asset ledgers
 */

import { Hono } from "hono";
import { getAppContext } from "../../context";
import { serializeAccount } from "../utils/serialize";

const accounts = new Hono();

/**
 * POST /api/accounts
 * Returns the new account with zero balances; its accountId is the X-User-Id
 * for every authenticated route
 */
accounts.post("/", async (c) => {
    const ctx = getAppContext();
    const summary = ctx.exchange.openAccount();
    return c.json(serializeAccount(summary), 201);
});

export { accounts };
