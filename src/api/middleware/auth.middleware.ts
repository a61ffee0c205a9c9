/**
 * Authentication middleware
 *
 * Identifies the caller by the X-User-Id header, which carries the account id
 * returned when the account was opened
 */

import type { Context, Next } from "hono";
import { getAppContext } from "../../context";
import { UnauthorizedError } from "../types/errors";

/**
 * User authentication middleware
 * Extracts X-User-Id header and verifies the account exists
 * Sets userId in context for downstream handlers
 */
export async function userAuth(c: Context, next: Next): Promise<void | Response> {
    const userId = c.req.header("X-User-Id");

    if (!userId) {
        throw new UnauthorizedError("X-User-Id header required", "MISSING_USER_ID");
    }

    const ctx = getAppContext();
    if (!ctx.exchange.hasAccount(userId)) {
        throw new UnauthorizedError("User not found", "USER_NOT_FOUND");
    }

    // Set userId in context for route handlers
    c.set("userId", userId);

    await next();
}

// Type augmentation for Hono context
declare module "hono" {
    interface ContextVariableMap {
        userId: string;
    }
}
