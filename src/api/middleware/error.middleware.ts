/**
 * Global error handler middleware
 *
 * Converts engine errors and API errors to consistent JSON responses
 */

import type { Context } from "hono";
import { ApiError, BadRequestError, ConflictError, InternalServerError, NotFoundError } from "../types/errors";
import type { ErrorResponse } from "../types/api.types";
import { getConfig } from "../../config";
import {
    AccountExistsError,
    AccountNotFoundError,
    InsufficientFundsError,
    InvalidOrderError,
    InvariantViolationError,
} from "../../errors";
import { ExchangeValidationError } from "../../services";
import { logAppError, logAppWarn } from "../../utils/logger";

/**
 * Translate an engine or service error into its API counterpart, keeping the code
 */
function toApiError(err: Error): ApiError | null {
    if (err instanceof InvalidOrderError || err instanceof InsufficientFundsError || err instanceof ExchangeValidationError) {
        return new BadRequestError(err.message, err.code);
    }
    if (err instanceof AccountNotFoundError) return new NotFoundError(err.message, err.code);
    if (err instanceof AccountExistsError) return new ConflictError(err.message, err.code);
    if (err instanceof InvariantViolationError) return new InternalServerError(err.message, err.code);
    return null;
}

/**
 * Global error handler for Hono
 * Maps various error types to appropriate HTTP responses
 */
export async function errorHandler(err: Error, c: Context): Promise<Response> {
    // Handle known API errors, including engine errors translated to them
    const apiError = err instanceof ApiError ? err : toApiError(err);
    if (apiError) {
        if (apiError.statusCode >= 500) {
            logAppError("API", `${err.name} in ${c.req.method} ${c.req.path}`, err);
        } else {
            logAppWarn("API", `${err.name}: ${err.message}`, { code: apiError.code });
        }
        const response: ErrorResponse = {
            error: apiError.message,
            code: apiError.code,
        };
        if (apiError.details) {
            response.details = apiError.details;
        }
        return c.json(response, apiError.statusCode);
    }

    // Handle JSON parse errors
    if (err instanceof SyntaxError) {
        const response: ErrorResponse = {
            error: "Invalid JSON in request body",
            code: "INVALID_JSON",
        };
        return c.json(response, 400);
    }

    logAppError("API", `Unhandled ${err.name} in ${c.req.method} ${c.req.path}`, err);
    if (getConfig().env !== "production" && err.stack) {
        console.error(err.stack);
    }

    // Generic server error (don't leak internal details in production)
    const response: ErrorResponse = {
        error: getConfig().env === "production" ? "Internal server error" : err.message,
        code: "INTERNAL_ERROR",
    };
    return c.json(response, 500);
}
