/**
 * Domain errors raised by the ledger and the matching engine
 *
 * All of them are synchronous and local. The engine never retries; a failed
 * placement leaves books and ledgers exactly as they were before the call.
 */

import type Decimal from "decimal.js";

/**
 * Base class for engine errors
 * The API error handler maps subclasses to HTTP responses by `code`
 */
export class EngineError extends Error {
    constructor(
        message: string,
        public readonly code: string,
    ) {
        super(message);
        this.name = "EngineError";
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }
}

export type InvalidOrderCode =
    | "ZERO_PRICE"
    | "ZERO_QUANTITY"
    | "NEGATIVE_PRICE"
    | "NEGATIVE_QUANTITY"
    | "NON_INTEGER_PRICE"
    | "NON_INTEGER_QUANTITY"
    | "PRICE_TOO_LARGE"
    | "QUANTITY_TOO_LARGE"
    | "NOTIONAL_TOO_LARGE"
    | "ALREADY_PLACED";

/**
 * Order rejected before any ledger effect: at construction, or on placement
 * when its collateral can't be computed exactly or it was placed before
 */
export class InvalidOrderError extends EngineError {
    constructor(message: string, code: InvalidOrderCode) {
        super(message, code);
        this.name = "InvalidOrderError";
    }
}

/**
 * Balance or transfer addressed to an account the ledger never initialized.
 * Without an asset, the account is unknown to the exchange altogether.
 */
export class AccountNotFoundError extends EngineError {
    constructor(
        public readonly accountId: string,
        public readonly asset?: string,
    ) {
        super(
            asset === undefined
                ? `Account ${accountId} not found`
                : `Account ${accountId} is not initialized in the ${asset} ledger`,
            "ACCOUNT_NOT_FOUND",
        );
        this.name = "AccountNotFoundError";
    }
}

export class AccountExistsError extends EngineError {
    constructor(
        public readonly accountId: string,
        public readonly asset: string,
    ) {
        super(`Account ${accountId} is already initialized in the ${asset} ledger`, "ACCOUNT_EXISTS");
        this.name = "AccountExistsError";
    }
}

/**
 * Withdrawal larger than the magnitude of the cell it is split from
 */
export class InsufficientFundsError extends EngineError {
    constructor(
        public readonly asset: string,
        public readonly requested: Decimal,
        public readonly available: Decimal,
    ) {
        super(
            `Insufficient ${asset} funds. Available: ${available.toString()}, Requested: ${requested.toString()}`,
            "INSUFFICIENT_FUNDS",
        );
        this.name = "InsufficientFundsError";
    }
}

/**
 * A resting order's locked collateral no longer covers its remaining quantity.
 * Signals a conservation bug elsewhere; never a recoverable condition.
 */
export class InvariantViolationError extends EngineError {
    constructor(message: string) {
        super(message, "INVARIANT_VIOLATION");
        this.name = "InvariantViolationError";
    }
}
