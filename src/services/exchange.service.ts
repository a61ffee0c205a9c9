/**
 * Exchange Service
 *
 * Custodian of account capabilities and the funding boundary of the pair.
 * Callers address accounts by id; the service presents the matching
 * capability to the ledgers and the order book on their behalf.
 *
 * Flow for an order:
 * 1. Resolve the caller's capability
 * 2. Build and validate the order (positive integers, configured limits)
 * 3. Place it on the book (collateral, matching, settlement, resting)
 * 4. Log the outcome
 *
 * Every operation is all-or-nothing.
 */

import Decimal from "decimal.js";
import type {
    AccountId,
    AccountSummary,
    AssetBalance,
    AssetLeg,
    OrderBookSnapshot,
    OrderSide,
    PlaceOrderRequest,
    ReconciliationReport,
} from "../types";
import { AccountNotFoundError, InvalidOrderError } from "../errors";
import { AccountCap, Supply, accountIdOf, atomically, recordUndo } from "../ledger";
import { Order, type OrderBook, type PlacementResult, type Tick } from "../matching";
import { logApp, logAppError, logLedger } from "../utils/logger";

// ============================================
// Types
// ============================================

/** Exchange service configuration */
export interface ExchangeServiceConfig {
    maxQuantity?: number; // Default: 1,000,000
    maxPrice?: number; // Default: 1,000,000
    maxDeposit?: number; // Default: 1,000,000,000
}

// ============================================
// Exchange Service
// ============================================

export class ExchangeService {
    private readonly maxQuantity: number;
    private readonly maxPrice: number;
    private readonly maxDeposit: number;

    private readonly custody = new Map<AccountId, AccountCap>();
    private readonly baseSupply: Supply<string>;
    private readonly quoteSupply: Supply<string>;

    constructor(
        private readonly book: OrderBook,
        config: ExchangeServiceConfig = {},
    ) {
        this.maxQuantity = config.maxQuantity ?? 1_000_000;
        this.maxPrice = config.maxPrice ?? 1_000_000;
        this.maxDeposit = config.maxDeposit ?? 1_000_000_000;
        this.baseSupply = new Supply(book.baseAsset);
        this.quoteSupply = new Supply(book.quoteAsset);
    }

    // ============================================
    // Accounts
    // ============================================

    /**
     * Issue a capability and initialize it in both ledgers
     */
    openAccount(): AccountSummary {
        const cap = AccountCap.issue();
        const accountId = accountIdOf(cap);

        atomically(() => {
            this.book.baseLedger.initialize(cap);
            this.book.quoteLedger.initialize(cap);
            this.custody.set(accountId, cap);
            recordUndo(() => {
                this.custody.delete(accountId);
            });
        });

        logLedger("INIT", this.book.baseAsset, { accountId });
        logLedger("INIT", this.book.quoteAsset, { accountId });
        logApp("ExchangeService", "Account opened", { accountId });

        return this.getAccountSummary(accountId);
    }

    hasAccount(accountId: AccountId): boolean {
        return this.custody.has(accountId);
    }

    /**
     * Fund an account from outside the exchange: mint into its unlocked cell
     */
    deposit(accountId: AccountId, leg: AssetLeg, amount: Decimal.Value): AccountSummary {
        const cap = this.requireCap(accountId);
        const value = this.parseAmount(amount, this.maxDeposit);
        const supply = this.supply(leg);

        atomically(() => {
            this.book.ledger(leg).deposit("unlocked", cap, supply.mint(value));
        });

        logLedger("DEPOSIT", supply.asset, { accountId, amount: value.toString() });
        return this.getAccountSummary(accountId);
    }

    /**
     * Take unlocked funds out of the exchange: withdraw and burn
     */
    withdraw(accountId: AccountId, leg: AssetLeg, amount: Decimal.Value): AccountSummary {
        const cap = this.requireCap(accountId);
        const value = this.parseAmount(amount);
        const supply = this.supply(leg);

        atomically(() => {
            supply.burn(this.book.ledger(leg).withdraw("unlocked", cap, value));
        });

        logLedger("WITHDRAW", supply.asset, { accountId, amount: value.toString() });
        return this.getAccountSummary(accountId);
    }

    getAccountSummary(accountId: AccountId): AccountSummary {
        this.requireCap(accountId);
        return {
            accountId,
            base: this.assetBalance("base", accountId),
            quote: this.assetBalance("quote", accountId),
        };
    }

    // ============================================
    // Orders
    // ============================================

    /**
     * Place a limit order for an account
     *
     * @throws InvalidOrderError on a non-positive, fractional or out-of-limit price or quantity
     * @throws InsufficientFundsError when the unlocked balance can't cover the collateral
     */
    placeOrder(accountId: AccountId, request: PlaceOrderRequest): PlacementResult {
        const owner = this.requireCap(accountId);
        const order = Order.create({ side: request.side, owner, price: request.price, quantity: request.quantity });

        if (order.price.gt(this.maxPrice)) {
            throw new InvalidOrderError(`price must be at most ${this.maxPrice}`, "PRICE_TOO_LARGE");
        }
        if (order.quantity.gt(this.maxQuantity)) {
            throw new InvalidOrderError(`quantity must be at most ${this.maxQuantity}`, "QUANTITY_TOO_LARGE");
        }

        let result: PlacementResult;
        try {
            result = this.book.place(order);
        } catch (error) {
            logAppError("ExchangeService", "Order rejected", error, {
                accountId,
                side: order.side,
                price: order.price.toString(),
                quantity: order.originalQuantity.toString(),
            });
            throw error;
        }

        logLedger("PLACE", order.side === "bid" ? this.book.quoteAsset : this.book.baseAsset, {
            accountId,
            orderId: order.orderId,
            collateral: result.collateral.toString(),
            locked: result.lockedRemainder.toString(),
        });
        logApp("ExchangeService", "Order placed", {
            orderId: order.orderId,
            side: order.side,
            price: order.price.toString(),
            quantity: order.originalQuantity.toString(),
            fills: result.fills.length,
            status: result.status,
        });

        return result;
    }

    getOrdersByUser(accountId: AccountId): Order[] {
        this.requireCap(accountId);
        return this.book.ordersOf(accountId);
    }

    getOrderBook(): OrderBookSnapshot {
        return this.book.snapshot();
    }

    getTicks(side: OrderSide): readonly Tick[] {
        return this.book.ticks(side);
    }

    // ============================================
    // Reconciliation
    // ============================================

    /**
     * Compare each ledger's total against its outstanding supply
     */
    reconcile(): ReconciliationReport[] {
        const legs: AssetLeg[] = ["base", "quote"];
        return legs.map((leg) => {
            const supply = this.supply(leg);
            const ledgerTotal = this.book.ledger(leg).total();
            const drift = ledgerTotal.minus(supply.total);
            return {
                asset: supply.asset,
                leg,
                supply: supply.total,
                ledgerTotal,
                drift,
                balanced: drift.isZero(),
            };
        });
    }

    // ============================================
    // Private Helpers
    // ============================================

    private requireCap(accountId: AccountId): AccountCap {
        const cap = this.custody.get(accountId);
        if (!cap) {
            throw new AccountNotFoundError(accountId);
        }
        return cap;
    }

    private supply(leg: AssetLeg): Supply<string> {
        return leg === "base" ? this.baseSupply : this.quoteSupply;
    }

    private assetBalance(leg: AssetLeg, accountId: AccountId): AssetBalance {
        const locked = this.book.lockedBalance(leg, accountId);
        const unlocked = this.book.unlockedBalance(leg, accountId);
        return {
            asset: this.supply(leg).asset,
            locked,
            unlocked,
            total: locked.plus(unlocked),
        };
    }

    /**
     * Amounts moved across the exchange boundary are positive integers
     */
    private parseAmount(amount: Decimal.Value, max?: number): Decimal {
        let value: Decimal;
        try {
            value = new Decimal(amount);
        } catch {
            throw new ExchangeValidationError("amount must be a number", "INVALID_AMOUNT");
        }

        if (!value.isInteger() || value.lte(0)) {
            throw new ExchangeValidationError("amount must be a positive whole number", "INVALID_AMOUNT");
        }
        if (max !== undefined && value.gt(max)) {
            throw new ExchangeValidationError(`amount must be at most ${max}`, "AMOUNT_TOO_LARGE");
        }
        return value;
    }
}

// ============================================
// Errors
// ============================================

export class ExchangeValidationError extends Error {
    constructor(
        message: string,
        public readonly code: string,
    ) {
        super(message);
        this.name = "ExchangeValidationError";
    }
}
