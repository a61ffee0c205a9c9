/**
 * Order book for a single base/quote pair
 *
 * Features:
 * - Price-time priority matching at the maker's price
 * - Up-front collateral: bids lock price × quantity quote, asks lock quantity base
 * - Direct settlement between counterparties' escrow cells on every fill
 * - All-or-nothing placement (undo journal)
 */

import Decimal from "decimal.js";
import type { AccountId, AssetLeg, Fill, OrderBookSnapshot, OrderSide, OrderStatus } from "../types";
import { AccountNotFoundError, InsufficientFundsError, InvalidOrderError, InvariantViolationError } from "../errors";
import { accountIdOf, type AccountCap } from "../ledger/account";
import { Balance, exceedsPrecision } from "../ledger/balance";
import { EscrowLedger, reclassify } from "../ledger/escrow";
import { atomically } from "../ledger/journal";
import type { Order, Tick } from "./order";
import { PriceBook } from "./price-book";

// ============================================
// Types
// ============================================

export interface OrderBookOptions {
    /**
     * Remove fully filled orders (and emptied ticks) after each matching pass,
     * and don't rest an incoming order that filled completely. Off by default:
     * filled orders otherwise stay in their tick with zero quantity.
     */
    pruneFilledOrders?: boolean;
}

/**
 * Result of placing an order
 */
export interface PlacementResult {
    /** The placed order; its quantity is the unmatched remainder */
    order: Order;
    /** Executions against resting orders, in matching order */
    fills: Fill[];
    filledQuantity: Decimal;
    remainingQuantity: Decimal;
    status: OrderStatus;
    /** Collateral withdrawn up front (quote for bids, base for asks) */
    collateral: Decimal;
    /** Collateral not consumed by matching, now locked for the resting remainder */
    lockedRemainder: Decimal;
    /** Whether the order was inserted into its side of the book */
    rested: boolean;
}

// ============================================
// Order Book
// ============================================

export class OrderBook<B extends string = string, Q extends string = string> {
    readonly bids = new PriceBook("bid");
    readonly asks = new PriceBook("ask");
    readonly baseLedger: EscrowLedger<B>;
    readonly quoteLedger: EscrowLedger<Q>;

    private readonly pruneFilledOrders: boolean;

    constructor(
        readonly pairId: string,
        readonly baseAsset: B,
        readonly quoteAsset: Q,
        options: OrderBookOptions = {},
    ) {
        this.baseLedger = new EscrowLedger(baseAsset);
        this.quoteLedger = new EscrowLedger(quoteAsset);
        this.pruneFilledOrders = options.pruneFilledOrders ?? false;
    }

    // ============================================
    // Placement
    // ============================================

    /**
     * Place a bid: lock price × quantity quote, buy from the cheapest asks
     * priced at or below the bid, rest the remainder.
     */
    placeBid(order: Order): PlacementResult {
        if (order.side !== "bid") {
            throw new Error(`placeBid called with ${order.side} order ${order.orderId}`);
        }

        return atomically(() => {
            order.markPlaced();
            this.requireAccount(order.owner);

            const required = order.price.mul(order.quantity);
            if (exceedsPrecision(required)) {
                throw new InvalidOrderError(
                    `Collateral for ${order.orderId} exceeds ${Decimal.precision} digits`,
                    "NOTIONAL_TOO_LARGE",
                );
            }
            const collateral = this.quoteLedger.withdraw("unlocked", order.owner, required);
            const purchased = Balance.zero(this.baseAsset, "unlocked");
            const fills = this.matchBid(order, collateral, purchased);

            const lockedRemainder = collateral.value;
            this.quoteLedger.deposit("locked", order.owner, reclassify(collateral, "unlocked", "locked"));
            this.baseLedger.deposit("unlocked", order.owner, purchased);

            const rested = this.rest(order, this.bids);
            return this.buildResult(order, fills, required, lockedRemainder, rested);
        });
    }

    /**
     * Place an ask: lock quantity base, sell into the highest bids priced at
     * or above the ask, rest the remainder.
     */
    placeAsk(order: Order): PlacementResult {
        if (order.side !== "ask") {
            throw new Error(`placeAsk called with ${order.side} order ${order.orderId}`);
        }

        return atomically(() => {
            order.markPlaced();
            this.requireAccount(order.owner);

            const required = order.quantity;
            const collateral = this.baseLedger.withdraw("unlocked", order.owner, required);
            const proceeds = Balance.zero(this.quoteAsset, "unlocked");
            const fills = this.matchAsk(order, collateral, proceeds);

            const lockedRemainder = collateral.value;
            this.baseLedger.deposit("locked", order.owner, reclassify(collateral, "unlocked", "locked"));
            this.quoteLedger.deposit("unlocked", order.owner, proceeds);

            const rested = this.rest(order, this.asks);
            return this.buildResult(order, fills, required, lockedRemainder, rested);
        });
    }

    /**
     * Route an order to placeBid/placeAsk by its side
     */
    place(order: Order): PlacementResult {
        return order.side === "bid" ? this.placeBid(order) : this.placeAsk(order);
    }

    // ============================================
    // Queries
    // ============================================

    lockedBalance(leg: AssetLeg, accountId: AccountId): Decimal {
        return this.ledger(leg).balance("locked", accountId);
    }

    unlockedBalance(leg: AssetLeg, accountId: AccountId): Decimal {
        return this.ledger(leg).balance("unlocked", accountId);
    }

    ledger(leg: "base"): EscrowLedger<B>;
    ledger(leg: "quote"): EscrowLedger<Q>;
    ledger(leg: AssetLeg): EscrowLedger<B> | EscrowLedger<Q>;
    ledger(leg: AssetLeg): EscrowLedger<B> | EscrowLedger<Q> {
        return leg === "base" ? this.baseLedger : this.quoteLedger;
    }

    /**
     * Ticks of one side, ascending by price
     */
    ticks(side: OrderSide): readonly Tick[] {
        return this.book(side).ticks();
    }

    /**
     * Resting orders with quantity left that belong to an account, oldest first
     */
    ordersOf(accountId: AccountId): Order[] {
        const result: Order[] = [];
        for (const book of [this.bids, this.asks]) {
            for (const tick of book.ticks()) {
                for (const order of tick.orders) {
                    if (!order.isFilled() && order.ownerId === accountId) {
                        result.push(order);
                    }
                }
            }
        }
        return result.sort((a, b) => a.sequence - b.sequence);
    }

    /**
     * Generate an aggregated snapshot for API responses
     */
    snapshot(): OrderBookSnapshot {
        return {
            pairId: this.pairId,
            baseAsset: this.baseAsset,
            quoteAsset: this.quoteAsset,
            bids: this.bids.toLevels(),
            asks: this.asks.toLevels(),
            lastUpdated: new Date(),
        };
    }

    // ============================================
    // Matching
    // ============================================

    /**
     * Cross a bid against asks, lowest tick first. Each fill pays the maker
     * from `collateral` at the maker's price and moves the maker's locked base
     * into `purchased`.
     */
    private matchBid(taker: Order, collateral: Balance<Q, "unlocked">, purchased: Balance<B, "unlocked">): Fill[] {
        const fills: Fill[] = [];

        for (const tick of this.asks.ticks()) {
            if (taker.isFilled() || tick.price.gt(taker.price)) break;

            for (const maker of tick.orders) {
                if (taker.isFilled()) break;
                if (maker.isFilled()) continue;

                const matched = Decimal.min(taker.quantity, maker.quantity);
                const quoteAmount = maker.price.mul(matched);

                this.quoteLedger.deposit("unlocked", maker.owner, collateral.split(quoteAmount));
                const base = this.releaseLocked(this.baseLedger, maker, matched);
                purchased.join(reclassify(base, "locked", "unlocked"));

                maker.fill(matched);
                taker.fill(matched);
                fills.push(this.createFill(taker, maker, matched, quoteAmount));
            }
        }

        if (this.pruneFilledOrders) {
            this.asks.prune();
        }
        return fills;
    }

    /**
     * Cross an ask against bids, highest tick first. Each fill delivers base
     * from `collateral` to the maker and moves the maker's locked quote
     * (maker price × matched) into `proceeds`.
     */
    private matchAsk(taker: Order, collateral: Balance<B, "unlocked">, proceeds: Balance<Q, "unlocked">): Fill[] {
        const fills: Fill[] = [];
        const ticks = this.bids.ticks();

        for (let i = ticks.length - 1; i >= 0; i--) {
            const tick = ticks[i];
            if (taker.isFilled() || tick.price.lt(taker.price)) break;

            for (const maker of tick.orders) {
                if (taker.isFilled()) break;
                if (maker.isFilled()) continue;

                const matched = Decimal.min(taker.quantity, maker.quantity);
                const quoteAmount = maker.price.mul(matched);

                this.baseLedger.deposit("unlocked", maker.owner, collateral.split(matched));
                const quote = this.releaseLocked(this.quoteLedger, maker, quoteAmount);
                proceeds.join(reclassify(quote, "locked", "unlocked"));

                maker.fill(matched);
                taker.fill(matched);
                fills.push(this.createFill(taker, maker, matched, quoteAmount));
            }
        }

        if (this.pruneFilledOrders) {
            this.bids.prune();
        }
        return fills;
    }

    // ============================================
    // Private Helpers
    // ============================================

    /**
     * Withdraw a maker's locked collateral for a fill. A shortfall means a
     * resting order is under-collateralized, which the engine never produces.
     */
    private releaseLocked<A extends string>(ledger: EscrowLedger<A>, maker: Order, amount: Decimal): Balance<A, "locked"> {
        try {
            return ledger.withdraw("locked", maker.owner, amount);
        } catch (error) {
            if (error instanceof InsufficientFundsError || error instanceof AccountNotFoundError) {
                throw new InvariantViolationError(
                    `Resting ${maker.side} ${maker.orderId} of ${maker.ownerId} cannot cover ${amount.toString()} ${ledger.asset}: ${error.message}`,
                );
            }
            throw error;
        }
    }

    /**
     * Both ledgers must know the placer before anything moves
     */
    private requireAccount(owner: AccountCap): void {
        const accountId = accountIdOf(owner);
        if (!this.baseLedger.isInitialized(accountId)) {
            throw new AccountNotFoundError(accountId, this.baseAsset);
        }
        if (!this.quoteLedger.isInitialized(accountId)) {
            throw new AccountNotFoundError(accountId, this.quoteAsset);
        }
    }

    /**
     * Insert the placed order into its own side, unless pruning is on and
     * nothing is left of it
     */
    private rest(order: Order, own: PriceBook): boolean {
        if (this.pruneFilledOrders && order.isFilled()) {
            return false;
        }
        own.insert(order);
        return true;
    }

    private book(side: OrderSide): PriceBook {
        return side === "bid" ? this.bids : this.asks;
    }

    private createFill(taker: Order, maker: Order, quantity: Decimal, quoteAmount: Decimal): Fill {
        return {
            makerOrderId: maker.orderId,
            makerId: maker.ownerId,
            takerOrderId: taker.orderId,
            takerId: taker.ownerId,
            price: maker.price,
            quantity,
            quoteAmount,
        };
    }

    private buildResult(order: Order, fills: Fill[], collateral: Decimal, lockedRemainder: Decimal, rested: boolean): PlacementResult {
        const filledQuantity = order.filledQuantity;
        let status: OrderStatus;
        if (order.isFilled()) {
            status = "filled";
        } else if (filledQuantity.gt(0)) {
            status = "partial";
        } else {
            status = "open";
        }

        return {
            order,
            fills,
            filledQuantity,
            remainingQuantity: order.quantity,
            status,
            collateral,
            lockedRemainder,
            rested,
        };
    }
}
