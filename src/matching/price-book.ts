/**
 * Price-ordered book for one side of the pair
 *
 * Ticks are kept strictly ascending by price, one tick per price. Bids are
 * therefore best-last and asks best-first; the matching engine walks each
 * side from its best end.
 */

import type Decimal from "decimal.js";
import type { OrderBookLevel, OrderSide } from "../types";
import { recordUndo } from "../ledger/journal";
import { Tick, type Order } from "./order";

/**
 * Outcome of a price search
 *
 * - empty:  the book has no ticks
 * - exact:  `index` holds a tick at that price
 * - before: no tick at that price; it belongs just before `index`
 * - after:  no tick at that price; it belongs just after `index`
 */
export type TickSearch =
    | { kind: "empty" }
    | { kind: "exact"; index: number }
    | { kind: "before"; index: number }
    | { kind: "after"; index: number };

export class PriceBook {
    private readonly levels: Tick[] = [];

    constructor(readonly side: OrderSide) {}

    // ============================================
    // Search & Insert
    // ============================================

    /**
     * Binary search over tick prices
     */
    find(price: Decimal): TickSearch {
        if (this.levels.length === 0) {
            return { kind: "empty" };
        }

        let low = 0;
        let high = this.levels.length - 1;
        let mid = 0;

        while (low <= high) {
            mid = (low + high) >>> 1;
            const cmp = price.cmp(this.levels[mid].price);
            if (cmp === 0) {
                return { kind: "exact", index: mid };
            }
            if (cmp < 0) {
                high = mid - 1;
            } else {
                low = mid + 1;
            }
        }

        return price.lt(this.levels[mid].price) ? { kind: "before", index: mid } : { kind: "after", index: mid };
    }

    /**
     * Queue an order at its price, creating the tick if needed.
     * A new tick is appended and swapped left into place.
     */
    insert(order: Order): void {
        if (order.side !== this.side) {
            throw new Error(`Cannot insert ${order.side} order ${order.orderId} into the ${this.side} book`);
        }

        const found = this.find(order.price);
        if (found.kind === "exact") {
            this.levels[found.index].enqueue(order);
            return;
        }

        const tick = new Tick(order.price, order);
        this.levels.push(tick);

        let position = this.levels.length - 1;
        const target = found.kind === "empty" ? position : found.kind === "before" ? found.index : found.index + 1;
        while (position > target) {
            this.swap(position - 1, position);
            position--;
        }

        recordUndo(() => {
            const index = this.levels.indexOf(tick);
            if (index !== -1) {
                this.levels.splice(index, 1);
            }
        });
    }

    // ============================================
    // Traversal
    // ============================================

    /**
     * Ticks in ascending price order. Orders inside are live objects;
     * matching fills them in place.
     */
    ticks(): readonly Tick[] {
        return this.levels;
    }

    /**
     * Best tick first: highest bid, lowest ask
     */
    ticksBestFirst(): Tick[] {
        return this.side === "bid" ? this.levels.slice().reverse() : this.levels.slice();
    }

    get tickCount(): number {
        return this.levels.length;
    }

    get orderCount(): number {
        return this.levels.reduce((count, tick) => count + tick.orders.length, 0);
    }

    /**
     * Aggregate live quantity per price, best first. Empty levels are skipped.
     */
    toLevels(): OrderBookLevel[] {
        const result: OrderBookLevel[] = [];
        for (const tick of this.ticksBestFirst()) {
            const orderCount = tick.liveOrderCount;
            if (orderCount === 0) continue;

            result.push({
                price: tick.price,
                quantity: tick.quantity,
                orderCount,
            });
        }
        return result;
    }

    // ============================================
    // Pruning
    // ============================================

    /**
     * Drop fully filled orders and any tick left empty.
     * Sort order and per-tick FIFO of the remaining orders are unchanged.
     */
    prune(): number {
        let removed = 0;
        for (let i = this.levels.length - 1; i >= 0; i--) {
            const tick = this.levels[i];
            removed += tick.prune();
            if (tick.orders.length === 0) {
                this.levels.splice(i, 1);
                recordUndo(() => {
                    this.levels.splice(i, 0, tick);
                });
            }
        }
        return removed;
    }

    // ============================================
    // Private Helpers
    // ============================================

    private swap(a: number, b: number): void {
        const tmp = this.levels[a];
        this.levels[a] = this.levels[b];
        this.levels[b] = tmp;
    }
}
