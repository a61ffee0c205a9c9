/**
 * Orders and price levels
 */

import { randomUUID } from "node:crypto";
import Decimal from "decimal.js";
import type { AccountId, OrderSide } from "../types";
import { InvalidOrderError } from "../errors";
import { accountIdOf, type AccountCap } from "../ledger/account";
import { exceedsPrecision } from "../ledger/balance";
import { recordUndo } from "../ledger/journal";

export interface OrderInit {
    side: OrderSide;
    owner: AccountCap;
    price: Decimal.Value;
    quantity: Decimal.Value;
}

/**
 * A limit order. While it rests in a book it holds its owner's capability,
 * which lets the book settle fills on the owner's behalf.
 */
export class Order {
    private static nextSequence = 0;

    readonly orderId: string;
    /** Arrival order across the whole process; breaks createdAt ties */
    readonly sequence: number;
    readonly side: OrderSide;
    readonly owner: AccountCap;
    readonly price: Decimal;
    readonly originalQuantity: Decimal;
    readonly createdAt: Date;
    private remaining: Decimal;
    private wasPlaced = false;

    private constructor(init: OrderInit, price: Decimal, quantity: Decimal) {
        this.orderId = randomUUID();
        this.sequence = Order.nextSequence++;
        this.side = init.side;
        this.owner = init.owner;
        this.price = price;
        this.originalQuantity = quantity;
        this.remaining = quantity;
        this.createdAt = new Date();
    }

    /**
     * Validate and build an order. Price and quantity must be positive integers.
     */
    static create(init: OrderInit): Order {
        const price = toWholeUnits(init.price, "price");
        const quantity = toWholeUnits(init.quantity, "quantity");
        return new Order(init, price, quantity);
    }

    static bid(owner: AccountCap, price: Decimal.Value, quantity: Decimal.Value): Order {
        return Order.create({ side: "bid", owner, price, quantity });
    }

    static ask(owner: AccountCap, price: Decimal.Value, quantity: Decimal.Value): Order {
        return Order.create({ side: "ask", owner, price, quantity });
    }

    get ownerId(): AccountId {
        return accountIdOf(this.owner);
    }

    /** Remaining (unfilled) quantity */
    get quantity(): Decimal {
        return this.remaining;
    }

    get filledQuantity(): Decimal {
        return this.originalQuantity.minus(this.remaining);
    }

    isFilled(): boolean {
        return this.remaining.isZero();
    }

    /** Whether a book has accepted this order */
    get placed(): boolean {
        return this.wasPlaced;
    }

    /**
     * Claim the order for a single placement. A rolled back placement
     * releases the claim.
     */
    markPlaced(): void {
        if (this.wasPlaced) {
            throw new InvalidOrderError(`Order ${this.orderId} has already been placed`, "ALREADY_PLACED");
        }

        this.wasPlaced = true;
        recordUndo(() => {
            this.wasPlaced = false;
        });
    }

    /**
     * Reduce the remaining quantity by a matched amount
     */
    fill(amount: Decimal): void {
        if (amount.isNegative() || amount.gt(this.remaining)) {
            throw new RangeError(`Fill of ${amount.toString()} exceeds remaining ${this.remaining.toString()} on ${this.orderId}`);
        }

        const previous = this.remaining;
        this.remaining = previous.minus(amount);
        recordUndo(() => {
            this.remaining = previous;
        });
    }
}

/**
 * All orders resting at one price, in arrival order
 */
export class Tick {
    readonly orders: Order[];

    constructor(
        readonly price: Decimal,
        first: Order,
    ) {
        this.orders = [first];
    }

    /** Sum of remaining quantity at this level */
    get quantity(): Decimal {
        return this.orders.reduce((sum, order) => sum.plus(order.quantity), new Decimal(0));
    }

    /** Number of orders with quantity left */
    get liveOrderCount(): number {
        return this.orders.filter((order) => !order.isFilled()).length;
    }

    enqueue(order: Order): void {
        if (!order.price.eq(this.price)) {
            throw new Error(`Order price ${order.price.toString()} doesn't match tick ${this.price.toString()}`);
        }

        this.orders.push(order);
        recordUndo(() => {
            this.orders.pop();
        });
    }

    /**
     * Drop fully filled orders, keeping the rest in arrival order.
     * Returns the number removed.
     */
    prune(): number {
        const before = this.orders.slice();
        const kept = before.filter((order) => !order.isFilled());
        if (kept.length === before.length) {
            return 0;
        }

        this.orders.splice(0, this.orders.length, ...kept);
        recordUndo(() => {
            this.orders.splice(0, this.orders.length, ...before);
        });
        return before.length - kept.length;
    }
}

function toWholeUnits(value: Decimal.Value, field: "price" | "quantity"): Decimal {
    let amount: Decimal;
    try {
        amount = new Decimal(value);
    } catch {
        throw new InvalidOrderError(`${field} must be a number`, field === "price" ? "NON_INTEGER_PRICE" : "NON_INTEGER_QUANTITY");
    }

    if (amount.isZero()) {
        throw new InvalidOrderError(`${field} must be greater than zero`, field === "price" ? "ZERO_PRICE" : "ZERO_QUANTITY");
    }
    if (amount.isNegative()) {
        throw new InvalidOrderError(`${field} must be positive`, field === "price" ? "NEGATIVE_PRICE" : "NEGATIVE_QUANTITY");
    }
    if (!amount.isInteger()) {
        throw new InvalidOrderError(`${field} must be a whole number`, field === "price" ? "NON_INTEGER_PRICE" : "NON_INTEGER_QUANTITY");
    }
    if (exceedsPrecision(amount)) {
        throw new InvalidOrderError(
            `${field} must have fewer than ${Decimal.precision} digits`,
            field === "price" ? "PRICE_TOO_LARGE" : "QUANTITY_TOO_LARGE",
        );
    }

    return amount;
}
