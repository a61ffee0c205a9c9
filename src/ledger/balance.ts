/**
 * Balance cells and asset supply
 *
 * A Balance is a single value accumulator for one asset, labelled with the
 * half of the escrow it belongs to. Value only moves between cells through
 * split/join/withKind; it enters and leaves the system through a Supply.
 */

import Decimal from "decimal.js";
import type { BalanceKind } from "../types";
import { InsufficientFundsError } from "../errors";
import { recordUndo } from "./journal";

const ISSUE: unique symbol = Symbol("balance-issue");

const ZERO = new Decimal(0);

/**
 * Whether `value` is at or beyond 10^precision. Integers below that bound add,
 * subtract and multiply exactly under the global Decimal precision.
 */
export function exceedsPrecision(value: Decimal): boolean {
    return value.abs().gte(new Decimal(10).pow(Decimal.precision));
}

export class Balance<A extends string, K extends BalanceKind = BalanceKind> {
    private amount: Decimal;

    private constructor(
        readonly asset: A,
        readonly kind: K,
        amount: Decimal,
    ) {
        this.amount = amount;
    }

    static zero<A extends string, K extends BalanceKind>(asset: A, kind: K): Balance<A, K> {
        return new Balance(asset, kind, ZERO);
    }

    /**
     * Create a non-empty cell. Only callers holding the module token (Supply) can do this.
     */
    static issue<A extends string>(asset: A, amount: Decimal, token: typeof ISSUE): Balance<A, "unlocked"> {
        if (token !== ISSUE) {
            throw new Error("Balance.issue requires the supply token");
        }
        return new Balance(asset, "unlocked", amount);
    }

    /**
     * Destroy a cell, returning the magnitude it held
     */
    static retire<A extends string>(cell: Balance<A>, token: typeof ISSUE): Decimal {
        if (token !== ISSUE) {
            throw new Error("Balance.retire requires the supply token");
        }
        const amount = cell.amount;
        cell.amount = ZERO;
        recordUndo(() => {
            cell.amount = amount;
        });
        return amount;
    }

    get value(): Decimal {
        return this.amount;
    }

    isZero(): boolean {
        return this.amount.isZero();
    }

    /**
     * Move `amount` out of this cell into a new one of the same asset and kind
     */
    split(amount: Decimal): Balance<A, K> {
        if (amount.isNegative()) {
            throw new RangeError(`Cannot split a negative amount: ${amount.toString()}`);
        }
        if (amount.gt(this.amount)) {
            throw new InsufficientFundsError(this.asset, amount, this.amount);
        }

        this.amount = this.amount.minus(amount);
        const part = new Balance(this.asset, this.kind, amount);

        recordUndo(() => {
            part.amount = part.amount.minus(amount);
            this.amount = this.amount.plus(amount);
        });

        return part;
    }

    /**
     * Merge `other` into this cell, leaving `other` empty. Returns the new magnitude.
     */
    join(other: Balance<A, K>): Decimal {
        if (other === this) {
            throw new Error("Cannot join a balance with itself");
        }
        if (other.asset !== this.asset || other.kind !== this.kind) {
            throw new TypeError(`Cannot join ${other.kind} ${other.asset} into ${this.kind} ${this.asset}`);
        }

        const moved = other.amount;
        other.amount = ZERO;
        this.amount = this.amount.plus(moved);

        recordUndo(() => {
            this.amount = this.amount.minus(moved);
            other.amount = other.amount.plus(moved);
        });

        return this.amount;
    }

    /**
     * Move the whole magnitude into a new cell labelled `kind`, leaving this one empty
     */
    withKind<T extends BalanceKind>(kind: T): Balance<A, T> {
        const moved = this.amount;
        this.amount = ZERO;
        const relabelled = new Balance(this.asset, kind, moved);

        recordUndo(() => {
            relabelled.amount = relabelled.amount.minus(moved);
            this.amount = this.amount.plus(moved);
        });

        return relabelled;
    }
}

/**
 * Minting authority for one asset. Outstanding supply equals the value held
 * in every live cell of that asset.
 */
export class Supply<A extends string> {
    private outstanding: Decimal = ZERO;

    constructor(readonly asset: A) {}

    get total(): Decimal {
        return this.outstanding;
    }

    mint(amount: Decimal): Balance<A, "unlocked"> {
        if (amount.lte(0)) {
            throw new RangeError(`Mint amount must be positive: ${amount.toString()}`);
        }
        if (exceedsPrecision(this.outstanding.plus(amount))) {
            throw new RangeError(
                `Minting ${amount.toString()} ${this.asset} would take supply past ${Decimal.precision} significant digits`,
            );
        }

        const previous = this.outstanding;
        this.outstanding = previous.plus(amount);
        recordUndo(() => {
            this.outstanding = previous;
        });

        return Balance.issue(this.asset, amount, ISSUE);
    }

    burn(cell: Balance<A>): Decimal {
        if (cell.asset !== this.asset) {
            throw new TypeError(`Cannot burn ${cell.asset} with the ${this.asset} supply`);
        }

        const amount = Balance.retire(cell, ISSUE);
        const previous = this.outstanding;
        this.outstanding = previous.minus(amount);
        recordUndo(() => {
            this.outstanding = previous;
        });

        return amount;
    }
}
