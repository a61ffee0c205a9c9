/**
 * Escrow ledger for a single asset
 *
 * Each initialized account owns two cells: `unlocked` (freely available) and
 * `locked` (collateral held against resting orders). Mutations require the
 * account's capability; reads only need the derived id.
 */

import Decimal from "decimal.js";
import type { AccountId, BalanceKind, EscrowBalances } from "../types";
import { AccountExistsError, AccountNotFoundError } from "../errors";
import { accountIdOf, type AccountCap } from "./account";
import { Balance } from "./balance";
import { recordUndo } from "./journal";

interface EscrowAccount<A extends string> {
    locked: Balance<A, "locked">;
    unlocked: Balance<A, "unlocked">;
}

/**
 * Relabel a cell's kind without changing its magnitude. Consumes `cell`.
 */
export function reclassify<A extends string, F extends BalanceKind, T extends BalanceKind>(
    cell: Balance<A, F>,
    from: F,
    to: T,
): Balance<A, T> {
    if (cell.kind !== from) {
        throw new TypeError(`Expected a ${from} ${cell.asset} balance, got ${cell.kind}`);
    }
    return cell.withKind(to);
}

export class EscrowLedger<A extends string> {
    private readonly accounts = new Map<AccountId, EscrowAccount<A>>();

    constructor(readonly asset: A) {}

    // ============================================
    // Accounts
    // ============================================

    /**
     * Create empty locked and unlocked cells for the capability's account
     */
    initialize(cap: AccountCap): void {
        const accountId = accountIdOf(cap);
        if (this.accounts.has(accountId)) {
            throw new AccountExistsError(accountId, this.asset);
        }

        this.accounts.set(accountId, {
            locked: Balance.zero(this.asset, "locked"),
            unlocked: Balance.zero(this.asset, "unlocked"),
        });
        recordUndo(() => {
            this.accounts.delete(accountId);
        });
    }

    isInitialized(accountId: AccountId): boolean {
        return this.accounts.has(accountId);
    }

    // ============================================
    // Balances
    // ============================================

    balance(kind: BalanceKind, accountId: AccountId): Decimal {
        return this.getAccount(accountId)[kind].value;
    }

    /**
     * Merge `cell` into the account's cell of the same kind
     */
    deposit<K extends BalanceKind>(kind: K, cap: AccountCap, cell: Balance<A, K>): void {
        const target: Balance<A, K> = this.cellOf(this.getAccount(accountIdOf(cap)), kind);
        target.join(cell);
    }

    /**
     * Split `amount` out of the account's cell. Fails without effect on insufficient funds.
     */
    withdraw<K extends BalanceKind>(kind: K, cap: AccountCap, amount: Decimal): Balance<A, K> {
        const source: Balance<A, K> = this.cellOf(this.getAccount(accountIdOf(cap)), kind);
        return source.split(amount);
    }

    /**
     * Sum of locked and unlocked over every account
     */
    total(): Decimal {
        let sum = new Decimal(0);
        for (const account of this.accounts.values()) {
            sum = sum.plus(account.locked.value).plus(account.unlocked.value);
        }
        return sum;
    }

    balances(): EscrowBalances[] {
        return Array.from(this.accounts.entries()).map(([accountId, account]) => ({
            accountId,
            locked: account.locked.value,
            unlocked: account.unlocked.value,
        }));
    }

    // ============================================
    // Private Helpers
    // ============================================

    private getAccount(accountId: AccountId): EscrowAccount<A> {
        const account = this.accounts.get(accountId);
        if (!account) {
            throw new AccountNotFoundError(accountId, this.asset);
        }
        return account;
    }

    private cellOf<K extends BalanceKind>(account: EscrowAccount<A>, kind: K): Balance<A, K>;
    private cellOf(account: EscrowAccount<A>, kind: BalanceKind): Balance<A> {
        return kind === "locked" ? account.locked : account.unlocked;
    }
}
