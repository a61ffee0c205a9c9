/**
 * Account capabilities
 *
 * An AccountCap authorizes ledger operations for one account. It can only be
 * issued, never constructed from an id, so holding one proves ownership.
 */

import { randomUUID } from "node:crypto";
import type { AccountId } from "../types";

export class AccountCap {
    private constructor(private readonly id: AccountId) {}

    static issue(): AccountCap {
        return new AccountCap(randomUUID());
    }

    /**
     * Identifier derived from a capability; comparable and safe to copy
     */
    static idOf(cap: AccountCap): AccountId {
        return cap.id;
    }

    toString(): string {
        return `AccountCap(${this.id})`;
    }
}

export function accountIdOf(cap: AccountCap): AccountId {
    return AccountCap.idOf(cap);
}
