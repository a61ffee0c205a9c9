/**
 * Ledger types
 */

import type Decimal from "decimal.js";

/** Which half of a user's balance a cell belongs to */
export type BalanceKind = "locked" | "unlocked";

/** Leg of the trading pair an asset plays */
export type AssetLeg = "base" | "quote";

/** Comparable identifier derived from an account capability */
export type AccountId = string;

/** One user's cells in one asset ledger, as magnitudes */
export interface EscrowBalances {
    accountId: AccountId;
    locked: Decimal;
    unlocked: Decimal;
}

/** Supply against ledger totals for one asset */
export interface ReconciliationReport {
    asset: string;
    leg: AssetLeg;
    supply: Decimal;
    ledgerTotal: Decimal;
    drift: Decimal;
    balanced: boolean;
}

/** Locked and unlocked magnitudes of one asset for one account */
export interface AssetBalance {
    asset: string;
    locked: Decimal;
    unlocked: Decimal;
    total: Decimal;
}

/** Both legs of an account */
export interface AccountSummary {
    accountId: AccountId;
    base: AssetBalance;
    quote: AssetBalance;
}
