/**
 * Ledger module exports
 *
 * - Balance / Supply: value cells and the minting authority per asset
 * - AccountCap: capability authorizing an account's ledger operations
 * - EscrowLedger: per-asset locked/unlocked balances keyed by account id
 * - atomically: all-or-nothing scope with undo journal
 */

export { Balance, Supply } from "./balance";
export { AccountCap, accountIdOf } from "./account";
export { EscrowLedger, reclassify } from "./escrow";
export { atomically, recordUndo } from "./journal";
