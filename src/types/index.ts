/**
 * Barrel exports for all types
 */

export * from "./ledger";
export * from "./order";
