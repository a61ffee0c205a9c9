/**
 * Matching module exports
 *
 * - Order / Tick: limit orders and their price levels
 * - PriceBook: one side's ticks, ascending by price
 * - OrderBook: both sides plus the two escrow ledgers; placement and matching
 */

export { Order, Tick } from "./order";
export type { OrderInit } from "./order";
export { PriceBook } from "./price-book";
export type { TickSearch } from "./price-book";
export { OrderBook } from "./orderbook";
export type { OrderBookOptions, PlacementResult } from "./orderbook";
