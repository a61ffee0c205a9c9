/**
 * Order types for the matching engine
 */

import type Decimal from "decimal.js";
import type { AccountId } from "./ledger";

/** Book side: bids buy base with quote, asks sell base for quote */
export type OrderSide = "bid" | "ask";

/** Placement outcome */
export type OrderStatus =
    | "open" // Nothing matched, resting unfilled
    | "partial" // Partially filled, remainder resting
    | "filled"; // Completely filled

/** Request to place a limit order */
export interface PlaceOrderRequest {
    side: OrderSide;
    price: Decimal.Value;
    quantity: Decimal.Value;
}

/** A single execution against a resting (maker) order, at the maker's price */
export interface Fill {
    makerOrderId: string;
    makerId: AccountId;
    takerOrderId: string;
    takerId: AccountId;
    price: Decimal;
    quantity: Decimal;
    /** price × quantity, in quote units */
    quoteAmount: Decimal;
}

/** Aggregated price level (zero-quantity orders excluded) */
export interface OrderBookLevel {
    price: Decimal;
    quantity: Decimal;
    orderCount: number;
}

/** Orderbook snapshot for the pair; both sides listed best price first */
export interface OrderBookSnapshot {
    pairId: string;
    baseAsset: string;
    quoteAsset: string;
    bids: OrderBookLevel[];
    asks: OrderBookLevel[];
    lastUpdated: Date;
}
