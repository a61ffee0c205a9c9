/**
 * Serialization utilities for converting domain types to API response types
 *
 * Converts Decimal.js values to strings for JSON serialization
 */

import type { AccountSummary, AssetBalance, Fill, OrderBookLevel, OrderBookSnapshot, OrderSide, ReconciliationReport } from "../../types";
import type { Order, PlacementResult, Tick } from "../../matching";
import type {
    AccountResponse,
    AssetBalanceResponse,
    FillResponse,
    OrderBookLevelResponse,
    OrderBookResponse,
    OrderResponse,
    PlaceOrderApiResponse,
    ReconciliationResponse,
    TicksResponse,
} from "../types/api.types";

function serializeAssetBalance(balance: AssetBalance): AssetBalanceResponse {
    return {
        asset: balance.asset,
        locked: balance.locked.toString(),
        unlocked: balance.unlocked.toString(),
        total: balance.total.toString(),
    };
}

/**
 * Serialize an account summary to API response format
 */
export function serializeAccount(summary: AccountSummary): AccountResponse {
    return {
        accountId: summary.accountId,
        base: serializeAssetBalance(summary.base),
        quote: serializeAssetBalance(summary.quote),
    };
}

/**
 * Serialize an Order to API response format
 */
export function serializeOrder(order: Order): OrderResponse {
    return {
        orderId: order.orderId,
        accountId: order.ownerId,
        side: order.side,
        price: order.price.toString(),
        quantity: order.quantity.toString(),
        originalQuantity: order.originalQuantity.toString(),
        filledQuantity: order.filledQuantity.toString(),
        createdAt: order.createdAt.toISOString(),
    };
}

function serializeFill(fill: Fill): FillResponse {
    return {
        makerOrderId: fill.makerOrderId,
        makerId: fill.makerId,
        price: fill.price.toString(),
        quantity: fill.quantity.toString(),
        quoteAmount: fill.quoteAmount.toString(),
    };
}

/**
 * Serialize a placement outcome
 */
export function serializePlacement(result: PlacementResult): PlaceOrderApiResponse {
    return {
        orderId: result.order.orderId,
        side: result.order.side,
        price: result.order.price.toString(),
        status: result.status,
        filledQuantity: result.filledQuantity.toString(),
        remainingQuantity: result.remainingQuantity.toString(),
        fills: result.fills.map(serializeFill),
        lockedAmount: result.lockedRemainder.toString(),
        rested: result.rested,
    };
}

function serializeLevel(level: OrderBookLevel): OrderBookLevelResponse {
    return {
        price: level.price.toString(),
        quantity: level.quantity.toString(),
        orderCount: level.orderCount,
    };
}

/**
 * Serialize an orderbook snapshot
 */
export function serializeOrderBook(book: OrderBookSnapshot): OrderBookResponse {
    return {
        pairId: book.pairId,
        baseAsset: book.baseAsset,
        quoteAsset: book.quoteAsset,
        bids: book.bids.map(serializeLevel),
        asks: book.asks.map(serializeLevel),
        lastUpdated: book.lastUpdated.toISOString(),
    };
}

/**
 * Serialize one side's ticks in ascending price order
 */
export function serializeTicks(side: OrderSide, ticks: readonly Tick[]): TicksResponse {
    return {
        side,
        ticks: ticks.map((tick) => ({
            price: tick.price.toString(),
            quantity: tick.quantity.toString(),
            orders: tick.orders.map((order) => ({
                orderId: order.orderId,
                accountId: order.ownerId,
                quantity: order.quantity.toString(),
            })),
        })),
    };
}

export function serializeReconciliation(report: ReconciliationReport): ReconciliationResponse {
    return {
        asset: report.asset,
        leg: report.leg,
        supply: report.supply.toString(),
        ledgerTotal: report.ledgerTotal.toString(),
        drift: report.drift.toString(),
        balanced: report.balanced,
    };
}
