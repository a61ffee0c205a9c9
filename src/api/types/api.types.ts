/**
 * API-specific types for request/response serialization
 *
 * These types use string instead of Decimal for JSON serialization
 */

import type { AssetLeg, OrderSide, OrderStatus } from "../../types";

// ============================================
// Request Types
// ============================================

/** Body of POST /api/account/deposit and /api/account/withdraw */
export interface TransferRequest {
    asset: AssetLeg;
    amount: string | number;
}

/** Body of POST /api/orders */
export interface PlaceOrderBody {
    side: OrderSide;
    price: string | number;
    quantity: string | number;
}

// ============================================
// Serialized Response Types (Decimal -> string)
// ============================================

export interface AssetBalanceResponse {
    asset: string;
    locked: string;
    unlocked: string;
    total: string;
}

/** Serialized account for API response */
export interface AccountResponse {
    accountId: string;
    base: AssetBalanceResponse;
    quote: AssetBalanceResponse;
}

/** Serialized resting order for API response */
export interface OrderResponse {
    orderId: string;
    accountId: string;
    side: OrderSide;
    price: string;
    quantity: string;
    originalQuantity: string;
    filledQuantity: string;
    createdAt: string;
}

export interface FillResponse {
    makerOrderId: string;
    makerId: string;
    price: string;
    quantity: string;
    quoteAmount: string;
}

/** Response of POST /api/orders */
export interface PlaceOrderApiResponse {
    orderId: string;
    side: OrderSide;
    price: string;
    status: OrderStatus;
    filledQuantity: string;
    remainingQuantity: string;
    fills: FillResponse[];
    lockedAmount: string;
    rested: boolean;
}

/** Aggregated price level */
export interface OrderBookLevelResponse {
    price: string;
    quantity: string;
    orderCount: number;
}

export interface OrderBookResponse {
    pairId: string;
    baseAsset: string;
    quoteAsset: string;
    bids: OrderBookLevelResponse[];
    asks: OrderBookLevelResponse[];
    lastUpdated: string;
}

/** One tick with its FIFO queue, zero-quantity orders included */
export interface TickResponse {
    price: string;
    quantity: string;
    orders: Array<{ orderId: string; accountId: string; quantity: string }>;
}

export interface TicksResponse {
    side: OrderSide;
    ticks: TickResponse[];
}

// ============================================
// Error Response
// ============================================

export interface ErrorResponse {
    error: string;
    code: string;
    details?: Record<string, unknown>;
}

// ============================================
// Health Response
// ============================================

export interface ReconciliationResponse {
    asset: string;
    leg: AssetLeg;
    supply: string;
    ledgerTotal: string;
    drift: string;
    balanced: boolean;
}

export interface HealthResponse {
    status: "healthy" | "unhealthy";
    timestamp: string;
    version: string;
    pairId: string;
    components: {
        orderBook: { bidTicks: number; askTicks: number; restingOrders: number };
        ledgers: ReconciliationResponse[];
    };
}
