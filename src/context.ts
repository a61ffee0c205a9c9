/**
 * Application context
 *
 * One order book and one exchange service per process, shared by the API routes
 */

import type { EngineConfig } from "./config";
import { OrderBook } from "./matching";
import { ExchangeService } from "./services";

export interface AppContext {
    config: EngineConfig;
    orderBook: OrderBook;
    exchange: ExchangeService;
}

export function createAppContext(config: EngineConfig): AppContext {
    const { market, limits } = config;
    const orderBook = new OrderBook(market.pairId, market.baseAsset, market.quoteAsset, {
        pruneFilledOrders: market.pruneFilledOrders,
    });
    const exchange = new ExchangeService(orderBook, limits);

    return { config, orderBook, exchange };
}

let appContext: AppContext | null = null;

export function setAppContext(ctx: AppContext): void {
    appContext = ctx;
}

export function getAppContext(): AppContext {
    if (!appContext) {
        throw new Error("App context not initialized");
    }
    return appContext;
}

// For testing - drop the shared context
export function resetAppContext(): void {
    appContext = null;
}
