/**
 * Environment configuration for the exchange
 * Loads from environment variables with sensible defaults for development
 */

import Decimal from "decimal.js";
import { isLogLevel, type LogLevel } from "./utils/logger";

export type Environment = "development" | "production" | "test";

export interface EngineConfig {
    // Server configuration
    port: number;
    host: string;
    env: Environment;
    logLevel: LogLevel;

    // The single trading pair served by this process
    market: {
        pairId: string;
        baseAsset: string;
        quoteAsset: string;
        pruneFilledOrders: boolean; // Drop zero-quantity orders after matching (default: false)
    };

    // Request limits enforced by the exchange service
    limits: {
        maxQuantity: number; // Per order (default: 1_000_000)
        maxPrice: number; // Per order (default: 1_000_000)
        maxDeposit: number; // Per deposit (default: 1_000_000_000)
    };

    // Decimal.js configuration
    decimal: {
        precision: number;
        rounding: Decimal.Rounding;
    };
}

function getEnvString(key: string, defaultValue: string): string {
    return process.env[key] ?? defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (!value) return defaultValue;
    const parsed = parseInt(value, 10);
    return Number.isNaN(parsed) ? defaultValue : parsed;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
    const value = process.env[key];
    if (!value) return defaultValue;
    return value.toLowerCase() === "true";
}

function getEnvironment(): Environment {
    const value = getEnvString("NODE_ENV", "development");
    return value === "production" || value === "test" ? value : "development";
}

function getLogLevel(defaultValue: LogLevel): LogLevel {
    const value = getEnvString("LOG_LEVEL", defaultValue).toLowerCase();
    return isLogLevel(value) ? value : defaultValue;
}

export function loadConfig(): EngineConfig {
    const baseAsset = getEnvString("BASE_ASSET", "BASE");
    const quoteAsset = getEnvString("QUOTE_ASSET", "QUOTE");

    return {
        port: getEnvNumber("PORT", 3000),
        host: getEnvString("HOST", "0.0.0.0"),
        env: getEnvironment(),
        logLevel: getLogLevel("info"),

        market: {
            pairId: getEnvString("PAIR_ID", `${baseAsset}-${quoteAsset}`),
            baseAsset,
            quoteAsset,
            pruneFilledOrders: getEnvBoolean("PRUNE_FILLED_ORDERS", false),
        },

        limits: {
            maxQuantity: getEnvNumber("MAX_ORDER_QUANTITY", 1_000_000),
            maxPrice: getEnvNumber("MAX_ORDER_PRICE", 1_000_000),
            maxDeposit: getEnvNumber("MAX_DEPOSIT", 1_000_000_000),
        },

        decimal: {
            precision: 40,
            rounding: Decimal.ROUND_HALF_UP,
        },
    };
}

// Singleton config instance
let configInstance: EngineConfig | null = null;

export function getConfig(): EngineConfig {
    if (!configInstance) {
        configInstance = loadConfig();
    }
    return configInstance;
}

// For testing - reset config
export function resetConfig(): void {
    configInstance = null;
}
