/**
 * Logging utilities for the exchange
 *
 * Provides consistent, timestamped logging with context for:
 * - Escrow ledger movements (deposits, withdrawals, placements)
 * - General application events
 */

// ============================================
// Levels
// ============================================

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
    return value in LEVEL_ORDER;
}

function enabled(level: Exclude<LogLevel, "silent">): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

// ============================================
// Timestamp Helper
// ============================================

/**
 * Get current timestamp in HH:mm:ss.SSS format
 */
function getTimestamp(): string {
    const now = new Date();
    const hours = now.getHours().toString().padStart(2, "0");
    const minutes = now.getMinutes().toString().padStart(2, "0");
    const seconds = now.getSeconds().toString().padStart(2, "0");
    const millis = now.getMilliseconds().toString().padStart(3, "0");
    return `${hours}:${minutes}:${seconds}.${millis}`;
}

/**
 * Truncate a string (like an account or order id) for display
 */
function truncate(str: string | undefined, maxLen: number = 20): string {
    if (!str) return "n/a";
    if (str.length <= maxLen) return str;
    return `${str.slice(0, maxLen)}...`;
}

export type LogContext = Record<string, string | number | boolean | undefined>;

/**
 * Format context object into key=value string
 */
export function formatContext(context?: LogContext): string {
    if (!context) return "no-context";

    const parts: string[] = [];
    for (const [key, value] of Object.entries(context)) {
        if (value === undefined) continue;
        const text = String(value);
        // Long ids are cut for readability
        const displayValue = text.length > 40 ? truncate(text, 36) : text;
        parts.push(`${key}=${displayValue}`);
    }

    return parts.length > 0 ? parts.join(" ") : "no-context";
}

// ============================================
// Ledger Action Logging
// ============================================

export type LedgerAction = "INIT" | "DEPOSIT" | "WITHDRAW" | "PLACE" | "RECONCILE";

/**
 * Log an escrow ledger movement
 *
 * Format: [HH:mm:ss.SSS] [LEDGER:ACTION] asset | context
 *
 * @example
 * logLedger("DEPOSIT", "QUOTE", { accountId: "9b1f...", amount: "500" })
 * // [14:32:05.123] [LEDGER:DEPOSIT] QUOTE | accountId=9b1f... amount=500
 */
export function logLedger(action: LedgerAction, asset: string, context?: LogContext): void {
    if (!enabled("debug")) return;
    console.log(`[${getTimestamp()}] [LEDGER:${action}] ${asset} | ${formatContext(context)}`);
}

// ============================================
// General Application Logging
// ============================================

/**
 * Log an application event with timestamp
 *
 * @example
 * logApp("ExchangeService", "Order placed", { orderId: "123", side: "bid" })
 * // [14:32:07.456] [ExchangeService] Order placed | orderId=123 side=bid
 */
export function logApp(component: string, message: string, context?: LogContext): void {
    if (!enabled("info")) return;
    const timestamp = getTimestamp();
    if (context) {
        console.log(`[${timestamp}] [${component}] ${message} | ${formatContext(context)}`);
    } else {
        console.log(`[${timestamp}] [${component}] ${message}`);
    }
}

/**
 * Log an application error with timestamp
 */
export function logAppError(component: string, message: string, error?: unknown, context?: LogContext): void {
    if (!enabled("error")) return;
    const timestamp = getTimestamp();
    const errorMsg = error instanceof Error ? error.message : error ? String(error) : "";
    const suffix = errorMsg ? ` | ${errorMsg}` : "";

    if (context) {
        console.error(`[${timestamp}] [${component}] ERROR: ${message} | ${formatContext(context)}${suffix}`);
    } else {
        console.error(`[${timestamp}] [${component}] ERROR: ${message}${suffix}`);
    }
}

/**
 * Log a warning with timestamp
 */
export function logAppWarn(component: string, message: string, context?: LogContext): void {
    if (!enabled("warn")) return;
    const timestamp = getTimestamp();
    if (context) {
        console.warn(`[${timestamp}] [${component}] WARN: ${message} | ${formatContext(context)}`);
    } else {
        console.warn(`[${timestamp}] [${component}] WARN: ${message}`);
    }
}
