/**
 * Request validation utilities
 */

import { BadRequestError } from "../types/errors";

/**
 * Validate that a value is one of the allowed enum values
 */
export function validateEnum<T extends string>(value: unknown, allowed: readonly T[], fieldName: string): T {
    if (value === undefined || value === null) {
        throw new BadRequestError(`${fieldName} is required`, "MISSING_FIELD");
    }

    const match = allowed.find((candidate) => candidate === value);
    if (match === undefined) {
        throw new BadRequestError(`${fieldName} must be one of: ${allowed.join(", ")}`, "INVALID_ENUM");
    }

    return match;
}

/**
 * Validate a numeric field sent as a JSON number or a numeric string.
 * Range and integrality are checked by the engine; this only checks shape.
 */
export function validateNumeric(value: unknown, fieldName: string): string | number {
    if (value === undefined || value === null) {
        throw new BadRequestError(`${fieldName} is required`, "MISSING_FIELD");
    }

    if (typeof value === "number") {
        if (!Number.isFinite(value)) {
            throw new BadRequestError(`${fieldName} must be a finite number`, "INVALID_NUMBER");
        }
        return value;
    }

    if (typeof value === "string" && /^-?\d+(\.\d+)?$/.test(value.trim())) {
        return value.trim();
    }

    throw new BadRequestError(`${fieldName} must be a number`, "INVALID_NUMBER");
}

/**
 * Validate that a parsed JSON body is an object
 */
export function validateBody(body: unknown): Record<string, unknown> {
    if (typeof body !== "object" || body === null || Array.isArray(body)) {
        throw new BadRequestError("Request body must be a JSON object", "INVALID_BODY");
    }
    return Object.fromEntries(Object.entries(body));
}
