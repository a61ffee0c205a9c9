/**
 * Services module exports
 */

export { ExchangeService, ExchangeValidationError } from "./exchange.service";
export type { ExchangeServiceConfig } from "./exchange.service";
