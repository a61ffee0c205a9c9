/**
 * Barrel exports for routes
 */

export { health } from "./health.routes";
export { accounts } from "./accounts.routes";
export { account } from "./account.routes";
export { orders } from "./orders.routes";
export { book } from "./book.routes";
