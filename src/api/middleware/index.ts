/**
 * Barrel exports for middleware
 */

export { userAuth } from "./auth.middleware";
export { errorHandler } from "./error.middleware";
