/**
 * Health checker factories
 */

export { makeStoreHealthChecker, type StoreHealthCheckerOptions } from './store-checker.js';
