/**
 * Built-in step middleware
 */

export { RuntimeMiddleware } from './runtime.js';
