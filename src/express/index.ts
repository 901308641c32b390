/**
 * Express Integration
 *
 * Re-exports for mounting the app or its middleware.
 */

export { createApp } from './app.js';
export type { AppDependencies } from './app.js';

export {
  shopSessionMiddleware,
  errorHandler,
  requireShop,
  asyncHandler,
  getClientIp,
} from './middleware.js';
export type { ShopRequest, ShopSessionOptions } from './middleware.js';

export { renderEmbeddedShell, escapeHtml } from './embedded.js';
