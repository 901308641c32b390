/**
 * Express Middleware
 *
 * Attaches the verified shop to API requests and turns thrown errors into
 * JSON responses.
 *
 * SECURITY: A shop named by the client is NOT trusted.
 * Resolution order:
 * 1. Session token in `Authorization: Bearer` (HS256, signed with the app secret)
 * 2. `?shop=` query parameter, only when allowDevShopParam is on and the
 *    shop is already installed
 */

import type { Request, Response, NextFunction, RequestHandler, ErrorRequestHandler } from 'express';
import type { ShopDomain, ShopResolutionSource } from '../types.js';
import type { InstallationStore } from '../store/types.js';
import { extractBearerToken, verifySessionToken } from '../session-token.js';
import { parseShopDomain } from '../shop.js';
import {
  InvalidWebhookSignatureError,
  MissingSessionError,
  PersistenceError,
  isAppError,
  isVerificationError,
} from '../errors.js';

// =============================================================================
// REQUEST EXTENSION
// =============================================================================

/**
 * Express Request with the verified shop
 */
export interface ShopRequest extends Request {
  /** Present after shopSessionMiddleware runs */
  shop?: ShopDomain;

  shopSource?: ShopResolutionSource;
}

export interface ShopSessionOptions {
  apiKey: string;
  apiSecret: string;
  store: InstallationStore;

  /** Accept `?shop=` for installed shops when no token is sent (development only) */
  allowDevShopParam?: boolean;
}

// =============================================================================
// HELPERS
// =============================================================================

export function getClientIp(req: Request): string {
  const forwarded = req.headers['x-forwarded-for'];
  if (forwarded) {
    const first = Array.isArray(forwarded) ? forwarded[0] : forwarded.split(',')[0];
    return first?.trim() ?? '';
  }

  return req.ip || req.socket.remoteAddress || '';
}

/**
 * Wrap an async handler so a rejection reaches the error handler
 */
export function asyncHandler<R extends Request = Request>(
  handler: (req: R, res: Response, next: NextFunction) => Promise<void>
): (req: R, res: Response, next: NextFunction) => void {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

/**
 * First string value of a query parameter
 */
export function queryParam(req: Request, name: string): string | undefined {
  const value = req.query[name];
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value) && typeof value[0] === 'string') {
    return value[0];
  }
  return undefined;
}

/**
 * Get the verified shop or throw
 *
 * @throws MissingSessionError if shopSessionMiddleware did not run
 */
export function requireShop(req: ShopRequest): ShopDomain {
  if (!req.shop) {
    throw new MissingSessionError();
  }
  return req.shop;
}

// =============================================================================
// MIDDLEWARE
// =============================================================================

/**
 * Resolve the calling shop from its session token.
 *
 * Every failure is passed to the error handler, which answers with a
 * generic 401 and logs the specific reason.
 *
 * @example
 * app.use('/api', shopSessionMiddleware({
 *   apiKey: config.shopify.apiKey,
 *   apiSecret: config.shopify.apiSecret,
 *   store,
 * }));
 */
export function shopSessionMiddleware(options: ShopSessionOptions): RequestHandler {
  const { apiKey, apiSecret, store, allowDevShopParam = false } = options;

  return asyncHandler<ShopRequest>(async (req, _res, next) => {
    const token = extractBearerToken(req.headers.authorization);

    if (token) {
      req.shop = await verifySessionToken(token, { apiKey, apiSecret });
      req.shopSource = 'session-token';
      return next();
    }

    if (allowDevShopParam) {
      const shop = parseShopDomain(queryParam(req, 'shop'));
      if (shop && (await store.getInstallation(shop))) {
        console.warn(`[Session] Unverified ?shop=${shop} accepted (ALLOW_DEV_SHOP_PARAM)`);
        req.shop = shop;
        req.shopSource = 'dev-query-param';
        return next();
      }
    }

    throw new MissingSessionError();
  });
}

// =============================================================================
// ERROR HANDLING
// =============================================================================

function hasClientStatus(error: unknown): error is { status: number } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500
  );
}

/**
 * Terminal error handler. Mount after all routes.
 */
export function errorHandler(): ErrorRequestHandler {
  return (error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(error);
    }

    if (isVerificationError(error)) {
      console.warn(
        `[Session] Rejected ${req.method} ${req.path}: ${error.code} from ${getClientIp(req)}`
      );
      res.status(401).json({
        error: {
          code: 'UNAUTHORIZED',
          message:
            error instanceof InvalidWebhookSignatureError
              ? 'Invalid webhook signature'
              : 'Missing or invalid session token',
        },
      });
      return;
    }

    if (error instanceof PersistenceError) {
      console.error(`[Store] ${req.method} ${req.path} failed:`, error.message, error.cause);
      res.status(500).json({
        error: { code: error.code, message: 'Storage is unavailable' },
      });
      return;
    }

    if (isAppError(error)) {
      res.status(error.statusCode).json(error.toJSON());
      return;
    }

    // body-parser failures (malformed JSON, oversized body)
    if (hasClientStatus(error)) {
      res.status(error.status).json({
        error: { code: 'BAD_REQUEST', message: 'Malformed request body' },
      });
      return;
    }

    console.error(`[Server] Unhandled error on ${req.method} ${req.path}:`, error);
    res.status(500).json({
      error: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
    });
  };
}
