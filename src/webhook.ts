/**
 * Webhook and Launch URL Signatures
 *
 * HMAC-SHA256 verification for requests the platform signs with the app
 * secret: webhook deliveries (base64 digest of the raw body in a header) and
 * admin launch URLs (hex digest of the sorted query string).
 */

import { createHmac, timingSafeEqual } from 'crypto';
import { InvalidWebhookSignatureError } from './errors.js';

// =============================================================================
// COMPARISON
// =============================================================================

function safeEqual(a: Buffer, b: Buffer): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return timingSafeEqual(a, b);
}

// =============================================================================
// WEBHOOKS
// =============================================================================

/**
 * Compute the webhook signature for a body exactly as received.
 * Never pass a re-serialized body: whitespace and key order change the digest.
 */
export function computeWebhookSignature(rawBody: Buffer | string, secret: string): string {
  return createHmac('sha256', secret).update(rawBody).digest('base64');
}

/**
 * Verify a webhook delivery. Throws InvalidWebhookSignatureError when the
 * body or header is missing or the digest does not match.
 *
 * @example
 * app.post('/webhooks/app/uninstalled', express.raw({ type: '*\/*' }), (req, res) => {
 *   verifyWebhookSignature(req.body, req.get(SHOPIFY_HEADERS.HMAC), secret);
 * });
 */
export function verifyWebhookSignature(
  rawBody: Buffer | undefined,
  signatureHeader: string | undefined,
  secret: string
): void {
  if (!rawBody || rawBody.length === 0) {
    throw new InvalidWebhookSignatureError('missing_body');
  }
  if (!signatureHeader) {
    throw new InvalidWebhookSignatureError('missing_signature');
  }

  const expected = Buffer.from(computeWebhookSignature(rawBody, secret), 'utf8');
  const received = Buffer.from(signatureHeader.trim(), 'utf8');

  if (!safeEqual(expected, received)) {
    throw new InvalidWebhookSignatureError('mismatch');
  }
}

// =============================================================================
// LAUNCH QUERY
// =============================================================================

/**
 * Build the message the admin signs for a launch URL: every parameter except
 * `hmac` and `signature`, sorted by key, joined as `key=value` with `&`
 */
export function launchQueryMessage(query: Record<string, string>): string {
  return Object.keys(query)
    .filter((key) => key !== 'hmac' && key !== 'signature')
    .sort()
    .map((key) => `${key}=${query[key]}`)
    .join('&');
}

export function computeLaunchQueryHmac(query: Record<string, string>, secret: string): string {
  return createHmac('sha256', secret).update(launchQueryMessage(query)).digest('hex');
}

/**
 * Check the `hmac` parameter on an embedded-app launch URL
 */
export function verifyLaunchQuery(query: Record<string, string>, secret: string): boolean {
  const provided = query.hmac;
  if (!provided || !/^[0-9a-f]+$/i.test(provided)) {
    return false;
  }

  const expected = Buffer.from(computeLaunchQueryHmac(query, secret), 'hex');
  return safeEqual(expected, Buffer.from(provided, 'hex'));
}
