/**
 * Platform Headers
 *
 * Header names the platform sends with webhook deliveries and expects on
 * admin API calls, plus the security headers this app sets.
 */

// =============================================================================
// WEBHOOK HEADERS (set by the platform)
// =============================================================================

export const SHOPIFY_HEADERS = {
  /** Base64 HMAC-SHA256 of the raw body */
  HMAC: 'x-shopify-hmac-sha256',

  /** Shop the delivery concerns */
  SHOP_DOMAIN: 'x-shopify-shop-domain',

  /** Event topic, e.g. "app/uninstalled" */
  TOPIC: 'x-shopify-topic',

  /** Delivery id, stable across redeliveries */
  WEBHOOK_ID: 'x-shopify-webhook-id',

  /** Admin API credential on outbound calls */
  ACCESS_TOKEN: 'X-Shopify-Access-Token',
} as const;

// =============================================================================
// EMBEDDING
// =============================================================================

export const ADMIN_ORIGIN = 'https://admin.shopify.com';

/**
 * Content-Security-Policy allowing the page to be framed only by the shop's
 * own admin and the central admin origin
 */
export function embeddedContentSecurityPolicy(shop: string): string {
  return `frame-ancestors https://${shop} ${ADMIN_ORIGIN};`;
}
