/**
 * Shop Domain Normalization
 *
 * Turns the many shapes a shop identifier arrives in (query parameter,
 * token claim, webhook payload) into the canonical tenant key.
 *
 * Examples:
 * - "Test-Store.example" → "test-store.example"
 * - "https://test-store.example/admin" → "test-store.example"
 * - "test-store.example:443" → "test-store.example"
 */

import type { ShopDomain } from './types.js';
import { InvalidShopDomainError } from './errors.js';

const SHOP_DOMAIN_PATTERN = /^[a-z0-9][a-z0-9-]*(\.[a-z0-9][a-z0-9-]*)+$/;

/**
 * Normalize a shop identifier, returning null when it is not a valid domain
 */
export function parseShopDomain(input: string | null | undefined): ShopDomain | null {
  if (!input) {
    return null;
  }

  const host = input
    .trim()
    .toLowerCase()
    .replace(/^[a-z][a-z0-9+.-]*:\/\//, '')
    .split('/')[0]
    ?.split('?')[0]
    ?.split(':')[0];

  if (!host || host.length > 255 || !SHOP_DOMAIN_PATTERN.test(host)) {
    return null;
  }

  return host;
}

/**
 * Normalize a shop identifier or throw InvalidShopDomainError
 */
export function normalizeShopDomain(input: string | null | undefined): ShopDomain {
  const shop = parseShopDomain(input);
  if (!shop) {
    throw new InvalidShopDomainError(input ?? '');
  }
  return shop;
}

/**
 * Store handle used by the admin ("test-store" for "test-store.example")
 */
export function shopHandle(shop: ShopDomain): string {
  return shop.split('.')[0] ?? shop;
}
