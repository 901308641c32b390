/**
 * Plan selection and subscription gating for the embedded admin page.
 * Plans themselves are managed in the platform admin; this app only links
 * to them and asks whether the shop is subscribed.
 */

import type { Installation, ShopDomain } from './types.js';
import { AdminApiClient, type AdminApiOptions } from './admin-api.js';
import { shopHandle } from './shop.js';

const ADMIN_ORIGIN = 'https://admin.shopify.com';

export type SubscriptionCheck = (installation: Installation) => Promise<boolean>;

/**
 * Platform-hosted plan selection page for this app on a shop
 */
export function planSelectionUrl(shop: ShopDomain, appHandle: string): string {
  const store = encodeURIComponent(shopHandle(shop));
  return `${ADMIN_ORIGIN}/store/${store}/charges/${encodeURIComponent(appHandle)}/pricing_plans`;
}

export function adminSubscriptionCheck(options: AdminApiOptions = {}): SubscriptionCheck {
  return (installation) =>
    new AdminApiClient(installation.shop, installation.accessToken, options).hasActiveSubscription();
}
