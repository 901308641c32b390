/**
 * HTML shell for the embedded admin page. The dashboard itself is a
 * client-side bundle; this page only boots App Bridge with the app key.
 */

import type { ShopDomain } from '../types.js';
import { shopHandle } from '../shop.js';

const APP_BRIDGE_SRC = 'https://cdn.shopify.com/shopifycloud/app-bridge.js';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

export interface EmbeddedShellParams {
  apiKey: string;
  shop: ShopDomain;
  /** `host` launch parameter, passed through to App Bridge */
  host?: string;
}

export function renderEmbeddedShell({ apiKey, shop, host }: EmbeddedShellParams): string {
  return `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="shopify-api-key" content="${escapeHtml(apiKey)}" />
    <script src="${APP_BRIDGE_SRC}"></script>
    <title>Contact widget - ${escapeHtml(shopHandle(shop))}</title>
  </head>
  <body>
    <div id="app" data-shop="${escapeHtml(shop)}" data-host="${escapeHtml(host ?? '')}"></div>
  </body>
</html>
`;
}
