/**
 * Installation Store Contract
 *
 * Durable per-shop key space. Every backend provides the same guarantees:
 *
 * - mutations for one shop are serialized (no lost updates);
 *   different shops do not wait on each other
 * - WidgetConfig and AnalyticsRecord are written only while an
 *   Installation exists (UnknownTenantError otherwise)
 * - deleteInstallation removes the shop's config and analytics in the same
 *   operation and succeeds when nothing is there
 * - I/O failures surface as PersistenceError
 */

import type {
  AnalyticsRecord,
  Installation,
  InstallationInput,
  OAuthState,
  ShopDomain,
  WidgetConfig,
  WidgetConfigInput,
} from '../types.js';

export type StoreBackend = 'file' | 'sqlite';

export interface InstallationStore {
  readonly backend: StoreBackend;

  // Installations
  getInstallation(shop: ShopDomain): Promise<Installation | null>;
  /** Create or replace the shop's installation */
  saveInstallation(input: InstallationInput): Promise<Installation>;
  /**
   * Cascade-delete the shop's installation, config and analytics.
   * Resolves true when an installation existed.
   */
  deleteInstallation(shop: ShopDomain): Promise<boolean>;
  listInstallations(): Promise<Installation[]>;

  // Widget configuration
  getWidgetConfig(shop: ShopDomain): Promise<WidgetConfig | null>;
  saveWidgetConfig(shop: ShopDomain, input: WidgetConfigInput): Promise<WidgetConfig>;
  deleteWidgetConfig(shop: ShopDomain): Promise<void>;

  // Analytics
  getAnalytics(shop: ShopDomain): Promise<AnalyticsRecord | null>;
  /** Atomically add one click */
  recordClick(shop: ShopDomain): Promise<AnalyticsRecord>;
  deleteAnalytics(shop: ShopDomain): Promise<void>;

  // OAuth state
  saveOAuthState(state: OAuthState): Promise<void>;
  getOAuthState(nonce: string): Promise<OAuthState | null>;
  /** Remove and return the state in one step; null when absent */
  consumeOAuthState(nonce: string): Promise<OAuthState | null>;
  deleteOAuthState(nonce: string): Promise<void>;

  /** Flush pending writes and release the backing medium */
  close(): Promise<void>;
}
