/**
 * Storefront Contact Widget
 *
 * Trust and installation lifecycle for an embedded storefront app: session
 * token and webhook verification, the OAuth install flow, per-shop storage
 * and widget loader registration.
 *
 * @packageDocumentation
 *
 * @example Verifying a request
 * ```typescript
 * import { verifySessionToken, extractBearerToken } from 'storefront-contact-widget';
 *
 * const token = extractBearerToken(req.headers.authorization);
 * const shop = await verifySessionToken(token ?? '', { apiKey, apiSecret });
 * ```
 */

// Types
export type {
  ShopDomain,
  Installation,
  WidgetConfig,
  WidgetConfigInput,
  AnalyticsRecord,
  OAuthState,
  InstallationInput,
  SessionClaims,
  ShopResolutionSource,
  Clock,
} from './types.js';
export { systemClock } from './types.js';

// Errors
export {
  AppError,
  SessionVerificationError,
  MalformedTokenError,
  InvalidSignatureError,
  ExpiredTokenError,
  AudienceMismatchError,
  MissingSessionError,
  InvalidWebhookSignatureError,
  InvalidLaunchSignatureError,
  InvalidStateError,
  TokenExchangeFailedError,
  InvalidShopDomainError,
  UnknownTenantError,
  InvalidInputError,
  ScriptTagInstallFailedError,
  AdminApiError,
  PersistenceError,
  ConfigError,
  isAppError,
  isVerificationError,
} from './errors.js';

// Verification
export {
  verifySessionToken,
  decodeSessionToken,
  shopFromClaims,
  extractBearerToken,
} from './session-token.js';
export type { SessionTokenConfig } from './session-token.js';
export {
  verifyWebhookSignature,
  computeWebhookSignature,
  verifyLaunchQuery,
  computeLaunchQueryHmac,
} from './webhook.js';

// Headers and shop domains
export { SHOPIFY_HEADERS, embeddedContentSecurityPolicy } from './headers.js';
export { parseShopDomain, normalizeShopDomain } from './shop.js';

// Storage
export { openStore, FileInstallationStore, SqliteInstallationStore } from './store/index.js';
export type { InstallationStore, StoreBackend, OpenStoreOptions } from './store/index.js';

// Installation lifecycle
export { OAuthFlow, DEFAULT_STATE_TTL_MS } from './oauth.js';
export type { OAuthFlowOptions, CallbackParams, AuthorizationRequest, CodeExchanger } from './oauth.js';
export { ScriptTagInstaller, widgetLoaderUrl } from './script-tag.js';
export type { ScriptTagOutcome, ScriptTagInstallerOptions } from './script-tag.js';
export { WidgetConfigService } from './widget-config.js';
export type { SaveWidgetConfigResult, PublicWidgetSettings } from './widget-config.js';
export { planSelectionUrl, adminSubscriptionCheck } from './billing.js';
export type { SubscriptionCheck } from './billing.js';
export { AdminApiClient, buildAuthorizeUrl, exchangeCodeForToken } from './admin-api.js';
export type { AdminApiOptions, FetchLike } from './admin-api.js';

// Configuration
export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
