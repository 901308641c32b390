/**
 * Domain Types
 *
 * Core type definitions for installations, widget settings and the
 * request-scoped shop identity.
 */

// =============================================================================
// TENANT RECORDS
// =============================================================================

/**
 * Normalized shop domain (e.g. "test-store.example").
 * The sole key for every tenant-scoped record.
 */
export type ShopDomain = string;

/**
 * One installed storefront. `accessToken` is the admin API credential and
 * must never leave the process.
 */
export interface Installation {
  shop: ShopDomain;
  accessToken: string;
  /** Scopes granted at token exchange */
  scope: string;
  installedAt: Date;
}

/**
 * Contact widget settings for one shop
 */
export interface WidgetConfig {
  shop: ShopDomain;
  /** Phone number the widget opens a chat with */
  contactNumber: string;
  /** Message pre-filled in the chat */
  initialMessage: string;
  updatedAt: Date;
}

export interface AnalyticsRecord {
  shop: ShopDomain;
  clickCount: number;
  firstClickAt: Date | null;
  lastClickAt: Date | null;
}

/**
 * Single-use value binding an authorization redirect to its callback
 */
export interface OAuthState {
  nonce: string;
  shop: ShopDomain;
  issuedAt: Date;
  expiresAt: Date;
}

// =============================================================================
// INPUTS
// =============================================================================

export interface InstallationInput {
  shop: ShopDomain;
  accessToken: string;
  scope?: string;
}

export interface WidgetConfigInput {
  contactNumber: string;
  initialMessage: string;
}

// =============================================================================
// SESSION TOKEN
// =============================================================================

/**
 * Claims carried by the session token the embedded admin frontend sends
 * on every API call
 */
export interface SessionClaims {
  /** Shop admin URL, e.g. "https://test-store.example/admin" */
  iss?: string;
  /** Shop URL, e.g. "https://test-store.example" */
  dest?: string;
  /** App client id */
  aud: string | string[];
  /** Staff user id */
  sub?: string;
  exp: number;
  nbf?: number;
  iat?: number;
  jti?: string;
  sid?: string;
}

/**
 * How a request was attributed to a shop
 */
export type ShopResolutionSource = 'session-token' | 'dev-query-param';

/**
 * Time source, injectable for tests
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
