/**
 * Installation Flow
 *
 * Drives a shop from Unauthenticated to Authorized:
 *
 * 1. begin(shop): store a single-use nonce, return the authorize URL
 *    (PendingAuthorization)
 * 2. complete(callback): consume the nonce, exchange the code, upsert the
 *    Installation (Authorized)
 *
 * Nothing is persisted on failure, so a failed callback leaves the shop
 * where it started.
 */

import { randomBytes } from 'crypto';
import type { Clock, Installation, OAuthState, ShopDomain } from './types.js';
import { systemClock } from './types.js';
import type { InstallationStore } from './store/types.js';
import {
  buildAuthorizeUrl,
  exchangeCodeForToken,
  type AccessTokenGrant,
  type AdminApiOptions,
  type AppCredentials,
} from './admin-api.js';
import { normalizeShopDomain, parseShopDomain } from './shop.js';
import { InvalidStateError, TokenExchangeFailedError } from './errors.js';
import { appEndpoint } from './config.js';

export const DEFAULT_STATE_TTL_MS = 10 * 60 * 1000;

export type CodeExchanger = (
  shop: ShopDomain,
  code: string,
  credentials: AppCredentials
) => Promise<AccessTokenGrant>;

export interface OAuthFlowOptions {
  store: InstallationStore;
  apiKey: string;
  apiSecret: string;
  scopes: string[];
  /** Public base URL of this app; the callback is `${appUrl}/auth/callback` */
  appUrl: string;
  stateTtlMs?: number;
  clock?: Clock;
  /** Outbound options for the default code exchanger */
  adminApi?: AdminApiOptions;
  /** Replaces the HTTP code exchange (tests) */
  exchangeCode?: CodeExchanger;
  generateNonce?: () => string;
}

export interface AuthorizationRequest {
  shop: ShopDomain;
  state: OAuthState;
  redirectUrl: string;
}

export interface CallbackParams {
  shop: string | undefined;
  code: string | undefined;
  state: string | undefined;
}

export class OAuthFlow {
  private readonly store: InstallationStore;
  private readonly credentials: AppCredentials;
  private readonly stateTtlMs: number;
  private readonly clock: Clock;
  private readonly exchangeCode: CodeExchanger;
  private readonly generateNonce: () => string;

  constructor(private readonly options: OAuthFlowOptions) {
    this.store = options.store;
    this.credentials = { apiKey: options.apiKey, apiSecret: options.apiSecret };
    this.stateTtlMs = options.stateTtlMs ?? DEFAULT_STATE_TTL_MS;
    this.clock = options.clock ?? systemClock;
    this.exchangeCode =
      options.exchangeCode ??
      ((shop, code, credentials) => exchangeCodeForToken(shop, code, credentials, options.adminApi));
    this.generateNonce = options.generateNonce ?? (() => randomBytes(32).toString('hex'));
  }

  get redirectUri(): string {
    return appEndpoint(this.options.appUrl, '/auth/callback').toString();
  }

  /**
   * Unauthenticated → PendingAuthorization
   */
  async begin(shopInput: string | undefined): Promise<AuthorizationRequest> {
    const shop = normalizeShopDomain(shopInput);
    const issuedAt = this.clock();
    const state: OAuthState = {
      nonce: this.generateNonce(),
      shop,
      issuedAt,
      expiresAt: new Date(issuedAt.getTime() + this.stateTtlMs),
    };

    await this.store.saveOAuthState(state);

    const redirectUrl = buildAuthorizeUrl(shop, {
      apiKey: this.options.apiKey,
      scopes: this.options.scopes,
      redirectUri: this.redirectUri,
      state: state.nonce,
    });

    return { shop, state, redirectUrl };
  }

  /**
   * PendingAuthorization → Authorized
   */
  async complete(params: CallbackParams): Promise<Installation> {
    const shop = parseShopDomain(params.shop);
    if (!shop || !params.state) {
      throw new InvalidStateError();
    }

    // Consumed before validation: a nonce is spent whether or not it checks out.
    const state = await this.store.consumeOAuthState(params.state);
    if (!state || state.shop !== shop || state.expiresAt.getTime() <= this.clock().getTime()) {
      throw new InvalidStateError();
    }

    if (!params.code) {
      throw new TokenExchangeFailedError(shop, new Error('Callback carried no authorization code'));
    }

    let grant: AccessTokenGrant;
    try {
      grant = await this.exchangeCode(shop, params.code, this.credentials);
    } catch (error) {
      console.error(
        `[OAuth] Token exchange failed for ${shop}:`,
        error instanceof Error ? error.message : error
      );
      throw new TokenExchangeFailedError(shop, error);
    }

    const installation = await this.store.saveInstallation({
      shop,
      accessToken: grant.accessToken,
      scope: grant.scope,
    });
    console.log(`[OAuth] Installed for ${shop} (scope: ${installation.scope || 'none'})`);
    return installation;
  }

  /**
   * Remove the shop and everything that depends on it. Safe to repeat.
   */
  async uninstall(shop: ShopDomain): Promise<boolean> {
    const existed = await this.store.deleteInstallation(shop);
    console.log(`[OAuth] Uninstalled ${shop}${existed ? '' : ' (already absent)'}`);
    return existed;
  }
}
