import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { OAuthFlow, DEFAULT_STATE_TTL_MS, type CodeExchanger } from './oauth.js';
import { SqliteInstallationStore } from './store/sqlite-store.js';
import type { InstallationStore } from './store/types.js';
import {
  AdminApiError,
  InvalidShopDomainError,
  InvalidStateError,
  TokenExchangeFailedError,
} from './errors.js';

const SHOP = 'test-store.example';
const NONCE = 'f'.repeat(64);

describe('OAuthFlow', () => {
  let store: InstallationStore;
  let now: Date;
  let exchangeCode: Mock<CodeExchanger>;
  let flow: OAuthFlow;

  beforeEach(() => {
    now = new Date('2024-05-01T12:00:00.000Z');
    store = SqliteInstallationStore.open(':memory:', { clock: () => now });
    exchangeCode = vi.fn<CodeExchanger>(async () => ({
      accessToken: 'test-access-token',
      scope: 'read_script_tags,write_script_tags',
    }));
    flow = new OAuthFlow({
      store,
      apiKey: 'test-api-key',
      apiSecret: 'test-secret',
      scopes: ['read_script_tags', 'write_script_tags'],
      appUrl: 'https://app.example',
      clock: () => now,
      exchangeCode,
      generateNonce: () => NONCE,
    });
  });

  afterEach(async () => {
    await store.close();
  });

  describe('begin', () => {
    it('stores a nonce and builds the authorize URL', async () => {
      const request = await flow.begin('Test-Store.example');

      expect(request.shop).toBe(SHOP);
      expect(request.redirectUrl).toBe(
        'https://test-store.example/admin/oauth/authorize' +
          '?client_id=test-api-key' +
          '&scope=read_script_tags%2Cwrite_script_tags' +
          '&redirect_uri=https%3A%2F%2Fapp.example%2Fauth%2Fcallback' +
          `&state=${NONCE}`
      );
      await expect(store.getOAuthState(NONCE)).resolves.toEqual({
        nonce: NONCE,
        shop: SHOP,
        issuedAt: now,
        expiresAt: new Date(now.getTime() + DEFAULT_STATE_TTL_MS),
      });
    });

    it('rejects an invalid shop', async () => {
      await expect(flow.begin('not a shop')).rejects.toBeInstanceOf(InvalidShopDomainError);
      await expect(flow.begin(undefined)).rejects.toBeInstanceOf(InvalidShopDomainError);
    });
  });

  describe('complete', () => {
    it('exchanges the code and saves the installation', async () => {
      await flow.begin(SHOP);
      const installation = await flow.complete({ shop: SHOP, code: 'test-code', state: NONCE });

      expect(exchangeCode).toHaveBeenCalledWith(SHOP, 'test-code', {
        apiKey: 'test-api-key',
        apiSecret: 'test-secret',
      });
      expect(installation).toEqual({
        shop: SHOP,
        accessToken: 'test-access-token',
        scope: 'read_script_tags,write_script_tags',
        installedAt: now,
      });
      await expect(store.getInstallation(SHOP)).resolves.toEqual(installation);
    });

    it('rejects a replayed nonce', async () => {
      await flow.begin(SHOP);
      await flow.complete({ shop: SHOP, code: 'test-code', state: NONCE });

      await expect(
        flow.complete({ shop: SHOP, code: 'test-code', state: NONCE })
      ).rejects.toBeInstanceOf(InvalidStateError);
      expect(exchangeCode).toHaveBeenCalledTimes(1);
    });

    it('rejects an unknown nonce', async () => {
      await expect(
        flow.complete({ shop: SHOP, code: 'test-code', state: 'e'.repeat(64) })
      ).rejects.toBeInstanceOf(InvalidStateError);
    });

    it('rejects a nonce issued for another shop and spends it', async () => {
      await flow.begin('other-store.example');

      await expect(
        flow.complete({ shop: SHOP, code: 'test-code', state: NONCE })
      ).rejects.toBeInstanceOf(InvalidStateError);
      await expect(store.getOAuthState(NONCE)).resolves.toBeNull();
    });

    it('rejects an expired nonce', async () => {
      await flow.begin(SHOP);
      now = new Date(now.getTime() + DEFAULT_STATE_TTL_MS);

      await expect(
        flow.complete({ shop: SHOP, code: 'test-code', state: NONCE })
      ).rejects.toBeInstanceOf(InvalidStateError);
      expect(exchangeCode).not.toHaveBeenCalled();
    });

    it.each([
      { shop: undefined, code: 'test-code', state: NONCE },
      { shop: SHOP, code: 'test-code', state: undefined },
      { shop: 'not a shop', code: 'test-code', state: NONCE },
    ])('rejects callback %j', async (params) => {
      await flow.begin(SHOP);
      await expect(flow.complete(params)).rejects.toBeInstanceOf(InvalidStateError);
    });

    it('fails without a code and persists nothing', async () => {
      await flow.begin(SHOP);

      await expect(
        flow.complete({ shop: SHOP, code: undefined, state: NONCE })
      ).rejects.toBeInstanceOf(TokenExchangeFailedError);
      await expect(store.getInstallation(SHOP)).resolves.toBeNull();
    });

    it('hides the exchange failure behind a generic error', async () => {
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      exchangeCode.mockRejectedValueOnce(new AdminApiError('token exchange', 'http_status', 400));
      await flow.begin(SHOP);

      const error = await flow
        .complete({ shop: SHOP, code: 'test-code', state: NONCE })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(TokenExchangeFailedError);
      expect(error).toMatchObject({ message: 'Failed to complete installation', statusCode: 502 });
      expect(consoleError).toHaveBeenCalledOnce();
      await expect(store.getInstallation(SHOP)).resolves.toBeNull();
    });
  });

  describe('uninstall', () => {
    it('removes the installation and repeats safely', async () => {
      await store.saveInstallation({ shop: SHOP, accessToken: 'test-access-token' });

      await expect(flow.uninstall(SHOP)).resolves.toBe(true);
      await expect(flow.uninstall(SHOP)).resolves.toBe(false);
      await expect(store.getInstallation(SHOP)).resolves.toBeNull();
    });
  });

  it('derives the redirect URI from the app URL', () => {
    expect(flow.redirectUri).toBe('https://app.example/auth/callback');
  });

  it('keeps the path prefix of the app URL in the redirect URI', () => {
    const prefixed = new OAuthFlow({
      store,
      apiKey: 'test-api-key',
      apiSecret: 'test-secret',
      scopes: ['write_script_tags'],
      appUrl: 'https://proxy.example/widget-app/',
      exchangeCode,
    });

    expect(prefixed.redirectUri).toBe('https://proxy.example/widget-app/auth/callback');
  });
});
