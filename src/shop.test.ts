import { describe, it, expect } from 'vitest';
import { parseShopDomain, normalizeShopDomain, shopHandle } from './shop.js';
import { InvalidShopDomainError } from './errors.js';

describe('parseShopDomain', () => {
  it.each([
    ['test-store.example', 'test-store.example'],
    ['Test-Store.Example', 'test-store.example'],
    ['  test-store.example  ', 'test-store.example'],
    ['https://test-store.example', 'test-store.example'],
    ['https://test-store.example/admin', 'test-store.example'],
    ['test-store.example:443', 'test-store.example'],
    ['test-store.example?foo=bar', 'test-store.example'],
  ])('normalizes %j', (input, expected) => {
    expect(parseShopDomain(input)).toBe(expected);
  });

  it.each([undefined, null, '', 'localhost', 'bad_shop.example', '-store.example', '.example', 'https://'])(
    'rejects %j',
    (input) => {
      expect(parseShopDomain(input)).toBeNull();
    }
  );

  it('rejects overlong domains', () => {
    expect(parseShopDomain(`${'a'.repeat(250)}.example`)).toBeNull();
  });
});

describe('normalizeShopDomain', () => {
  it('returns the normalized domain', () => {
    expect(normalizeShopDomain('HTTPS://Test-Store.example/')).toBe('test-store.example');
  });

  it('throws InvalidShopDomainError', () => {
    expect(() => normalizeShopDomain('not a shop')).toThrow(InvalidShopDomainError);
    expect(() => normalizeShopDomain(undefined)).toThrow(InvalidShopDomainError);
  });
});

describe('shopHandle', () => {
  it('returns the first label', () => {
    expect(shopHandle('test-store.example')).toBe('test-store');
  });
});
