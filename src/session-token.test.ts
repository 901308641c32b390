/**
 * Session token verification tests
 *
 * Tokens are minted with jsonwebtoken so verification is checked against an
 * independent HS256 implementation.
 */

import { describe, it, expect } from 'vitest';
import jwt from 'jsonwebtoken';
import {
  verifySessionToken,
  decodeSessionToken,
  shopFromClaims,
  extractBearerToken,
} from './session-token.js';
import {
  MalformedTokenError,
  InvalidSignatureError,
  ExpiredTokenError,
  AudienceMismatchError,
} from './errors.js';

const apiKey = 'test-api-key';
const apiSecret = 'test-secret';
const config = { apiKey, apiSecret };

const nowSeconds = () => Math.floor(Date.now() / 1000);

function sign(payload: Record<string, unknown>, secret = apiSecret): string {
  return jwt.sign(payload, secret, { algorithm: 'HS256', noTimestamp: true });
}

/** Overrides set to undefined remove the claim */
function validPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  const payload: Record<string, unknown> = {
    iss: 'https://test-store.example/admin',
    dest: 'https://test-store.example',
    aud: apiKey,
    sub: '42',
    exp: nowSeconds() + 60,
    nbf: nowSeconds() - 5,
    ...overrides,
  };
  return Object.fromEntries(Object.entries(payload).filter(([, value]) => value !== undefined));
}

function flipSignatureBit(token: string): string {
  const [header, payload, signature] = token.split('.');
  const bytes = Buffer.from(signature ?? '', 'base64url');
  bytes[0] = (bytes[0] ?? 0) ^ 1;
  return `${header}.${payload}.${bytes.toString('base64url')}`;
}

describe('verifySessionToken', () => {
  it('returns the shop from dest', async () => {
    await expect(verifySessionToken(sign(validPayload()), config)).resolves.toBe(
      'test-store.example'
    );
  });

  it('falls back to iss when dest is absent', async () => {
    const token = sign(validPayload({ dest: undefined }));
    await expect(verifySessionToken(token, config)).resolves.toBe('test-store.example');
  });

  it('accepts an audience list containing the api key', async () => {
    const token = sign(validPayload({ aud: ['other-app', apiKey] }));
    await expect(verifySessionToken(token, config)).resolves.toBe('test-store.example');
  });

  it('rejects a token with a single flipped signature bit', async () => {
    const token = flipSignatureBit(sign(validPayload()));
    await expect(verifySessionToken(token, config)).rejects.toBeInstanceOf(InvalidSignatureError);
  });

  it('rejects a token signed with another secret', async () => {
    const token = sign(validPayload(), 'different-secret');
    await expect(verifySessionToken(token, config)).rejects.toBeInstanceOf(InvalidSignatureError);
  });

  it('rejects an expired token', async () => {
    const token = sign(validPayload({ exp: nowSeconds() - 1 }));
    await expect(verifySessionToken(token, config)).rejects.toBeInstanceOf(ExpiredTokenError);
  });

  it('rejects a token that is not yet valid', async () => {
    const token = sign(validPayload({ nbf: nowSeconds() + 120 }));
    await expect(verifySessionToken(token, config)).rejects.toThrow(
      'Session token is not yet valid'
    );
  });

  it('reports expiry before audience', async () => {
    const token = sign(validPayload({ exp: nowSeconds() - 1, aud: 'other-app' }));
    await expect(verifySessionToken(token, config)).rejects.toBeInstanceOf(ExpiredTokenError);
  });

  it('rejects a mismatched audience', async () => {
    const token = sign(validPayload({ aud: 'other-app' }));
    await expect(verifySessionToken(token, config)).rejects.toBeInstanceOf(AudienceMismatchError);
  });

  it('rejects a missing audience', async () => {
    const token = sign(validPayload({ aud: undefined }));
    await expect(verifySessionToken(token, config)).rejects.toBeInstanceOf(AudienceMismatchError);
  });

  it('rejects a token without exp', async () => {
    const token = sign(validPayload({ exp: undefined }));
    await expect(verifySessionToken(token, config)).rejects.toBeInstanceOf(MalformedTokenError);
  });

  it('reports a missing destination before audience', async () => {
    const token = sign(validPayload({ dest: undefined, iss: undefined, aud: 'other-app' }));
    await expect(verifySessionToken(token, config)).rejects.toMatchObject({
      name: 'MalformedTokenError',
      message: 'Session token has no destination',
    });
  });

  it.each(['', 'not-a-jwt', 'a.b', 'a.b.c.d', 'e30.e30.'])('rejects malformed token %j', async (token) => {
    await expect(verifySessionToken(token, config)).rejects.toBeInstanceOf(MalformedTokenError);
  });

  it('rejects another algorithm', async () => {
    const token = jwt.sign(validPayload(), apiSecret, { algorithm: 'HS512', noTimestamp: true });
    await expect(verifySessionToken(token, config)).rejects.toBeInstanceOf(MalformedTokenError);
  });

  it('rejects a token whose destination is not a shop domain', async () => {
    const token = sign(validPayload({ dest: 'not a shop', iss: 'also not' }));
    await expect(verifySessionToken(token, config)).rejects.toThrow(
      'Session token has no valid destination'
    );
  });

  it('verifies against an injected time', async () => {
    const exp = nowSeconds() + 60;
    const token = sign(validPayload({ exp }));

    await expect(
      verifySessionToken(token, { ...config, now: new Date((exp + 1) * 1000) })
    ).rejects.toBeInstanceOf(ExpiredTokenError);
  });
});

describe('decodeSessionToken', () => {
  it('returns the verified claims', async () => {
    const payload = validPayload();
    const claims = await decodeSessionToken(sign(payload), config);

    expect(claims).toEqual({
      iss: 'https://test-store.example/admin',
      dest: 'https://test-store.example',
      aud: apiKey,
      sub: '42',
      exp: payload.exp,
      nbf: payload.nbf,
    });
  });
});

describe('shopFromClaims', () => {
  it('prefers dest over iss', () => {
    expect(
      shopFromClaims({ dest: 'https://first.example', iss: 'https://second.example/admin' })
    ).toBe('first.example');
  });

  it('throws when neither claim names a shop', () => {
    expect(() => shopFromClaims({})).toThrow(MalformedTokenError);
  });
});

describe('extractBearerToken', () => {
  it('extracts the token', () => {
    expect(extractBearerToken('Bearer abc.def.ghi')).toBe('abc.def.ghi');
  });

  it.each([undefined, '', 'Basic dXNlcjpwYXNz', 'Bearer ', 'bearer abc'])(
    'returns null for %j',
    (header) => {
      expect(extractBearerToken(header)).toBeNull();
    }
  );
});
