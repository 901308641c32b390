/**
 * Session Token Verification
 *
 * Verifies the HS256 session token the embedded admin frontend attaches to
 * every API request and resolves it to the shop it was issued for.
 *
 * Checks run in a fixed order so each failure maps to exactly one error:
 * structure → signature → exp/nbf → audience → destination.
 */

import * as jose from 'jose';
import { z } from 'zod';
import type { SessionClaims, ShopDomain } from './types.js';
import { parseShopDomain } from './shop.js';
import {
  AudienceMismatchError,
  ExpiredTokenError,
  InvalidSignatureError,
  MalformedTokenError,
} from './errors.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface SessionTokenConfig {
  /** App client id; expected in the `aud` claim */
  apiKey: string;

  /** App client secret; the HMAC key */
  apiSecret: string;

  /** Verification time (default: now) */
  now?: Date;
}

const claimsSchema = z.object({
  iss: z.string().optional(),
  dest: z.string().optional(),
  aud: z.union([z.string(), z.array(z.string())]).optional(),
  sub: z.string().optional(),
  exp: z.number(),
  nbf: z.number().optional(),
  iat: z.number().optional(),
  jti: z.string().optional(),
  sid: z.string().optional(),
});

const encoder = new TextEncoder();

// =============================================================================
// VERIFICATION
// =============================================================================

/**
 * Verify signature and timestamps, mapping jose failures onto the
 * session error taxonomy. Does NOT check audience.
 */
async function verifySignedClaims(
  token: string,
  config: SessionTokenConfig
): Promise<jose.JWTPayload> {
  try {
    const { payload } = await jose.jwtVerify(token, encoder.encode(config.apiSecret), {
      algorithms: ['HS256'],
      requiredClaims: ['exp'],
      clockTolerance: 0,
      currentDate: config.now,
    });
    return payload;
  } catch (error) {
    if (error instanceof jose.errors.JWSSignatureVerificationFailed) {
      throw new InvalidSignatureError();
    }
    if (error instanceof jose.errors.JWTExpired) {
      throw new ExpiredTokenError();
    }
    if (
      error instanceof jose.errors.JWTClaimValidationFailed &&
      error.claim === 'nbf' &&
      error.reason === 'check_failed'
    ) {
      throw new ExpiredTokenError('Session token is not yet valid');
    }
    if (error instanceof jose.errors.JOSEError) {
      throw new MalformedTokenError();
    }
    throw error;
  }
}

function audienceMatches(aud: SessionClaims['aud'] | undefined, apiKey: string): boolean {
  if (Array.isArray(aud)) {
    return aud.includes(apiKey);
  }
  return aud === apiKey;
}

/**
 * Verify a session token and return its decoded claims
 */
export async function decodeSessionToken(
  token: string,
  config: SessionTokenConfig
): Promise<SessionClaims> {
  if (!token || token.split('.').length !== 3) {
    throw new MalformedTokenError();
  }

  const payload = await verifySignedClaims(token, config);

  const parsed = claimsSchema.safeParse(payload);
  if (!parsed.success) {
    throw new MalformedTokenError();
  }

  const { aud, ...claims } = parsed.data;
  if (!claims.dest && !claims.iss) {
    throw new MalformedTokenError('Session token has no destination');
  }
  if (!aud || !audienceMatches(aud, config.apiKey)) {
    throw new AudienceMismatchError();
  }

  return { ...claims, aud };
}

/**
 * Resolve the shop a set of verified claims was issued for.
 * `dest` is preferred; `iss` ("https://{shop}/admin") is the fallback.
 */
export function shopFromClaims(claims: Pick<SessionClaims, 'dest' | 'iss'>): ShopDomain {
  const shop = parseShopDomain(claims.dest) ?? parseShopDomain(claims.iss);
  if (!shop) {
    throw new MalformedTokenError('Session token has no valid destination');
  }
  return shop;
}

/**
 * Verify a session token and return the shop domain it attributes the
 * request to
 *
 * @example
 * const shop = await verifySessionToken(bearer, {
 *   apiKey: config.shopify.apiKey,
 *   apiSecret: config.shopify.apiSecret,
 * });
 */
export async function verifySessionToken(
  token: string,
  config: SessionTokenConfig
): Promise<ShopDomain> {
  const claims = await decodeSessionToken(token, config);
  return shopFromClaims(claims);
}

/**
 * Extract bearer token from authorization header
 */
export function extractBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader?.startsWith('Bearer ')) {
    return null;
  }
  const token = authHeader.slice(7).trim();
  return token || null;
}
