import { describe, it, expect } from 'vitest';
import { createHmac } from 'crypto';
import {
  computeWebhookSignature,
  verifyWebhookSignature,
  launchQueryMessage,
  computeLaunchQueryHmac,
  verifyLaunchQuery,
} from './webhook.js';
import { InvalidWebhookSignatureError } from './errors.js';

const secret = 'test-secret';

function reasonOf(fn: () => void): unknown {
  try {
    fn();
  } catch (error) {
    return error instanceof InvalidWebhookSignatureError ? error.details?.reason : error;
  }
  return undefined;
}

describe('verifyWebhookSignature', () => {
  const body = Buffer.from('{"id":1,"domain":"test-store.example"}');

  it('accepts the digest of the exact body', () => {
    const header = createHmac('sha256', secret).update(body).digest('base64');

    expect(computeWebhookSignature(body, secret)).toBe(header);
    expect(() => verifyWebhookSignature(body, header, secret)).not.toThrow();
  });

  it('rejects a re-serialized body with the same meaning', () => {
    const header = computeWebhookSignature(body, secret);
    const reserialized = Buffer.from(JSON.stringify(JSON.parse(body.toString()), null, 2));

    expect(reasonOf(() => verifyWebhookSignature(reserialized, header, secret))).toBe('mismatch');
  });

  it('rejects a digest made with another secret', () => {
    const header = computeWebhookSignature(body, 'different-secret');
    expect(reasonOf(() => verifyWebhookSignature(body, header, secret))).toBe('mismatch');
  });

  it('rejects a truncated header', () => {
    const header = computeWebhookSignature(body, secret).slice(0, 10);
    expect(reasonOf(() => verifyWebhookSignature(body, header, secret))).toBe('mismatch');
  });

  it('rejects a missing header', () => {
    expect(reasonOf(() => verifyWebhookSignature(body, undefined, secret))).toBe('missing_signature');
  });

  it('rejects a missing or empty body', () => {
    const header = computeWebhookSignature(body, secret);
    expect(reasonOf(() => verifyWebhookSignature(undefined, header, secret))).toBe('missing_body');
    expect(reasonOf(() => verifyWebhookSignature(Buffer.alloc(0), header, secret))).toBe('missing_body');
  });
});

describe('launch query signatures', () => {
  const query = {
    shop: 'test-store.example',
    host: 'YWRtaW4=',
    timestamp: '1700000000',
  };

  it('signs the sorted parameters without hmac and signature', () => {
    expect(launchQueryMessage({ ...query, hmac: 'ignored', signature: 'ignored' })).toBe(
      'host=YWRtaW4=&shop=test-store.example&timestamp=1700000000'
    );
  });

  it('accepts a correctly signed query', () => {
    const hmac = createHmac('sha256', secret)
      .update('host=YWRtaW4=&shop=test-store.example&timestamp=1700000000')
      .digest('hex');

    expect(computeLaunchQueryHmac(query, secret)).toBe(hmac);
    expect(verifyLaunchQuery({ ...query, hmac }, secret)).toBe(true);
  });

  it('rejects a tampered parameter', () => {
    const hmac = computeLaunchQueryHmac(query, secret);
    expect(verifyLaunchQuery({ ...query, shop: 'other-store.example', hmac }, secret)).toBe(false);
  });

  it.each([undefined, '', 'zz', 'abcd'])('rejects hmac %j', (hmac) => {
    const params: Record<string, string> = hmac === undefined ? { ...query } : { ...query, hmac };
    expect(verifyLaunchQuery(params, secret)).toBe(false);
  });
});
