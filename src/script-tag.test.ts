import { describe, it, expect, vi } from 'vitest';
import { ScriptTagInstaller, widgetLoaderUrl } from './script-tag.js';
import type { FetchLike } from './admin-api.js';
import { ScriptTagInstallFailedError } from './errors.js';

const SHOP = 'test-store.example';
const SRC = 'https://app.example/whatsapp-widget.js?shop=test-store.example';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

describe('widgetLoaderUrl', () => {
  it('points at the loader with the shop', () => {
    expect(widgetLoaderUrl('https://app.example', SHOP)).toBe(SRC);
    expect(widgetLoaderUrl('https://app.example/', SHOP)).toBe(SRC);
  });

  it('keeps the path prefix of the app URL', () => {
    expect(widgetLoaderUrl('https://proxy.example/widget-app', SHOP)).toBe(
      'https://proxy.example/widget-app/whatsapp-widget.js?shop=test-store.example'
    );
  });
});

describe('ScriptTagInstaller', () => {
  const input = { shop: SHOP, accessToken: 'test-access-token', src: SRC };

  it('creates the tag when none matches', async () => {
    const fetch = vi.fn<FetchLike>(async (_url, init) =>
      init?.method === 'POST'
        ? jsonResponse({ script_tag: { id: 2, src: SRC, event: 'onload' } }, 201)
        : jsonResponse({ script_tags: [{ id: 1, src: 'https://other.example/x.js', event: 'onload' }] })
    );
    vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await expect(new ScriptTagInstaller({ fetch }).ensureRegistered(input)).resolves.toBe('created');
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('does nothing when the tag already exists', async () => {
    const fetch = vi.fn<FetchLike>(async () =>
      jsonResponse({ script_tags: [{ id: 1, src: SRC, event: 'onload' }] })
    );

    await expect(new ScriptTagInstaller({ fetch }).ensureRegistered(input)).resolves.toBe('exists');
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('retries once after a failure', async () => {
    const fetch = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(jsonResponse({}, 503))
      .mockResolvedValueOnce(jsonResponse({ script_tags: [{ id: 1, src: SRC, event: 'onload' }] }));
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    await expect(new ScriptTagInstaller({ fetch }).ensureRegistered(input)).resolves.toBe('exists');
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('gives up after the retry', async () => {
    const fetch = vi.fn<FetchLike>(async () => jsonResponse({}, 500));
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const error = await new ScriptTagInstaller({ fetch })
      .ensureRegistered(input)
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ScriptTagInstallFailedError);
    expect(error).toMatchObject({ details: { shop: SHOP, attempts: 2 } });
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('honours a custom retry count', async () => {
    const fetch = vi.fn<FetchLike>(async () => jsonResponse({}, 500));
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    await expect(
      new ScriptTagInstaller({ fetch, retries: 0 }).ensureRegistered(input)
    ).rejects.toBeInstanceOf(ScriptTagInstallFailedError);
    expect(fetch).toHaveBeenCalledTimes(1);
  });
});
