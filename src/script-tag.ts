/**
 * Script Tag Installer
 *
 * Makes sure the widget loader is registered exactly once on a shop's
 * storefront. Registration is best-effort: callers downgrade the final
 * ScriptTagInstallFailedError to a warning.
 */

import type { ShopDomain } from './types.js';
import { AdminApiClient, type AdminApiOptions } from './admin-api.js';
import { ScriptTagInstallFailedError } from './errors.js';
import { appEndpoint } from './config.js';

export type ScriptTagOutcome = 'created' | 'exists';

export interface ScriptTagInstallerOptions extends AdminApiOptions {
  /** Extra attempts after the first failure (default: 1) */
  retries?: number;
}

export interface EnsureScriptTagInput {
  shop: ShopDomain;
  accessToken: string;
  /** Loader URL, compared exactly against existing registrations */
  src: string;
}

/**
 * Widget loader URL for a shop
 */
export function widgetLoaderUrl(appUrl: string, shop: ShopDomain): string {
  const url = appEndpoint(appUrl, '/whatsapp-widget.js');
  url.searchParams.set('shop', shop);
  return url.toString();
}

export class ScriptTagInstaller {
  private readonly retries: number;

  constructor(private readonly options: ScriptTagInstallerOptions = {}) {
    this.retries = Math.max(0, options.retries ?? 1);
  }

  /**
   * Register `src` unless a script tag with the same URL already exists
   */
  async ensureRegistered(input: EnsureScriptTagInput): Promise<ScriptTagOutcome> {
    const attempts = this.retries + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        return await this.registerOnce(input);
      } catch (error) {
        lastError = error;
        console.warn(
          `[ScriptTag] Attempt ${attempt}/${attempts} failed for ${input.shop}:`,
          error instanceof Error ? error.message : error
        );
      }
    }

    throw new ScriptTagInstallFailedError(input.shop, attempts, lastError);
  }

  private async registerOnce({ shop, accessToken, src }: EnsureScriptTagInput): Promise<ScriptTagOutcome> {
    const client = new AdminApiClient(shop, accessToken, this.options);

    const existing = await client.listScriptTags();
    if (existing.some((tag) => tag.src === src)) {
      return 'exists';
    }

    const created = await client.createScriptTag(src);
    console.log(`[ScriptTag] Registered widget loader for ${shop} -> ${created.id}`);
    return 'created';
  }
}
