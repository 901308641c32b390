/**
 * Widget Configuration
 *
 * Saving a configuration is two independent steps: the store write, whose
 * failure fails the save, and the loader registration, whose failure only
 * downgrades the result.
 */

import type { ShopDomain, WidgetConfig, WidgetConfigInput } from './types.js';
import type { InstallationStore } from './store/types.js';
import { ScriptTagInstaller, widgetLoaderUrl, type ScriptTagOutcome } from './script-tag.js';
import { UnknownTenantError, isAppError } from './errors.js';

export type WidgetRegistrationStatus = ScriptTagOutcome | 'failed';

export interface SaveWidgetConfigResult {
  status: 'saved' | 'saved_with_warnings';
  config: WidgetConfig;
  widgetRegistration: WidgetRegistrationStatus;
  warning?: string;
}

export interface WidgetConfigServiceOptions {
  store: InstallationStore;
  scriptTags: ScriptTagInstaller;
  appUrl: string;
}

/**
 * Public widget settings, as served to storefront pages
 */
export interface PublicWidgetSettings {
  contactNumber: string;
  initialMessage: string;
}

export class WidgetConfigService {
  constructor(private readonly options: WidgetConfigServiceOptions) {}

  /**
   * Persist the shop's widget settings, then make sure the loader is registered
   */
  async save(shop: ShopDomain, input: WidgetConfigInput): Promise<SaveWidgetConfigResult> {
    const { store } = this.options;

    const config = await store.saveWidgetConfig(shop, input);

    const installation = await store.getInstallation(shop);
    if (!installation) {
      // Uninstalled between the two steps; the cascade already removed the config.
      throw new UnknownTenantError(shop);
    }

    try {
      const outcome = await this.options.scriptTags.ensureRegistered({
        shop,
        accessToken: installation.accessToken,
        src: widgetLoaderUrl(this.options.appUrl, shop),
      });
      return { status: 'saved', config, widgetRegistration: outcome };
    } catch (error) {
      console.warn(
        `[ScriptTag] Widget registration pending for ${shop}:`,
        isAppError(error) ? error.code : error
      );
      return {
        status: 'saved_with_warnings',
        config,
        widgetRegistration: 'failed',
        warning: 'Configuration saved; widget registration failed and will be retried on the next save',
      };
    }
  }

  async get(shop: ShopDomain): Promise<WidgetConfig | null> {
    return this.options.store.getWidgetConfig(shop);
  }

  /**
   * Settings the storefront loader needs, or null when the shop is not configured
   */
  async publicSettings(shop: ShopDomain): Promise<PublicWidgetSettings | null> {
    const config = await this.options.store.getWidgetConfig(shop);
    if (!config) {
      return null;
    }
    return {
      contactNumber: config.contactNumber.replace(/[+\-\s]/g, ''),
      initialMessage: config.initialMessage,
    };
  }
}
