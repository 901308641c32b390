/**
 * Environment Configuration
 *
 * Reads and validates process environment once at startup.
 */

import { z } from 'zod';
import type { StoreBackend } from './store/types.js';
import { ConfigError } from './errors.js';
import { DEFAULT_API_VERSION, DEFAULT_TIMEOUT_MS } from './admin-api.js';

export interface AppConfig {
  shopify: {
    /** App client id */
    apiKey: string;
    /** App client secret: signs session tokens, webhooks and launch URLs */
    apiSecret: string;
    scopes: string[];
    apiVersion: string;
  };
  /** Externally reachable base URL */
  appUrl: string;
  port: number;
  store: {
    backend: StoreBackend;
    dataDir: string;
  };
  outboundTimeoutMs: number;
  billing: {
    /** App handle in the platform admin, used for the plan selection page */
    appHandle: string;
    /** Send shops without an active subscription to plan selection */
    requireSubscription: boolean;
  };
  /**
   * Accept `?shop=` instead of a session token for installed shops.
   * Development only; refused when NODE_ENV is production.
   */
  allowDevShopParam: boolean;
  nodeEnv: string;
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0', ''])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  SHOPIFY_API_KEY: z.string().min(1, 'is required'),
  SHOPIFY_API_SECRET: z.string().min(1, 'is required'),
  SHOPIFY_SCOPES: z.string().default('read_script_tags,write_script_tags'),
  SHOPIFY_API_VERSION: z.string().default(DEFAULT_API_VERSION),
  APP_URL: z.string().url().default('http://localhost:8000'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  DB_BACKEND: z.enum(['file', 'sqlite']).default('file'),
  DATA_DIR: z.string().min(1).default('./data'),
  OUTBOUND_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  APP_HANDLE: z.string().min(1).optional(),
  REQUIRE_SUBSCRIPTION: booleanFlag,
  ALLOW_DEV_SHOP_PARAM: booleanFlag,
  NODE_ENV: z.string().default('development'),
});

/**
 * Build the app configuration from environment variables
 *
 * @throws ConfigError listing every invalid or missing variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`)
    );
  }

  const vars = parsed.data;

  if (vars.ALLOW_DEV_SHOP_PARAM && vars.NODE_ENV === 'production') {
    throw new ConfigError(['ALLOW_DEV_SHOP_PARAM must not be enabled when NODE_ENV is production']);
  }

  return {
    shopify: {
      apiKey: vars.SHOPIFY_API_KEY,
      apiSecret: vars.SHOPIFY_API_SECRET,
      scopes: vars.SHOPIFY_SCOPES.split(',')
        .map((scope) => scope.trim())
        .filter(Boolean),
      apiVersion: vars.SHOPIFY_API_VERSION,
    },
    appUrl: vars.APP_URL.replace(/\/+$/, ''),
    port: vars.PORT,
    store: {
      backend: vars.DB_BACKEND,
      dataDir: vars.DATA_DIR,
    },
    outboundTimeoutMs: vars.OUTBOUND_TIMEOUT_MS,
    billing: {
      appHandle: vars.APP_HANDLE ?? vars.SHOPIFY_API_KEY,
      requireSubscription: vars.REQUIRE_SUBSCRIPTION,
    },
    allowDevShopParam: vars.ALLOW_DEV_SHOP_PARAM,
    nodeEnv: vars.NODE_ENV,
  };
}

/**
 * Absolute URL of a route on this app, keeping any path prefix of `appUrl`
 */
export function appEndpoint(appUrl: string, path: string): URL {
  return new URL(`${appUrl.replace(/\/+$/, '')}${path}`);
}
