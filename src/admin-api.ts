/**
 * Admin API Client
 *
 * Outbound calls to a shop's admin API: the OAuth code exchange, the
 * script tag endpoints and the app subscription query. Every call is bounded by a timeout; failures surface
 * as AdminApiError and never include the access token.
 */

import { z } from 'zod';
import type { ShopDomain } from './types.js';
import { SHOPIFY_HEADERS } from './headers.js';
import { AdminApiError } from './errors.js';

export const DEFAULT_API_VERSION = '2024-01';
export const DEFAULT_TIMEOUT_MS = 10_000;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface AdminApiOptions {
  /** Injected for tests (default: global fetch) */
  fetch?: FetchLike;
  apiVersion?: string;
  timeoutMs?: number;
}

export interface AppCredentials {
  apiKey: string;
  apiSecret: string;
}

export interface AccessTokenGrant {
  accessToken: string;
  scope: string;
}

export interface ScriptTag {
  id: number;
  src: string;
  event: string;
}

const accessTokenResponseSchema = z.object({
  access_token: z.string().min(1),
  scope: z.string().default(''),
});

const scriptTagSchema = z.object({
  id: z.number(),
  src: z.string(),
  event: z.string().default('onload'),
});

const scriptTagListSchema = z.object({
  script_tags: z.array(scriptTagSchema),
});

const scriptTagResponseSchema = z.object({
  script_tag: scriptTagSchema,
});

/** Subscription states that grant access to the app */
const ENTITLED_SUBSCRIPTION_STATUSES = new Set(['ACTIVE', 'TRIAL']);

const ACTIVE_SUBSCRIPTIONS_QUERY = `query {
  currentAppInstallation {
    activeSubscriptions {
      id
      status
    }
  }
}`;

const activeSubscriptionsResponseSchema = z.object({
  data: z.object({
    currentAppInstallation: z.object({
      activeSubscriptions: z.array(z.object({ id: z.string(), status: z.string() })),
    }),
  }),
});

// =============================================================================
// TRANSPORT
// =============================================================================

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

/**
 * Perform one request and validate its JSON body against `schema`
 */
async function requestJson<S extends z.ZodTypeAny>(
  operation: string,
  url: string,
  init: RequestInit,
  schema: S,
  options: AdminApiOptions
): Promise<z.output<S>> {
  const fetchImpl = options.fetch ?? fetch;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  let response: Response;
  try {
    response = await fetchImpl(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    throw new AdminApiError(operation, isTimeout(error) ? 'timeout' : 'network', undefined, error);
  }

  if (!response.ok) {
    throw new AdminApiError(operation, 'http_status', response.status);
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new AdminApiError(operation, 'invalid_response', response.status, error);
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new AdminApiError(operation, 'invalid_response', response.status, parsed.error);
  }
  return parsed.data;
}

// =============================================================================
// OAUTH
// =============================================================================

/**
 * Build the authorization URL the merchant is redirected to on install
 */
export function buildAuthorizeUrl(
  shop: ShopDomain,
  params: { apiKey: string; scopes: string[]; redirectUri: string; state: string }
): string {
  const query = new URLSearchParams({
    client_id: params.apiKey,
    scope: params.scopes.join(','),
    redirect_uri: params.redirectUri,
    state: params.state,
  });
  return `https://${shop}/admin/oauth/authorize?${query.toString()}`;
}

/**
 * Exchange authorization code for an offline access token
 */
export async function exchangeCodeForToken(
  shop: ShopDomain,
  code: string,
  credentials: AppCredentials,
  options: AdminApiOptions = {}
): Promise<AccessTokenGrant> {
  const data = await requestJson(
    'token exchange',
    `https://${shop}/admin/oauth/access_token`,
    {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
      body: JSON.stringify({
        client_id: credentials.apiKey,
        client_secret: credentials.apiSecret,
        code,
      }),
    },
    accessTokenResponseSchema,
    options
  );

  return { accessToken: data.access_token, scope: data.scope };
}

// =============================================================================
// ADMIN CLIENT
// =============================================================================

/**
 * Authenticated client for one shop's admin REST API
 */
export class AdminApiClient {
  constructor(
    private readonly shop: ShopDomain,
    private readonly accessToken: string,
    private readonly options: AdminApiOptions = {}
  ) {}

  private get baseUrl(): string {
    const apiVersion = this.options.apiVersion ?? DEFAULT_API_VERSION;
    return `https://${this.shop}/admin/api/${apiVersion}`;
  }

  private request<S extends z.ZodTypeAny>(
    operation: string,
    endpoint: string,
    schema: S,
    init: RequestInit = {}
  ): Promise<z.output<S>> {
    return requestJson(
      operation,
      `${this.baseUrl}${endpoint}`,
      {
        ...init,
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
          [SHOPIFY_HEADERS.ACCESS_TOKEN]: this.accessToken,
        },
      },
      schema,
      this.options
    );
  }

  async listScriptTags(): Promise<ScriptTag[]> {
    const data = await this.request('list script tags', '/script_tags.json', scriptTagListSchema);
    return data.script_tags;
  }

  async createScriptTag(src: string, event = 'onload'): Promise<ScriptTag> {
    const data = await this.request('create script tag', '/script_tags.json', scriptTagResponseSchema, {
      method: 'POST',
      body: JSON.stringify({ script_tag: { event, src } }),
    });
    return data.script_tag;
  }

  /**
   * Whether the app has an active or trial subscription on this shop
   */
  async hasActiveSubscription(): Promise<boolean> {
    const data = await this.request(
      'active subscriptions',
      '/graphql.json',
      activeSubscriptionsResponseSchema,
      { method: 'POST', body: JSON.stringify({ query: ACTIVE_SUBSCRIPTIONS_QUERY }) }
    );
    return data.data.currentAppInstallation.activeSubscriptions.some((subscription) =>
      ENTITLED_SUBSCRIPTION_STATUSES.has(subscription.status)
    );
  }
}
