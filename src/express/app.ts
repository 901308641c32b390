/**
 * HTTP Application
 *
 * Wires the verifiers, the installation flow and the store into Express
 * routes. Built once per process by server.ts, and per test by the HTTP tests.
 */

import express, { type Express, type Request, type Response } from 'express';
import { z } from 'zod';
import type { Clock, ShopDomain } from '../types.js';
import { systemClock } from '../types.js';
import type { AppConfig } from '../config.js';
import type { InstallationStore } from '../store/types.js';
import { parseInput, widgetConfigInputSchema } from '../store/schemas.js';
import { OAuthFlow } from '../oauth.js';
import { ScriptTagInstaller } from '../script-tag.js';
import { WidgetConfigService } from '../widget-config.js';
import { verifyLaunchQuery, verifyWebhookSignature } from '../webhook.js';
import { SHOPIFY_HEADERS, embeddedContentSecurityPolicy } from '../headers.js';
import { parseShopDomain, normalizeShopDomain } from '../shop.js';
import { AppError, InvalidLaunchSignatureError } from '../errors.js';
import {
  asyncHandler,
  errorHandler,
  queryParam,
  requireShop,
  shopSessionMiddleware,
  type ShopRequest,
} from './middleware.js';
import { renderEmbeddedShell } from './embedded.js';
import { adminSubscriptionCheck, planSelectionUrl, type SubscriptionCheck } from '../billing.js';

export interface AppDependencies {
  config: AppConfig;
  store: InstallationStore;
  /** Defaults to a flow built from config (tests inject a stubbed code exchange) */
  oauth?: OAuthFlow;
  /** Defaults to an installer built from config (tests inject a stubbed fetch) */
  scriptTags?: ScriptTagInstaller;
  /** Defaults to the admin API subscription query */
  checkSubscription?: SubscriptionCheck;
  clock?: Clock;
}

const WEBHOOK_BODY_LIMIT = '1mb';

const uninstallPayloadSchema = z.object({
  myshopify_domain: z.string().optional(),
  domain: z.string().optional(),
});

function singleStringQuery(req: Request): Record<string, string> {
  const query: Record<string, string> = {};
  for (const [key, value] of Object.entries(req.query)) {
    if (typeof value === 'string') {
      query[key] = value;
    }
  }
  return query;
}

/**
 * Shop named by an uninstall delivery: the platform header, else the payload
 */
function webhookShop(req: Request, body: Buffer): ShopDomain | null {
  const fromHeader = parseShopDomain(req.get(SHOPIFY_HEADERS.SHOP_DOMAIN));
  if (fromHeader) {
    return fromHeader;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(body.toString('utf8'));
  } catch {
    console.warn('[Webhook] Uninstall payload is not JSON');
    return null;
  }

  const parsed = uninstallPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    return null;
  }
  return parseShopDomain(parsed.data.myshopify_domain) ?? parseShopDomain(parsed.data.domain);
}

function widgetScript(settings: unknown): string {
  // `<` escaped so the literal cannot close an inline script
  const literal = JSON.stringify(settings).replace(/</g, '\\u003c');
  return `window.ContactWidgetConfig = ${literal};\n`;
}

export function createApp(deps: AppDependencies): Express {
  const { config, store } = deps;
  const clock = deps.clock ?? systemClock;
  const { apiKey, apiSecret } = config.shopify;

  const adminApi = {
    apiVersion: config.shopify.apiVersion,
    timeoutMs: config.outboundTimeoutMs,
  };

  const oauth =
    deps.oauth ??
    new OAuthFlow({
      store,
      apiKey,
      apiSecret,
      scopes: config.shopify.scopes,
      appUrl: config.appUrl,
      clock,
      adminApi,
    });

  const widgetConfig = new WidgetConfigService({
    store,
    scriptTags: deps.scriptTags ?? new ScriptTagInstaller(adminApi),
    appUrl: config.appUrl,
  });

  const checkSubscription = deps.checkSubscription ?? adminSubscriptionCheck(adminApi);

  const app = express();
  app.disable('x-powered-by');
  app.set('trust proxy', true);

  // ===========================================================================
  // PUBLIC
  // ===========================================================================

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'healthy', timestamp: clock().toISOString() });
  });

  app.get(
    '/whatsapp-widget.js',
    asyncHandler(async (req, res) => {
      const shop = parseShopDomain(queryParam(req, 'shop'));
      const settings = shop ? await widgetConfig.publicSettings(shop) : null;

      res.type('application/javascript');
      res.setHeader('Cache-Control', 'no-cache');
      res.send(settings ? widgetScript(settings) : '');
    })
  );

  // ===========================================================================
  // INSTALLATION
  // ===========================================================================

  app.get(
    '/install',
    asyncHandler(async (req, res) => {
      const { redirectUrl } = await oauth.begin(queryParam(req, 'shop'));
      res.redirect(302, redirectUrl);
    })
  );

  app.get(
    '/auth/callback',
    asyncHandler(async (req, res) => {
      if (queryParam(req, 'error')) {
        throw new AppError('AUTHORIZATION_DENIED', 'Authorization was declined', 400);
      }

      const installation = await oauth.complete({
        shop: queryParam(req, 'shop'),
        code: queryParam(req, 'code'),
        state: queryParam(req, 'state'),
      });

      res.redirect(302, `https://${installation.shop}/admin/apps/${encodeURIComponent(apiKey)}`);
    })
  );

  app.get(
    '/embedded',
    asyncHandler(async (req, res) => {
      const query = singleStringQuery(req);
      const shop = normalizeShopDomain(query.shop);

      if (!verifyLaunchQuery(query, apiSecret)) {
        throw new InvalidLaunchSignatureError();
      }

      const installation = await store.getInstallation(shop);
      if (!installation) {
        res.redirect(302, `/install?shop=${encodeURIComponent(shop)}`);
        return;
      }

      if (config.billing.requireSubscription && !(await checkSubscription(installation))) {
        res.redirect(302, `/pricing?shop=${encodeURIComponent(shop)}`);
        return;
      }

      res.setHeader('Content-Security-Policy', embeddedContentSecurityPolicy(shop));
      res.type('html').send(renderEmbeddedShell({ apiKey, shop, host: query.host }));
    })
  );

  app.get('/pricing', (req: Request, res: Response) => {
    const shop = normalizeShopDomain(queryParam(req, 'shop'));
    res.redirect(302, planSelectionUrl(shop, config.billing.appHandle));
  });

  app.post(
    '/webhooks/app/uninstalled',
    express.raw({ type: '*/*', limit: WEBHOOK_BODY_LIMIT }),
    asyncHandler(async (req, res) => {
      const body = Buffer.isBuffer(req.body) ? req.body : undefined;
      verifyWebhookSignature(body, req.get(SHOPIFY_HEADERS.HMAC), apiSecret);

      const shop = body ? webhookShop(req, body) : null;
      if (!shop) {
        console.warn(`[Webhook] Uninstall delivery ${req.get(SHOPIFY_HEADERS.WEBHOOK_ID) ?? ''} names no shop`);
        res.json({ success: true });
        return;
      }

      console.log(`[Webhook] ${req.get(SHOPIFY_HEADERS.TOPIC) ?? 'app/uninstalled'} for ${shop}`);
      await oauth.uninstall(shop);
      res.json({ success: true });
    })
  );

  // ===========================================================================
  // SESSION API
  // ===========================================================================

  const api = express.Router();
  // Body parsed only once the session is verified
  api.use(
    shopSessionMiddleware({
      apiKey,
      apiSecret,
      store,
      allowDevShopParam: config.allowDevShopParam,
    })
  );
  api.use(express.json());

  api.get(
    '/config',
    asyncHandler<ShopRequest>(async (req, res) => {
      const shop = requireShop(req);
      const saved = await widgetConfig.get(shop);
      if (!saved) {
        res.json({ configured: false });
        return;
      }
      res.json({
        configured: true,
        shop: saved.shop,
        contactNumber: saved.contactNumber,
        initialMessage: saved.initialMessage,
        updatedAt: saved.updatedAt.toISOString(),
      });
    })
  );

  api.post(
    '/configure-whatsapp',
    asyncHandler<ShopRequest>(async (req, res) => {
      const shop = requireShop(req);
      const input = parseInput(widgetConfigInputSchema, req.body);
      const result = await widgetConfig.save(shop, input);

      res.json({
        success: true,
        status: result.status,
        widgetRegistration: result.widgetRegistration,
        ...(result.warning ? { warning: result.warning } : {}),
        config: {
          contactNumber: result.config.contactNumber,
          initialMessage: result.config.initialMessage,
          updatedAt: result.config.updatedAt.toISOString(),
        },
      });
    })
  );

  api.get(
    '/analytics',
    asyncHandler<ShopRequest>(async (req, res) => {
      const shop = requireShop(req);
      if (!(await store.getInstallation(shop))) {
        res.json({ configured: false });
        return;
      }

      const record = await store.getAnalytics(shop);
      res.json({
        configured: true,
        clickCount: record?.clickCount ?? 0,
        firstClickAt: record?.firstClickAt?.toISOString() ?? null,
        lastClickAt: record?.lastClickAt?.toISOString() ?? null,
      });
    })
  );

  api.post(
    '/widget-click',
    asyncHandler<ShopRequest>(async (req, res) => {
      const record = await store.recordClick(requireShop(req));
      res.json({ success: true, clickCount: record.clickCount });
    })
  );

  app.use('/api', api);

  app.use(errorHandler());

  return app;
}
