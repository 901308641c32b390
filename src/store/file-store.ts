/**
 * File-backed Installation Store
 *
 * Keeps one JSON document in memory and rewrites it after every mutation
 * (temp file + rename, so a crash never leaves a half-written document).
 * A mutation is applied to a copy of the document, which replaces the
 * in-memory one only once it is on disk. OAuth states are short-lived and
 * stay in process memory.
 */

import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type {
  AnalyticsRecord,
  Clock,
  Installation,
  InstallationInput,
  OAuthState,
  ShopDomain,
  WidgetConfig,
  WidgetConfigInput,
} from '../types.js';
import { systemClock } from '../types.js';
import type { InstallationStore } from './types.js';
import { KeyedMutex } from '../lock.js';
import { normalizeShopDomain, parseShopDomain } from '../shop.js';
import { PersistenceError, UnknownTenantError } from '../errors.js';
import {
  installationInputSchema,
  oauthStateSchema,
  parseInput,
  storeDocumentSchema,
  widgetConfigInputSchema,
  type StoreDocument,
} from './schemas.js';

export interface FileStoreOptions {
  clock?: Clock;
}

function emptyDocument(): StoreDocument {
  return { installations: {}, configs: {}, analytics: {} };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readDocument(filePath: string): Promise<StoreDocument> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      return emptyDocument();
    }
    throw new PersistenceError(`Failed to read store document ${filePath}`, error);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new PersistenceError(`Store document ${filePath} is not valid JSON`, error);
  }

  const parsed = storeDocumentSchema.safeParse(json);
  if (!parsed.success) {
    throw new PersistenceError(`Store document ${filePath} has an invalid layout`, parsed.error);
  }
  return parsed.data;
}

function requireInstallation(document: StoreDocument, shop: ShopDomain): void {
  if (!(shop in document.installations)) {
    throw new UnknownTenantError(shop);
  }
}

export class FileInstallationStore implements InstallationStore {
  readonly backend = 'file' as const;

  private readonly locks = new KeyedMutex();
  private readonly oauthStates = new Map<string, OAuthState>();
  private pendingWrite: Promise<void> = Promise.resolve();
  private closed = false;

  private constructor(
    private readonly filePath: string,
    private document: StoreDocument,
    private readonly clock: Clock
  ) {}

  /**
   * Load the document at `filePath`, starting empty when it does not exist
   */
  static async open(filePath: string, options: FileStoreOptions = {}): Promise<FileInstallationStore> {
    try {
      await mkdir(dirname(filePath), { recursive: true });
    } catch (error) {
      throw new PersistenceError(`Failed to create data directory for ${filePath}`, error);
    }
    const document = await readDocument(filePath);
    return new FileInstallationStore(filePath, document, options.clock ?? systemClock);
  }

  // ===========================================================================
  // INSTALLATIONS
  // ===========================================================================

  async getInstallation(shop: ShopDomain): Promise<Installation | null> {
    const key = parseShopDomain(shop);
    const record = key ? this.document.installations[key] : undefined;
    return record ? { ...record } : null;
  }

  async saveInstallation(input: InstallationInput): Promise<Installation> {
    const { shop, accessToken, scope } = parseInput(installationInputSchema, input);

    return this.mutate(shop, (draft) => {
      const installation: Installation = {
        shop,
        accessToken,
        scope,
        installedAt: this.clock(),
      };
      draft.installations[shop] = installation;
      return { ...installation };
    });
  }

  async deleteInstallation(shop: ShopDomain): Promise<boolean> {
    const key = parseShopDomain(shop);
    if (!key) {
      return false;
    }

    return this.locks.runExclusive(key, async () => {
      this.assertOpen();
      const { installations, configs, analytics } = this.document;
      const existed = key in installations;
      if (!existed && !(key in configs) && !(key in analytics)) {
        return false;
      }

      // Cascade in one write
      await this.commit((draft) => {
        delete draft.installations[key];
        delete draft.configs[key];
        delete draft.analytics[key];
      });
      return existed;
    });
  }

  async listInstallations(): Promise<Installation[]> {
    return Object.values(this.document.installations).map((record) => ({ ...record }));
  }

  // ===========================================================================
  // WIDGET CONFIG
  // ===========================================================================

  async getWidgetConfig(shop: ShopDomain): Promise<WidgetConfig | null> {
    const key = parseShopDomain(shop);
    if (!key || !(key in this.document.installations)) {
      return null;
    }
    const record = this.document.configs[key];
    return record ? { ...record } : null;
  }

  async saveWidgetConfig(shop: ShopDomain, input: WidgetConfigInput): Promise<WidgetConfig> {
    const key = normalizeShopDomain(shop);
    const { contactNumber, initialMessage } = parseInput(widgetConfigInputSchema, input);

    return this.mutate(key, (draft) => {
      requireInstallation(draft, key);
      const config: WidgetConfig = {
        shop: key,
        contactNumber,
        initialMessage,
        updatedAt: this.clock(),
      };
      draft.configs[key] = config;
      return { ...config };
    });
  }

  async deleteWidgetConfig(shop: ShopDomain): Promise<void> {
    const key = parseShopDomain(shop);
    if (!key) {
      return;
    }
    await this.locks.runExclusive(key, async () => {
      if (key in this.document.configs) {
        await this.commit((draft) => {
          delete draft.configs[key];
        });
      }
    });
  }

  // ===========================================================================
  // ANALYTICS
  // ===========================================================================

  async getAnalytics(shop: ShopDomain): Promise<AnalyticsRecord | null> {
    const key = parseShopDomain(shop);
    if (!key || !(key in this.document.installations)) {
      return null;
    }
    const record = this.document.analytics[key];
    return record ? { ...record } : null;
  }

  async recordClick(shop: ShopDomain): Promise<AnalyticsRecord> {
    const key = normalizeShopDomain(shop);

    return this.mutate(key, (draft) => {
      requireInstallation(draft, key);
      const now = this.clock();
      const current = draft.analytics[key];
      const record: AnalyticsRecord = {
        shop: key,
        clickCount: (current?.clickCount ?? 0) + 1,
        firstClickAt: current?.firstClickAt ?? now,
        lastClickAt: now,
      };
      draft.analytics[key] = record;
      return { ...record };
    });
  }

  async deleteAnalytics(shop: ShopDomain): Promise<void> {
    const key = parseShopDomain(shop);
    if (!key) {
      return;
    }
    await this.locks.runExclusive(key, async () => {
      if (key in this.document.analytics) {
        await this.commit((draft) => {
          delete draft.analytics[key];
        });
      }
    });
  }

  // ===========================================================================
  // OAUTH STATE
  // ===========================================================================

  async saveOAuthState(state: OAuthState): Promise<void> {
    const parsed = parseInput(oauthStateSchema, state);
    this.purgeExpiredStates();
    this.oauthStates.set(parsed.nonce, parsed);
  }

  async getOAuthState(nonce: string): Promise<OAuthState | null> {
    const state = this.oauthStates.get(nonce);
    return state ? { ...state } : null;
  }

  async consumeOAuthState(nonce: string): Promise<OAuthState | null> {
    const state = this.oauthStates.get(nonce);
    if (!state) {
      return null;
    }
    this.oauthStates.delete(nonce);
    return state;
  }

  async deleteOAuthState(nonce: string): Promise<void> {
    this.oauthStates.delete(nonce);
  }

  // ===========================================================================
  // LIFECYCLE
  // ===========================================================================

  async close(): Promise<void> {
    this.closed = true;
    await this.pendingWrite;
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  /**
   * Run `change` under the shop's lock against a copy of the document and
   * keep the copy only once it has been written. A failed write leaves the
   * in-memory document as it was.
   */
  private mutate<T>(shop: ShopDomain, change: (draft: StoreDocument) => T): Promise<T> {
    return this.locks.runExclusive(shop, async () => {
      this.assertOpen();
      return this.commit(change);
    });
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new PersistenceError('Store is closed');
    }
  }

  /**
   * Writes never overlap; each one starts from the last committed document
   */
  private commit<T>(change: (draft: StoreDocument) => T): Promise<T> {
    const write = this.pendingWrite.then(async () => {
      const draft = structuredClone(this.document);
      const result = change(draft);
      await this.writeDocument(draft);
      this.document = draft;
      return result;
    });
    this.pendingWrite = write.then(
      () => undefined,
      () => undefined
    );
    return write;
  }

  private async writeDocument(document: StoreDocument): Promise<void> {
    const tempPath = `${this.filePath}.tmp`;
    try {
      await writeFile(tempPath, JSON.stringify(document, null, 2), 'utf8');
      await rename(tempPath, this.filePath);
    } catch (error) {
      console.error(`[Store] Failed to write ${this.filePath}:`, error);
      throw new PersistenceError('Failed to write store document', error);
    }
  }

  private purgeExpiredStates(): void {
    const now = this.clock().getTime();
    for (const [nonce, state] of this.oauthStates) {
      if (state.expiresAt.getTime() <= now) {
        this.oauthStates.delete(nonce);
      }
    }
  }
}
