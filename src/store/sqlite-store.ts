/**
 * SQLite Installation Store
 *
 * Relational backend on better-sqlite3 through drizzle. better-sqlite3 runs
 * each transaction synchronously, so a transaction is the per-shop
 * serialization primitive: nothing else touches the database while one runs.
 */

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { asc, eq, lte, sql } from 'drizzle-orm';
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
import { normalizeShopDomain, parseShopDomain } from '../shop.js';
import { AppError, PersistenceError, UnknownTenantError } from '../errors.js';
import {
  installationInputSchema,
  oauthStateSchema,
  parseInput,
  widgetConfigInputSchema,
} from './schemas.js';
import {
  CREATE_TABLES_SQL,
  analytics,
  installations,
  oauthStates,
  widgetConfigs,
} from './tables.js';

export interface SqliteStoreOptions {
  clock?: Clock;
}

export class SqliteInstallationStore implements InstallationStore {
  readonly backend = 'sqlite' as const;

  private constructor(
    private readonly sqlite: Database.Database,
    private readonly db: BetterSQLite3Database,
    private readonly clock: Clock
  ) {}

  /**
   * Open (or create) the database at `filename`; ":memory:" is accepted
   */
  static open(filename: string, options: SqliteStoreOptions = {}): SqliteInstallationStore {
    try {
      const sqlite = new Database(filename);
      if (filename !== ':memory:') {
        sqlite.pragma('journal_mode = WAL');
      }
      sqlite.pragma('foreign_keys = ON');
      sqlite.exec(CREATE_TABLES_SQL);
      return new SqliteInstallationStore(sqlite, drizzle(sqlite), options.clock ?? systemClock);
    } catch (error) {
      throw new PersistenceError(`Failed to open database ${filename}`, error);
    }
  }

  // ===========================================================================
  // INSTALLATIONS
  // ===========================================================================

  async getInstallation(shop: ShopDomain): Promise<Installation | null> {
    const key = parseShopDomain(shop);
    if (!key) {
      return null;
    }
    return this.run('read installation', () => {
      const row = this.db.select().from(installations).where(eq(installations.shop, key)).get();
      return row ?? null;
    });
  }

  async saveInstallation(input: InstallationInput): Promise<Installation> {
    const { shop, accessToken, scope } = parseInput(installationInputSchema, input);
    const installedAt = this.clock();

    return this.run('save installation', () => {
      const row = this.db
        .insert(installations)
        .values({ shop, accessToken, scope, installedAt })
        .onConflictDoUpdate({
          target: installations.shop,
          set: { accessToken, scope, installedAt },
        })
        .returning()
        .get();
      if (!row) {
        throw new PersistenceError('Installation upsert returned no row');
      }
      return row;
    });
  }

  async deleteInstallation(shop: ShopDomain): Promise<boolean> {
    const key = parseShopDomain(shop);
    if (!key) {
      return false;
    }

    return this.run('delete installation', () =>
      this.db.transaction((tx) => {
        tx.delete(widgetConfigs).where(eq(widgetConfigs.shop, key)).run();
        tx.delete(analytics).where(eq(analytics.shop, key)).run();
        const result = tx.delete(installations).where(eq(installations.shop, key)).run();
        return result.changes > 0;
      })
    );
  }

  async listInstallations(): Promise<Installation[]> {
    return this.run('list installations', () =>
      this.db.select().from(installations).orderBy(asc(installations.shop)).all()
    );
  }

  // ===========================================================================
  // WIDGET CONFIG
  // ===========================================================================

  async getWidgetConfig(shop: ShopDomain): Promise<WidgetConfig | null> {
    const key = parseShopDomain(shop);
    if (!key) {
      return null;
    }
    return this.run('read widget config', () => {
      const row = this.db.select().from(widgetConfigs).where(eq(widgetConfigs.shop, key)).get();
      return row ?? null;
    });
  }

  async saveWidgetConfig(shop: ShopDomain, input: WidgetConfigInput): Promise<WidgetConfig> {
    const key = normalizeShopDomain(shop);
    const { contactNumber, initialMessage } = parseInput(widgetConfigInputSchema, input);
    const updatedAt = this.clock();

    return this.run('save widget config', () =>
      this.db.transaction((tx) => {
        this.requireInstallation(tx, key);
        const row = tx
          .insert(widgetConfigs)
          .values({ shop: key, contactNumber, initialMessage, updatedAt })
          .onConflictDoUpdate({
            target: widgetConfigs.shop,
            set: { contactNumber, initialMessage, updatedAt },
          })
          .returning()
          .get();
        if (!row) {
          throw new PersistenceError('Widget config upsert returned no row');
        }
        return row;
      })
    );
  }

  async deleteWidgetConfig(shop: ShopDomain): Promise<void> {
    const key = parseShopDomain(shop);
    if (!key) {
      return;
    }
    this.run('delete widget config', () => {
      this.db.delete(widgetConfigs).where(eq(widgetConfigs.shop, key)).run();
    });
  }

  // ===========================================================================
  // ANALYTICS
  // ===========================================================================

  async getAnalytics(shop: ShopDomain): Promise<AnalyticsRecord | null> {
    const key = parseShopDomain(shop);
    if (!key) {
      return null;
    }
    return this.run('read analytics', () => {
      const row = this.db.select().from(analytics).where(eq(analytics.shop, key)).get();
      return row ?? null;
    });
  }

  async recordClick(shop: ShopDomain): Promise<AnalyticsRecord> {
    const key = normalizeShopDomain(shop);
    const now = this.clock();

    return this.run('record click', () =>
      this.db.transaction((tx) => {
        this.requireInstallation(tx, key);
        const row = tx
          .insert(analytics)
          .values({ shop: key, clickCount: 1, firstClickAt: now, lastClickAt: now })
          .onConflictDoUpdate({
            target: analytics.shop,
            set: {
              clickCount: sql`${analytics.clickCount} + 1`,
              firstClickAt: sql`coalesce(${analytics.firstClickAt}, ${now.getTime()})`,
              lastClickAt: now,
            },
          })
          .returning()
          .get();
        if (!row) {
          throw new PersistenceError('Click increment returned no row');
        }
        return row;
      })
    );
  }

  async deleteAnalytics(shop: ShopDomain): Promise<void> {
    const key = parseShopDomain(shop);
    if (!key) {
      return;
    }
    this.run('delete analytics', () => {
      this.db.delete(analytics).where(eq(analytics.shop, key)).run();
    });
  }

  // ===========================================================================
  // OAUTH STATE
  // ===========================================================================

  async saveOAuthState(state: OAuthState): Promise<void> {
    const { nonce, shop, issuedAt, expiresAt } = parseInput(oauthStateSchema, state);
    const now = this.clock();

    this.run('save oauth state', () => {
      this.db.transaction((tx) => {
        tx.delete(oauthStates).where(lte(oauthStates.expiresAt, now)).run();
        tx.insert(oauthStates).values({ nonce, shop, issuedAt, expiresAt }).run();
      });
    });
  }

  async getOAuthState(nonce: string): Promise<OAuthState | null> {
    return this.run('read oauth state', () => {
      const row = this.db.select().from(oauthStates).where(eq(oauthStates.nonce, nonce)).get();
      return row ?? null;
    });
  }

  async consumeOAuthState(nonce: string): Promise<OAuthState | null> {
    return this.run('consume oauth state', () => {
      const row = this.db
        .delete(oauthStates)
        .where(eq(oauthStates.nonce, nonce))
        .returning()
        .get();
      return row ?? null;
    });
  }

  async deleteOAuthState(nonce: string): Promise<void> {
    this.run('delete oauth state', () => {
      this.db.delete(oauthStates).where(eq(oauthStates.nonce, nonce)).run();
    });
  }

  // ===========================================================================
  // LIFECYCLE
  // ===========================================================================

  async close(): Promise<void> {
    if (this.sqlite.open) {
      this.sqlite.close();
    }
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private requireInstallation(
    tx: Pick<BetterSQLite3Database, 'select'>,
    shop: ShopDomain
  ): void {
    const row = tx
      .select({ shop: installations.shop })
      .from(installations)
      .where(eq(installations.shop, shop))
      .get();
    if (!row) {
      throw new UnknownTenantError(shop);
    }
  }

  /**
   * Run a database operation, wrapping driver failures in PersistenceError
   */
  private run<T>(operation: string, task: () => T): T {
    try {
      return task();
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      console.error(`[Store] Failed to ${operation}:`, error);
      throw new PersistenceError(`Failed to ${operation}`, error);
    }
  }
}
