/**
 * Wiring of the configured catalog store, batch lock and geocoder.
 * Routes and the CLIs get their instances from here.
 */

import { getConfig, type AppConfig } from './config.js';
import { InMemoryCatalogStore, JsonFileCatalogStore, type CatalogStore } from './catalogStore.js';
import { InProcessBatchLock, RedisBatchLock, type BatchLock } from './batchLock.js';
import { getRedis } from './redis.js';
import { createSupabaseAdmin } from './supabase.js';
import { SupabaseCatalogStore } from './supabaseCatalog.js';
import { describeError } from './errors.js';
import { NominatimGeocoder, type Geocoder } from './geocoding.js';
import { logger } from './logger.js';
import type { ResolverOptions } from './venues/resolver.js';

export type StoreKind = AppConfig['CATALOG_STORE'];

export interface StoreSelection {
  kind: StoreKind;
  catalogFile?: string;
}

export async function createCatalogStore(
  selection: StoreSelection,
  config: AppConfig = getConfig()
): Promise<CatalogStore> {
  switch (selection.kind) {
    case 'memory':
      return new InMemoryCatalogStore();
    case 'file':
      return JsonFileCatalogStore.open(selection.catalogFile ?? config.CATALOG_FILE);
    case 'supabase': {
      if (!config.SUPABASE_URL || !config.SUPABASE_SERVICE_ROLE_KEY) {
        throw new Error('CATALOG_STORE=supabase needs SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY');
      }
      const client = createSupabaseAdmin({
        url: config.SUPABASE_URL,
        serviceRoleKey: config.SUPABASE_SERVICE_ROLE_KEY,
      });
      return new SupabaseCatalogStore(client, config.SUPABASE_CATALOG_TABLE);
    }
  }
}

let storePromise: Promise<CatalogStore> | null = null;

/**
 * Shared store for the HTTP service, created on first use.
 * A failed attempt is not cached; the next call tries again.
 */
export function getCatalogStore(): Promise<CatalogStore> {
  if (!storePromise) {
    const config = getConfig();
    storePromise = createCatalogStore({ kind: config.CATALOG_STORE }, config).catch((error: unknown) => {
      storePromise = null;
      logger.error('Catalog store unavailable', {
        store: config.CATALOG_STORE,
        error: describeError(error),
      });
      throw error;
    });
    logger.info('Catalog store selected', { store: config.CATALOG_STORE });
  }
  return storePromise;
}

let batchLock: BatchLock | null = null;

/**
 * Redis lock when REDIS_URL is set, otherwise a lock local to this process
 */
export function getBatchLock(): BatchLock {
  if (!batchLock) {
    const redis = getRedis();
    batchLock = redis
      ? new RedisBatchLock(redis, getConfig().BATCH_LOCK_TTL_MS)
      : new InProcessBatchLock();
  }
  return batchLock;
}

export function getResolverOptions(config: AppConfig = getConfig()): ResolverOptions {
  return {
    autoMatchThreshold: config.FUZZY_AUTO_MATCH_THRESHOLD,
    ambiguousLowerBound: config.FUZZY_AMBIGUOUS_LOWER_BOUND,
    maxCandidates: config.FUZZY_MAX_CANDIDATES,
  };
}

export function createGeocoder(config: AppConfig = getConfig()): Geocoder {
  return new NominatimGeocoder({
    baseUrl: config.GEOCODER_URL,
    userAgent: config.GEOCODER_USER_AGENT,
    countryCodes: config.GEOCODER_COUNTRY_CODES,
    minIntervalMs: config.GEOCODER_MIN_INTERVAL_MS,
  });
}
