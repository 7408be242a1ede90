/**
 * Coordinate backfill for catalog entries still missing a position, either
 * from a geocoder or from a CSV of known coordinates keyed by content hash.
 *
 * Coordinates are fill-once here as in merges: a value already stored is
 * never replaced.
 */

import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { CatalogEntry, CatalogPatch } from '@pub-catalog/shared';
import { acquireBatchLock, type BatchLock, type LockHandle } from '../batchLock.js';
import type { CatalogStore } from '../catalogStore.js';
import { LoadError, describeError } from '../errors.js';
import type { Geocoder } from '../geocoding.js';
import { logger as rootLogger, type Logger } from '../logger.js';

type Positioned = Pick<CatalogEntry, 'latitude' | 'longitude'>;

export function needsCoordinates(entry: Positioned): boolean {
  return entry.latitude === null || entry.longitude === null;
}

/**
 * Patch setting only the coordinates that are still empty
 */
export function fillCoordinates(entry: Positioned, latitude: number, longitude: number): CatalogPatch {
  const patch: CatalogPatch = {};
  if (entry.latitude === null) patch.latitude = latitude;
  if (entry.longitude === null) patch.longitude = longitude;
  return patch;
}

export interface CoordinateRunOptions {
  /** Report what would be written without writing it */
  dryRun?: boolean;
  lock?: BatchLock;
  logger?: Logger;
}

async function withCatalog<T>(
  store: CatalogStore,
  options: CoordinateRunOptions,
  run: (snapshot: CatalogEntry[]) => Promise<T>
): Promise<T> {
  const handle: LockHandle | null = options.lock ? await acquireBatchLock(options.lock) : null;
  try {
    let snapshot: CatalogEntry[];
    try {
      snapshot = await store.loadAll();
    } catch (error) {
      throw new LoadError(`Failed to load catalog snapshot: ${describeError(error)}`, { cause: error });
    }
    return await run(snapshot);
  } finally {
    await handle?.release();
  }
}

function venueLabel(entry: CatalogEntry): string {
  return `${entry.name || '(unnamed)'}, Address: ${entry.address || '(none)'}`;
}

// ============================================
// GEOCODING
// ============================================

export interface GeocodeBackfillOptions extends CoordinateRunOptions {
  /** At most this many entries per run */
  limit?: number;
  signal?: AbortSignal;
}

export interface GeocodeBackfillReport {
  processed: number;
  geocoded: number;
  failed: number;
  skipped: number;
  aborted: boolean;
  lines: string[];
}

/**
 * Geocode "{name}, {address}" for every entry without coordinates,
 * one entry at a time, writing each result as it arrives.
 */
export async function backfillCoordinates(
  store: CatalogStore,
  geocoder: Geocoder,
  options: GeocodeBackfillOptions = {}
): Promise<GeocodeBackfillReport> {
  const log = options.logger ?? rootLogger;

  return withCatalog(store, options, async (snapshot) => {
    const pending = snapshot.filter(needsCoordinates).slice(0, options.limit ?? Number.POSITIVE_INFINITY);
    const report: GeocodeBackfillReport = {
      processed: 0,
      geocoded: 0,
      failed: 0,
      skipped: 0,
      aborted: false,
      lines: [],
    };

    for (const entry of pending) {
      if (options.signal?.aborted) {
        report.aborted = true;
        report.lines.push(`Aborted with ${pending.length - report.processed} entries left`);
        break;
      }
      report.processed += 1;

      if (!entry.address.trim()) {
        report.skipped += 1;
        report.lines.push(`Skipped (no address): ${entry.name || '(unnamed)'}`);
        continue;
      }

      const result = await geocoder.geocode(`${entry.name}, ${entry.address}`);
      if (!result) {
        report.failed += 1;
        report.lines.push(`Failed to geocode: ${venueLabel(entry)}`);
        continue;
      }

      const patch = fillCoordinates(entry, result.lat, result.lng);
      try {
        if (!options.dryRun) {
          await store.update(entry.catalogId, patch);
        }
        report.geocoded += 1;
        report.lines.push(
          `Geocoded ${entry.catalogId}: ${entry.name} ` +
            `(${patch.latitude ?? entry.latitude}, ${patch.longitude ?? entry.longitude})`
        );
      } catch (error) {
        report.failed += 1;
        report.lines.push(`Error: ${entry.catalogId}: ${describeError(error)}`);
        log.error('Coordinate update failed', { catalog_id: entry.catalogId, error: describeError(error) });
      }
    }

    log.info('Geocoding backfill finished', {
      processed: report.processed,
      geocoded: report.geocoded,
      failed: report.failed,
      skipped: report.skipped,
      dry_run: options.dryRun ?? false,
    });
    return report;
  });
}

// ============================================
// CSV IMPORT
// ============================================

export interface CoordinateRow {
  contentHash: string;
  latitude: number;
  longitude: number;
}

export interface CoordinateCsv {
  rows: CoordinateRow[];
  warnings: string[];
}

const HASH_COLUMNS = ['custom_pub_id', 'content_hash', 'contentHash'] as const;

const csvRecordsSchema = z.array(z.record(z.string()));

function parseCoordinate(value: string, limit: number): number | null {
  if (!/^-?\d+(\.\d+)?$/.test(value)) return null;
  const parsed = Number(value);
  return Math.abs(parsed) <= limit ? parsed : null;
}

/**
 * Read "custom_pub_id,latitude,longitude" CSV (content_hash is accepted for
 * the id column). Rows with missing or invalid coordinates become warnings.
 */
export function parseCoordinateCsv(text: string): CoordinateCsv {
  let records: z.infer<typeof csvRecordsSchema>;
  try {
    const parsed: unknown = parse(text, { columns: true, skip_empty_lines: true, trim: true, bom: true });
    records = csvRecordsSchema.parse(parsed);
  } catch (error) {
    throw new LoadError(`Coordinate CSV is unreadable: ${describeError(error)}`, { cause: error });
  }

  const rows: CoordinateRow[] = [];
  const warnings: string[] = [];
  records.forEach((record, i) => {
    const contentHash = HASH_COLUMNS.map((column) => record[column]).find((value) => value) ?? '';
    if (!contentHash) {
      warnings.push(`Skipping row ${i + 1}: no custom_pub_id`);
      return;
    }
    const rawLatitude = record.latitude ?? '';
    const rawLongitude = record.longitude ?? '';
    if (!rawLatitude || !rawLongitude) {
      warnings.push(`Skipping ${contentHash}: missing coordinates`);
      return;
    }
    const latitude = parseCoordinate(rawLatitude, 90);
    const longitude = parseCoordinate(rawLongitude, 180);
    if (latitude === null || longitude === null) {
      warnings.push(`Skipping ${contentHash}: invalid coordinates`);
      return;
    }
    rows.push({ contentHash, latitude, longitude });
  });

  return { rows, warnings };
}

export interface CoordinateImportReport {
  rows: number;
  updated: number;
  unchanged: number;
  unmatched: number;
  failed: number;
  lines: string[];
}

/**
 * Apply known coordinates to every entry with the row's content hash
 */
export async function importCoordinates(
  store: CatalogStore,
  rows: CoordinateRow[],
  options: CoordinateRunOptions = {}
): Promise<CoordinateImportReport> {
  const log = options.logger ?? rootLogger;

  return withCatalog(store, options, async (snapshot) => {
    const byHash = new Map<string, CatalogEntry[]>();
    for (const entry of snapshot) {
      const owners = byHash.get(entry.contentHash) ?? [];
      owners.push(entry);
      byHash.set(entry.contentHash, owners);
    }

    const report: CoordinateImportReport = {
      rows: rows.length,
      updated: 0,
      unchanged: 0,
      unmatched: 0,
      failed: 0,
      lines: [],
    };

    for (const row of rows) {
      const entries = byHash.get(row.contentHash);
      if (!entries) {
        report.unmatched += 1;
        report.lines.push(`No catalog entry for ${row.contentHash}`);
        continue;
      }

      for (const entry of entries) {
        const patch = fillCoordinates(entry, row.latitude, row.longitude);
        if (Object.keys(patch).length === 0) {
          report.unchanged += 1;
          continue;
        }
        try {
          if (!options.dryRun) {
            await store.update(entry.catalogId, patch);
          }
          // Later rows for the same hash see this entry as positioned
          Object.assign(entry, patch);
          report.updated += 1;
          report.lines.push(`Located ${entry.catalogId}: ${entry.name} (${row.latitude}, ${row.longitude})`);
        } catch (error) {
          report.failed += 1;
          report.lines.push(`Error: ${entry.catalogId}: ${describeError(error)}`);
          log.error('Coordinate update failed', { catalog_id: entry.catalogId, error: describeError(error) });
        }
      }
    }

    log.info('Coordinate import finished', {
      rows: report.rows,
      updated: report.updated,
      unmatched: report.unmatched,
      failed: report.failed,
      dry_run: options.dryRun ?? false,
    });
    return report;
  });
}
