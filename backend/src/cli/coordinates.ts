/**
 * venue-coordinates: fill in missing catalog coordinates.
 *
 * Usage:
 *   venue-coordinates geocode [--limit <n>] [--dry-run]
 *   venue-coordinates import-csv <file> [--dry-run]
 *
 * Both take --store <kind> and --catalog <path> like venue-import.
 * Coordinates already stored are never overwritten.
 */

import { readFile } from 'fs/promises';
import { Command, InvalidArgumentError, Option } from 'commander';
import { createCatalogStore, createGeocoder, getBatchLock, type StoreKind } from '../lib/catalog.js';
import type { CatalogStore } from '../lib/catalogStore.js';
import { getConfig } from '../lib/config.js';
import { LoadError, describeError } from '../lib/errors.js';
import type { Geocoder } from '../lib/geocoding.js';
import { logger } from '../lib/logger.js';
import { closeRedis } from '../lib/redis.js';
import {
  backfillCoordinates,
  importCoordinates,
  parseCoordinateCsv,
  type CoordinateImportReport,
  type GeocodeBackfillReport,
} from '../lib/venues/coordinates.js';

interface StoreCommandOptions {
  readonly store?: StoreKind;
  readonly catalog?: string;
  readonly dryRun?: boolean;
}

export interface GeocodeCommandOptions extends StoreCommandOptions {
  readonly limit?: number;
}

export type CoordinateImportCommandOptions = StoreCommandOptions;

export interface CoordinateDependencies {
  store?: CatalogStore;
  geocoder?: Geocoder;
  signal?: AbortSignal;
  print?: (line: string) => void;
}

function openStore(options: StoreCommandOptions, deps: CoordinateDependencies): Promise<CatalogStore> {
  if (deps.store) return Promise.resolve(deps.store);
  return createCatalogStore({ kind: options.store ?? getConfig().CATALOG_STORE, catalogFile: options.catalog });
}

export async function runGeocode(
  options: GeocodeCommandOptions,
  deps: CoordinateDependencies = {}
): Promise<GeocodeBackfillReport> {
  const print = deps.print ?? ((line: string) => console.log(line));
  const store = await openStore(options, deps);

  const report = await backfillCoordinates(store, deps.geocoder ?? createGeocoder(), {
    limit: options.limit,
    dryRun: options.dryRun ?? false,
    signal: deps.signal,
    lock: getBatchLock(),
  });

  for (const line of report.lines) {
    print(line);
  }
  print(
    `${report.processed} entries: ${report.geocoded} geocoded, ${report.failed} failed, ${report.skipped} skipped`
  );
  return report;
}

export async function runCoordinateImport(
  file: string,
  options: CoordinateImportCommandOptions,
  deps: CoordinateDependencies = {}
): Promise<CoordinateImportReport> {
  const print = deps.print ?? ((line: string) => console.log(line));
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (error) {
    throw new LoadError(`Cannot read coordinate file ${file}: ${describeError(error)}`, { cause: error });
  }
  const { rows, warnings } = parseCoordinateCsv(text);
  const store = await openStore(options, deps);

  const report = await importCoordinates(store, rows, {
    dryRun: options.dryRun ?? false,
    lock: getBatchLock(),
  });

  for (const line of [...warnings, ...report.lines]) {
    print(line);
  }
  print(
    `${report.rows} rows: ${report.updated} updated, ${report.unchanged} unchanged, ` +
      `${report.unmatched} unmatched, ${report.failed} failed`
  );
  return report;
}

function positiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return parsed;
}

function storeOptions(command: Command): Command {
  return command
    .option('--dry-run', 'report without writing to the catalog')
    .addOption(new Option('--store <kind>', 'catalog store').choices(['memory', 'file', 'supabase']))
    .option('--catalog <path>', 'catalog file for --store file');
}

export function buildCoordinatesProgram(): Command {
  const program = new Command();
  program.name('venue-coordinates').description('Fill in missing venue coordinates');

  storeOptions(
    program
      .command('geocode')
      .description('geocode entries that have no coordinates yet')
      .option('--limit <n>', 'at most this many entries', positiveInteger)
  ).action(async (options: GeocodeCommandOptions) => {
    const controller = new AbortController();
    const onInterrupt = () => {
      logger.warn('Interrupt received, stopping after the current entry');
      controller.abort();
    };
    process.once('SIGINT', onInterrupt);

    try {
      const report = await runGeocode(options, { signal: controller.signal });
      if (report.aborted) process.exitCode = 130;
      else if (report.failed > 0) process.exitCode = 2;
    } finally {
      process.off('SIGINT', onInterrupt);
      await closeRedis();
    }
  });

  storeOptions(
    program
      .command('import-csv')
      .description('load known coordinates from a CSV keyed by custom_pub_id')
      .argument('<file>', 'CSV with custom_pub_id, latitude and longitude columns')
  ).action(async (file: string, options: CoordinateImportCommandOptions) => {
    try {
      const report = await runCoordinateImport(file, options);
      if (report.failed > 0) process.exitCode = 2;
    } finally {
      await closeRedis();
    }
  });

  return program;
}
