/**
 * venue-import: reconcile a scraped JSON batch against the catalog.
 *
 * Usage:
 *   venue-import <file> [options]
 *
 * Options:
 *   --mode <mode>       update (default) or fresh_import
 *   --interactive       Ask at the terminal about ambiguous matches
 *   --dry-run           Resolve and report without writing
 *   --store <kind>      memory, file or supabase (default: CATALOG_STORE)
 *   --catalog <path>    Catalog file for --store file
 *   --log-dir <dir>     Where the run log goes (default: LOG_DIR)
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { Command, Option } from 'commander';
import type { ImportMode } from '@pub-catalog/shared';
import { createCatalogStore, getBatchLock, getResolverOptions, type StoreKind } from '../lib/catalog.js';
import type { CatalogStore } from '../lib/catalogStore.js';
import { getConfig } from '../lib/config.js';
import { LoadError, describeError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { closeRedis } from '../lib/redis.js';
import { renderAuditLog } from '../lib/venues/auditLog.js';
import { PromptDisambiguator, createTerminalPrompt } from '../lib/venues/disambiguation.js';
import { reconcileBatch, type ReconcileOptions, type ReconcileReport } from '../lib/venues/session.js';
import { renderStatsReport } from '../lib/venues/stats.js';

export interface ImportCommandOptions {
  readonly mode: ImportMode;
  readonly interactive?: boolean;
  readonly dryRun?: boolean;
  readonly store?: StoreKind;
  readonly catalog?: string;
  readonly logDir?: string;
}

export async function readBatchFile(file: string): Promise<unknown> {
  let contents: string;
  try {
    contents = await readFile(file, 'utf8');
  } catch (error) {
    throw new LoadError(`Cannot read batch file ${file}: ${describeError(error)}`, { cause: error });
  }
  try {
    return JSON.parse(contents);
  } catch (error) {
    throw new LoadError(`Batch file ${file} is not valid JSON: ${describeError(error)}`, { cause: error });
  }
}

/** venue_import_2026-10-19T08-15-00-000Z.log */
export function logFileName(startedAt: string): string {
  return `venue_import_${startedAt.replace(/[:.]/g, '-')}.log`;
}

export async function writeRunLog(report: ReconcileReport, logDir: string): Promise<string> {
  await mkdir(logDir, { recursive: true });
  const file = path.join(logDir, logFileName(report.startedAt));
  await writeFile(file, renderAuditLog(report), 'utf8');
  return file;
}

export interface ImportDependencies {
  store?: CatalogStore;
  signal?: AbortSignal;
  print?: (line: string) => void;
}

/**
 * Run one import; resolves to the report after the log file is written
 */
export async function runImport(
  file: string,
  options: ImportCommandOptions,
  deps: ImportDependencies = {}
): Promise<ReconcileReport> {
  const config = getConfig();
  const print = deps.print ?? ((line: string) => console.log(line));
  const raw = await readBatchFile(file);
  const store = deps.store ?? (await createCatalogStore({
    kind: options.store ?? config.CATALOG_STORE,
    catalogFile: options.catalog,
  }));

  const prompt = options.interactive ? new PromptDisambiguator(createTerminalPrompt()) : null;
  const sessionOptions: ReconcileOptions = {
    mode: options.mode,
    dryRun: options.dryRun ?? false,
    disambiguation: prompt ? 'interactive' : 'non_interactive',
    disambiguator: prompt ?? undefined,
    resolver: getResolverOptions(config),
    lock: getBatchLock(),
    signal: deps.signal,
  };

  let report: ReconcileReport;
  try {
    report = await reconcileBatch(store, raw, sessionOptions);
  } finally {
    prompt?.close();
  }

  const logFile = await writeRunLog(report, options.logDir ?? config.LOG_DIR);
  const { counts } = report;
  print(
    `${counts.received} records: ${counts.created} created, ${counts.updated} updated, ` +
      `${counts.unchanged} unchanged, ${counts.skipped} skipped, ${counts.errored} errored`
  );
  for (const line of renderStatsReport(report.statistics)) {
    print(`  ${line}`);
  }
  print(`Log written to ${logFile}`);
  return report;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('venue-import')
    .description('Reconcile a scraped venue batch against the catalog')
    .argument('<file>', 'JSON array of scraped venue records')
    .addOption(new Option('--mode <mode>', 'import mode').choices(['update', 'fresh_import']).default('update'))
    .option('--interactive', 'ask about ambiguous matches at the terminal')
    .option('--dry-run', 'resolve and report without writing to the catalog')
    .addOption(new Option('--store <kind>', 'catalog store').choices(['memory', 'file', 'supabase']))
    .option('--catalog <path>', 'catalog file for --store file')
    .option('--log-dir <dir>', 'directory for the run log')
    .action(async (file: string, options: ImportCommandOptions) => {
      const controller = new AbortController();
      const onInterrupt = () => {
        logger.warn('Interrupt received, stopping after the current record');
        controller.abort();
      };
      process.once('SIGINT', onInterrupt);

      try {
        const report = await runImport(file, options, { signal: controller.signal });
        if (report.aborted) process.exitCode = 130;
        else if (report.counts.errored > 0) process.exitCode = 2;
      } finally {
        process.off('SIGINT', onInterrupt);
        await closeRedis();
      }
    });

  return program;
}
