/**
 * Reconcile a scraped venue batch against the catalog.
 * Run: npx tsx scripts/import-venues.ts data/pubs.json [--mode fresh_import] [--interactive]
 */

import { buildProgram } from '../src/cli/importVenues.js';
import { describeError } from '../src/lib/errors.js';
import { logger } from '../src/lib/logger.js';

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error('Import failed', { error: describeError(error) });
    process.exitCode = 1;
  });
