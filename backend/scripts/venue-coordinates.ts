/**
 * Fill in missing venue coordinates.
 * Run: npx tsx scripts/venue-coordinates.ts geocode --limit 50
 *      npx tsx scripts/venue-coordinates.ts import-csv data/coordinates.csv
 */

import { buildCoordinatesProgram } from '../src/cli/coordinates.js';
import { describeError } from '../src/lib/errors.js';
import { logger } from '../src/lib/logger.js';

buildCoordinatesProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error('Coordinate backfill failed', { error: describeError(error) });
    process.exitCode = 1;
  });
