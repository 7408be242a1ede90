import { Router, Request, Response, NextFunction } from 'express';
import { body, validationResult } from 'express-validator';
import type { ImportMode } from '@pub-catalog/shared';
import { getBatchLock, getCatalogStore, getResolverOptions } from '../lib/catalog.js';
import { createChildLogger } from '../lib/logger.js';
import { reconcileBatch } from '../lib/venues/session.js';
import { computeTierStats, renderTierTable } from '../lib/venues/stats.js';
import { createError } from '../middleware/errorHandler.js';

const router = Router();

const IMPORT_MODES: readonly ImportMode[] = ['update', 'fresh_import'];

function isImportMode(value: unknown): value is ImportMode {
  return value === 'update' || value === 'fresh_import';
}

// GET /api/catalog/stats - Per-tier totals of the current catalog
router.get('/stats', async (_req: Request, res: Response, next: NextFunction) => {
  try {
    const store = await getCatalogStore();
    const entries = await store.loadAll();
    const stats = computeTierStats(entries);

    res.json({
      success: true,
      data: {
        total: entries.length,
        tiers: stats,
        report: renderTierTable(stats),
      },
    });
  } catch (error) {
    next(error);
  }
});

const validateReconcile = [
  body('records').isArray().withMessage('records must be an array'),
  body('mode').optional().isIn([...IMPORT_MODES]).withMessage('mode must be update or fresh_import'),
  body('dry_run').optional().isBoolean({ strict: true }).withMessage('dry_run must be a boolean'),
];

// POST /api/catalog/reconcile - Reconcile a scraped batch (never prompts)
router.post('/reconcile', validateReconcile, async (req: Request, res: Response, next: NextFunction) => {
  try {
    const errors = validationResult(req);
    if (!errors.isEmpty()) {
      throw createError('Validation error: ' + errors.array().map(e => e.msg).join(', '), 400, 'VALIDATION_ERROR');
    }

    const { records, mode, dry_run } = req.body;
    const store = await getCatalogStore();
    const report = await reconcileBatch(store, records, {
      mode: isImportMode(mode) ? mode : 'update',
      dryRun: dry_run === true,
      disambiguation: 'non_interactive',
      resolver: getResolverOptions(),
      lock: getBatchLock(),
      logger: createChildLogger({ correlation_id: req.correlationId }),
    });

    res.json({ success: true, data: report });
  } catch (error) {
    next(error);
  }
});

export default router;
