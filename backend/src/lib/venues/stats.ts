/**
 * Per-tier catalog statistics. Everything here is pure, so it doubles as the
 * dry report for GET /api/catalog/stats.
 */

import type {
  BatchStatistics,
  ClassificationTier,
  TierStats,
  TierStatsTable,
  VenueRecord,
} from '@pub-catalog/shared';

export const CLASSIFICATION_TIERS: readonly ClassificationTier[] = [0, 1, 2, 3];

type Countable = Pick<VenueRecord, 'classificationTier' | 'isOpen'>;

export function emptyStatsTable(): TierStatsTable {
  return {
    0: { total: 0, openCount: 0 },
    1: { total: 0, openCount: 0 },
    2: { total: 0, openCount: 0 },
    3: { total: 0, openCount: 0 },
  };
}

export function computeTierStats(venues: Iterable<Countable>): TierStatsTable {
  const table = emptyStatsTable();
  for (const venue of venues) {
    const row = table[venue.classificationTier];
    row.total += 1;
    if (venue.isOpen) row.openCount += 1;
  }
  return table;
}

/**
 * Signed after - before, per tier
 */
export function compareStats(before: TierStatsTable, after: TierStatsTable): TierStatsTable {
  const delta = emptyStatsTable();
  for (const tier of CLASSIFICATION_TIERS) {
    delta[tier] = {
      total: after[tier].total - before[tier].total,
      openCount: after[tier].openCount - before[tier].openCount,
    };
  }
  return delta;
}

export function summarizeBatch(before: Iterable<Countable>, after: Iterable<Countable>): BatchStatistics {
  const beforeTable = computeTierStats(before);
  const afterTable = computeTierStats(after);
  return { before: beforeTable, after: afterTable, delta: compareStats(beforeTable, afterTable) };
}

function signed(value: number): string {
  return value >= 0 ? `+${value}` : String(value);
}

function tierLabel(tier: ClassificationTier): string {
  return `${tier}★`;
}

/**
 * One line per tier, highest first:
 *   3★ total: 10 → 11 (+1), open: 8 → 8 (+0)
 */
export function renderStatsReport(stats: BatchStatistics): string[] {
  return [...CLASSIFICATION_TIERS].reverse().map((tier) => {
    const before: TierStats = stats.before[tier];
    const after: TierStats = stats.after[tier];
    const delta: TierStats = stats.delta[tier];
    return (
      `${tierLabel(tier)} total: ${before.total} → ${after.total} (${signed(delta.total)}), ` +
      `open: ${before.openCount} → ${after.openCount} (${signed(delta.openCount)})`
    );
  });
}

/**
 * Single snapshot, highest tier first:
 *   3★ total: 10, open: 8
 */
export function renderTierTable(table: TierStatsTable): string[] {
  return [...CLASSIFICATION_TIERS]
    .reverse()
    .map((tier) => `${tierLabel(tier)} total: ${table[tier].total}, open: ${table[tier].openCount}`);
}
