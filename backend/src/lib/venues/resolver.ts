/**
 * Identity resolution: which catalog entry, if any, an incoming record is.
 *
 * Tiers run in order and the first one with an answer wins:
 *   1. externalId equality
 *   2. trimmed address equality (case-sensitive)
 *   3. fuzzy token-sort score on "{name} {address}"
 * The fuzzy tier always answers, with fuzzy, ambiguous or no_match.
 */

import type { MatchResult, ScoredCandidate, VenueRecord } from '@pub-catalog/shared';
import { compareCatalogIds, matchText, type IdentityIndex } from './identityIndex.js';
import { ratio, tokenSortKey } from './similarity.js';

export interface ResolverOptions {
  /** Best score at or above this matches without asking */
  autoMatchThreshold: number;
  /** Candidates below this are not worth showing an operator */
  ambiguousLowerBound: number;
  maxCandidates: number;
}

export const DEFAULT_RESOLVER_OPTIONS: ResolverOptions = {
  autoMatchThreshold: 95,
  ambiguousLowerBound: 60,
  maxCandidates: 6,
};

export type MatchTier = (
  record: VenueRecord,
  index: IdentityIndex,
  options: ResolverOptions
) => MatchResult | null;

export const exactIdTier: MatchTier = (record, index) => {
  if (record.externalId === null) return null;
  const entry = index.findByExternalId(record.externalId);
  return entry ? { kind: 'exact_id', catalogId: entry.catalogId } : null;
};

export const exactAddressTier: MatchTier = (record, index) => {
  const entry = index.findByAddress(record.address);
  return entry ? { kind: 'exact_address', catalogId: entry.catalogId } : null;
};

/**
 * Score every indexed entry, best first; equal scores by ascending catalogId
 */
export function rankCandidates(record: VenueRecord, index: IdentityIndex): ScoredCandidate[] {
  const key = tokenSortKey(matchText(record));
  return index
    .all()
    .map((entry) => ({ catalogId: entry.catalogId, score: ratio(key, index.matchKey(entry.catalogId)) }))
    .sort((a, b) => b.score - a.score || compareCatalogIds(a.catalogId, b.catalogId));
}

export const fuzzyTier: MatchTier = (record, index, options) => {
  const ranked = rankCandidates(record, index);
  const best = ranked[0];
  if (!best) return { kind: 'no_match' };

  if (best.score >= options.autoMatchThreshold) {
    return { kind: 'fuzzy', catalogId: best.catalogId, score: best.score };
  }

  if (best.score >= options.ambiguousLowerBound) {
    const candidates = ranked
      .filter((candidate) => candidate.score >= options.ambiguousLowerBound)
      .slice(0, options.maxCandidates);
    return { kind: 'ambiguous', candidates };
  }

  return { kind: 'no_match' };
};

export const MATCH_TIERS: readonly MatchTier[] = [exactIdTier, exactAddressTier, fuzzyTier];

export function resolveIdentity(
  record: VenueRecord,
  index: IdentityIndex,
  options: ResolverOptions = DEFAULT_RESOLVER_OPTIONS
): MatchResult {
  for (const tier of MATCH_TIERS) {
    const result = tier(record, index, options);
    if (result) return result;
  }
  return { kind: 'no_match' };
}
