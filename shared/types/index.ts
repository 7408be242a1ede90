// Shared TypeScript types for the venue catalog

// ============================================
// ENUMS
// ============================================

/** Heritage inventory ranking; 0 = unclassified, 3 = national importance */
export type ClassificationTier = 0 | 1 | 2 | 3;

export type ImportMode = 'update' | 'fresh_import';

export type DisambiguationMode = 'interactive' | 'non_interactive';

export type MergeOutcome = 'updated' | 'unchanged';

// ============================================
// CORE TYPES
// ============================================

export interface VenueRecord {
  externalId: string | null;
  name: string;
  address: string;
  description: string;
  classificationTier: ClassificationTier;
  listedGrade: string;
  isOpen: boolean;
  latitude: number | null;
  longitude: number | null;
  url: string;
}

export type VenueField = keyof VenueRecord;

export interface CatalogEntry extends VenueRecord {
  catalogId: string;
  /** MD5 of the address; dedup key for legacy rows without externalId */
  contentHash: string;
}

export type CatalogEntryInput = Omit<CatalogEntry, 'catalogId'>;

export type CatalogPatch = Partial<CatalogEntryInput>;

// ============================================
// MATCHING
// ============================================

export interface ScoredCandidate {
  catalogId: string;
  score: number;
}

export type MatchResult =
  | { kind: 'exact_id'; catalogId: string }
  | { kind: 'exact_address'; catalogId: string }
  | { kind: 'fuzzy'; catalogId: string; score: number }
  | { kind: 'ambiguous'; candidates: ScoredCandidate[] }
  | { kind: 'no_match' };

// ============================================
// AUDIT
// ============================================

export interface Transition<T> {
  from: T;
  to: T;
}

export interface ChangeRecord {
  catalogId: string;
  fieldsChanged: VenueField[];
  tierTransition: Transition<ClassificationTier> | null;
  openTransition: Transition<boolean> | null;
  timestamp: string; // ISO 8601
}

// ============================================
// STATISTICS
// ============================================

export interface TierStats {
  total: number;
  openCount: number;
}

export type TierStatsTable = Record<ClassificationTier, TierStats>;

export interface BatchStatistics {
  before: TierStatsTable;
  after: TierStatsTable;
  delta: TierStatsTable;
}

export interface ReconcileCounts {
  received: number;
  created: number;
  updated: number;
  unchanged: number;
  skipped: number;
  errored: number;
}
