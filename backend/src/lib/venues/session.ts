/**
 * Reconciliation session: runs one scraped batch against the catalog.
 *
 *   idle -> loading -> matching(i) -> creating | merging | awaiting_disambiguation | skipping
 *        -> matching(i + 1) ... -> finalizing -> done
 *
 * Cancellation is checked before each record and ends in 'aborted'; work
 * already committed stays. A snapshot that cannot be loaded ends in 'failed'
 * before anything is written. Every other failure is confined to its record.
 */

import type {
  BatchStatistics,
  CatalogEntry,
  ChangeRecord,
  DisambiguationMode,
  ImportMode,
  ReconcileCounts,
  TierStatsTable,
  VenueRecord,
} from '@pub-catalog/shared';
import type { CatalogStore } from '../catalogStore.js';
import { acquireBatchLock, type BatchLock, type LockHandle } from '../batchLock.js';
import { ConflictError, LoadError, RecordError, describeError, type ParseWarning } from '../errors.js';
import { createChildLogger, logger as rootLogger, type Logger } from '../logger.js';
import { AuditLog, type CandidateSummary } from './auditLog.js';
import { SkipDisambiguator, type Disambiguator } from './disambiguation.js';
import { computeContentHash } from './fingerprint.js';
import { IdentityIndex } from './identityIndex.js';
import { applyMerge } from './merge.js';
import { normalizeBatch, type NormalizeResult } from './normalize.js';
import { DEFAULT_RESOLVER_OPTIONS, resolveIdentity, type ResolverOptions } from './resolver.js';
import { computeTierStats, summarizeBatch } from './stats.js';

export type SessionState =
  | 'idle'
  | 'loading'
  | 'matching'
  | 'creating'
  | 'merging'
  | 'awaiting_disambiguation'
  | 'skipping'
  | 'finalizing'
  | 'done'
  | 'aborted'
  | 'failed';

export interface ReconcileOptions {
  mode?: ImportMode;
  disambiguation?: DisambiguationMode;
  /** Required for interactive disambiguation */
  disambiguator?: Disambiguator;
  resolver?: Partial<ResolverOptions>;
  /** Resolve and plan without writing to the store */
  dryRun?: boolean;
  signal?: AbortSignal;
  lock?: BatchLock;
  logger?: Logger;
  now?: () => Date;
  /** recordIndex is null outside the per-record loop */
  onStateChange?: (state: SessionState, recordIndex: number | null) => void;
}

export interface ReconcileReport {
  mode: ImportMode;
  dryRun: boolean;
  counts: ReconcileCounts;
  statistics: BatchStatistics;
  /** Per-tier figures of the incoming batch itself */
  batchStats: TierStatsTable;
  changes: ChangeRecord[];
  auditLines: string[];
  warnings: ParseWarning[];
  aborted: boolean;
  startedAt: string;
  finishedAt: string;
}

type RecordOutcome = 'created' | 'updated' | 'unchanged' | 'skipped';

let sessionCounter = 0;

export class ReconciliationSession {
  private currentState: SessionState = 'idle';
  private readonly mode: ImportMode;
  private readonly dryRun: boolean;
  private readonly resolverOptions: ResolverOptions;
  private readonly disambiguator: Disambiguator;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly audit = new AuditLog();
  private readonly counts: ReconcileCounts = {
    received: 0,
    created: 0,
    updated: 0,
    unchanged: 0,
    skipped: 0,
    errored: 0,
  };
  private index = new IdentityIndex();
  private dryRunIds = 0;

  constructor(
    private readonly store: CatalogStore,
    private readonly options: ReconcileOptions = {}
  ) {
    this.mode = options.mode ?? 'update';
    this.dryRun = options.dryRun ?? false;
    this.resolverOptions = { ...DEFAULT_RESOLVER_OPTIONS, ...options.resolver };
    this.now = options.now ?? (() => new Date());

    const disambiguation = options.disambiguation ?? 'non_interactive';
    if (disambiguation === 'interactive') {
      if (!options.disambiguator) {
        throw new Error('Interactive disambiguation needs a disambiguator');
      }
      this.disambiguator = options.disambiguator;
    } else {
      this.disambiguator = new SkipDisambiguator();
    }

    sessionCounter += 1;
    this.log = createChildLogger(
      { session_id: `reconcile-${sessionCounter}`, mode: this.mode, dry_run: this.dryRun },
      options.logger ?? rootLogger
    );
  }

  get state(): SessionState {
    return this.currentState;
  }

  async run(rawBatch: unknown): Promise<ReconcileReport> {
    if (this.currentState !== 'idle') {
      throw new Error(`Session already ran (state: ${this.currentState})`);
    }
    const startedAt = this.now().toISOString();
    this.transition('loading');

    let batch: NormalizeResult[];
    try {
      batch = normalizeBatch(rawBatch);
    } catch (error) {
      this.transition('failed');
      throw error;
    }
    this.counts.received = batch.length;
    const batchStats = computeTierStats(batch.map((item) => item.record));

    const handle = await this.acquireLock();
    try {
      const snapshot = await this.loadSnapshot();
      this.log.info('Catalog snapshot loaded', { entries: snapshot.length, records: batch.length });

      const warnings = batch.flatMap((item) => item.warnings);
      for (const warning of warnings) {
        this.audit.recordWarning(warning);
      }

      if (this.mode === 'fresh_import') {
        await this.clearCatalog(snapshot.length);
      } else {
        this.index = IdentityIndex.fromSnapshot(snapshot);
      }

      const aborted = await this.processRecords(batch);

      if (!aborted) this.transition('finalizing');
      const after = await this.loadAfter(snapshot);
      const statistics = summarizeBatch(snapshot, after);

      this.transition(aborted ? 'aborted' : 'done');
      this.log.info('Reconciliation finished', { ...this.counts, aborted });

      return {
        mode: this.mode,
        dryRun: this.dryRun,
        counts: { ...this.counts },
        statistics,
        batchStats,
        changes: [...this.audit.changeRecords],
        auditLines: [...this.audit.entries],
        warnings,
        aborted,
        startedAt,
        finishedAt: this.now().toISOString(),
      };
    } catch (error) {
      if (this.state !== 'done' && this.state !== 'aborted') {
        this.transition('failed');
      }
      throw error;
    } finally {
      if (handle) {
        await handle.release();
      }
    }
  }

  private transition(state: SessionState, recordIndex: number | null = null): void {
    this.currentState = state;
    this.options.onStateChange?.(state, recordIndex);
  }

  private async acquireLock(): Promise<LockHandle | null> {
    if (!this.options.lock) return null;
    try {
      return await acquireBatchLock(this.options.lock);
    } catch (error) {
      this.transition('failed');
      throw error;
    }
  }

  private async loadSnapshot(): Promise<CatalogEntry[]> {
    try {
      return await this.store.loadAll();
    } catch (error) {
      throw new LoadError(`Failed to load catalog snapshot: ${describeError(error)}`, { cause: error });
    }
  }

  private async clearCatalog(existing: number): Promise<void> {
    if (this.dryRun) {
      this.audit.line(`Fresh import: would discard ${existing} catalog entries`);
      return;
    }
    let removed: number;
    try {
      removed = await this.store.clear();
    } catch (error) {
      throw new LoadError(`Failed to clear catalog for fresh import: ${describeError(error)}`, { cause: error });
    }
    this.audit.line(`Fresh import: discarded ${removed} catalog entries`);
    this.log.info('Catalog cleared for fresh import', { removed });
  }

  /**
   * Resolves to true when cancelled before the last record
   */
  private async processRecords(batch: NormalizeResult[]): Promise<boolean> {
    for (const [i, { record }] of batch.entries()) {
      if (this.options.signal?.aborted) {
        this.audit.line(`Aborted before record ${i + 1} of ${batch.length}`);
        this.log.warn('Reconciliation aborted', { processed: i, remaining: batch.length - i });
        return true;
      }

      this.transition('matching', i);
      try {
        const outcome =
          this.mode === 'fresh_import' ? await this.createEntry(record, i) : await this.reconcileRecord(record, i);
        this.counts[outcome] += 1;
      } catch (error) {
        this.counts.errored += 1;
        const failure = error instanceof ConflictError ? error : RecordError.wrap(record.name || '(unnamed)', error);
        this.audit.recordError(failure.message);
        this.log.error('Record failed', {
          record_name: record.name,
          code: failure.code,
          error: failure.message,
        });
      }
    }
    return false;
  }

  private async reconcileRecord(record: VenueRecord, i: number): Promise<RecordOutcome> {
    const match = resolveIdentity(record, this.index, this.resolverOptions);

    switch (match.kind) {
      case 'exact_id':
      case 'exact_address':
      case 'fuzzy':
        return this.mergeInto(match.catalogId, record, i);
      case 'no_match':
        return this.createEntry(record, i);
      case 'ambiguous': {
        this.transition('awaiting_disambiguation', i);
        const candidates = this.describeCandidates(match.candidates);
        const choice = await this.disambiguator.presentCandidates(record, candidates);
        if (choice.action === 'pick') return this.mergeInto(choice.catalogId, record, i);
        if (choice.action === 'create') return this.createEntry(record, i);
        this.transition('skipping', i);
        this.audit.recordSkipped(record, 'ambiguous', candidates);
        return 'skipped';
      }
    }
  }

  private describeCandidates(candidates: { catalogId: string; score: number }[]): CandidateSummary[] {
    return candidates.map((candidate) => {
      const entry = this.index.get(candidate.catalogId);
      return {
        ...candidate,
        name: entry?.name ?? '',
        address: entry?.address ?? '',
      };
    });
  }

  private async mergeInto(catalogId: string, record: VenueRecord, i: number): Promise<RecordOutcome> {
    this.transition('merging', i);
    const entry = this.index.get(catalogId);
    if (!entry) {
      throw new RecordError(record.name, `Catalog entry ${catalogId} is not in the snapshot`);
    }

    const result = await applyMerge(this.store, this.index, entry, record, {
      dryRun: this.dryRun,
      now: this.now,
    });
    if (result.change) {
      this.audit.recordChange(result.change, result.entry);
      this.log.debug('Entry updated', {
        catalog_id: catalogId,
        fields: result.change.fieldsChanged,
      });
    }
    return result.outcome;
  }

  private async createEntry(record: VenueRecord, i: number): Promise<RecordOutcome> {
    this.transition('creating', i);
    const fields = { ...record, contentHash: computeContentHash(record.address) };
    let entry: CatalogEntry;
    if (this.dryRun) {
      this.dryRunIds += 1;
      entry = { ...fields, catalogId: `dry-run-${this.dryRunIds}` };
    } else {
      entry = await this.store.create(fields);
    }
    this.index.add(entry);
    this.audit.recordCreated(entry);
    this.log.debug('Entry created', { catalog_id: entry.catalogId, record_name: record.name });
    return 'created';
  }

  private async loadAfter(snapshot: CatalogEntry[]): Promise<CatalogEntry[]> {
    if (this.dryRun) return snapshot;
    return this.loadSnapshot();
  }
}

/**
 * Run one batch through a fresh session
 */
export function reconcileBatch(
  store: CatalogStore,
  rawBatch: unknown,
  options: ReconcileOptions = {}
): Promise<ReconcileReport> {
  return new ReconciliationSession(store, options).run(rawBatch);
}
