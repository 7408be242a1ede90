import { describe, it, expect, vi } from 'vitest';
import type { CatalogPatch } from '@pub-catalog/shared';
import { InMemoryCatalogStore } from '../../src/lib/catalogStore.js';
import { InProcessBatchLock } from '../../src/lib/batchLock.js';
import { LoadError } from '../../src/lib/errors.js';
import { silentLogger } from '../../src/lib/logger.js';
import type { Disambiguator } from '../../src/lib/venues/disambiguation.js';
import {
  ReconciliationSession,
  reconcileBatch,
  type ReconcileOptions,
  type SessionState,
} from '../../src/lib/venues/session.js';
import { makeEntryInput } from '../helpers/venues.js';

const fixedNow = () => new Date('2026-03-01T12:00:00.000Z');
const quiet: ReconcileOptions = { logger: silentLogger, now: fixedNow };

const crownRaw = { name: 'The Crown', address: '1 High Street, Oldtown' };

function scriptedDisambiguator(choice: Awaited<ReturnType<Disambiguator['presentCandidates']>>): Disambiguator {
  return { presentCandidates: vi.fn().mockResolvedValue(choice) };
}

class FlakyStore extends InMemoryCatalogStore {
  async update(catalogId: string, patch: CatalogPatch): Promise<void> {
    if (patch.name === 'Broken') {
      throw new Error('disk full');
    }
    await super.update(catalogId, patch);
  }
}

describe('reconcileBatch (update mode)', () => {
  it('promotes a matched entry to tier 3 and logs it', async () => {
    const store = new InMemoryCatalogStore([
      makeEntryInput({ externalId: '7', classificationTier: 2, isOpen: true }),
    ]);

    const report = await reconcileBatch(
      store,
      [{ ...crownRaw, externalId: '7', classificationTier: 3, isOpen: true }],
      quiet
    );

    expect(report.counts).toEqual({
      received: 1,
      created: 0,
      updated: 1,
      unchanged: 0,
      skipped: 0,
      errored: 0,
    });
    expect(report.changes).toEqual([
      {
        catalogId: '1',
        fieldsChanged: ['classificationTier'],
        tierTransition: { from: 2, to: 3 },
        openTransition: null,
        timestamp: '2026-03-01T12:00:00.000Z',
      },
    ]);
    expect(report.auditLines).toEqual([
      'Updated 1: The Crown (classificationTier)',
      'Promoted to Three-Star: The Crown, Address: 1 High Street, Oldtown',
    ]);
    expect((await store.loadAll())[0].classificationTier).toBe(3);
  });

  it('creates unmatched records and counts them in the statistics', async () => {
    const store = new InMemoryCatalogStore();

    const report = await reconcileBatch(
      store,
      [{ name: 'Elm Tavern', address: '1 Elm St', classificationTier: 3, isOpen: false }],
      quiet
    );

    expect(report.counts.created).toBe(1);
    expect(report.statistics.before[3]).toEqual({ total: 0, openCount: 0 });
    expect(report.statistics.after[3]).toEqual({ total: 1, openCount: 0 });
    expect(report.statistics.delta[3]).toEqual({ total: 1, openCount: 0 });

    const [created] = await store.loadAll();
    expect(created).toMatchObject({
      catalogId: '1',
      name: 'Elm Tavern',
      externalId: null,
      contentHash: '82c216b313b4c6f2f83aa7406f5d8a53',
    });
  });

  it('sees records created earlier in the same batch', async () => {
    const store = new InMemoryCatalogStore();

    const report = await reconcileBatch(store, [crownRaw, crownRaw], quiet);

    expect(report.counts).toMatchObject({ created: 1, unchanged: 1 });
    expect(await store.loadAll()).toHaveLength(1);
  });

  it('reports an identical record as unchanged', async () => {
    const store = new InMemoryCatalogStore([makeEntryInput({ externalId: '7' })]);

    const report = await reconcileBatch(store, [{ ...crownRaw, externalId: '7' }], quiet);

    expect(report.counts).toMatchObject({ updated: 0, unchanged: 1 });
    expect(report.changes).toEqual([]);
  });

  it('skips ambiguous records when unattended and lists the candidates', async () => {
    const store = new InMemoryCatalogStore([makeEntryInput({ name: 'The Crown', address: '1 High Street' })]);

    const report = await reconcileBatch(store, [{ name: 'The Crown Inn', address: '1 High Street.' }], quiet);

    expect(report.counts).toMatchObject({ skipped: 1, created: 0, updated: 0 });
    expect(report.auditLines).toEqual([
      'Skipped (ambiguous): The Crown Inn, Address: 1 High Street.',
      '  1. [1] score 85: The Crown, 1 High Street',
    ]);
    expect(await store.loadAll()).toHaveLength(1);
  });

  it('merges into the candidate an operator picks', async () => {
    const store = new InMemoryCatalogStore([makeEntryInput({ name: 'The Crown', address: '1 High Street' })]);
    const disambiguator = scriptedDisambiguator({ action: 'pick', catalogId: '1' });

    const report = await reconcileBatch(store, [{ name: 'The Crown Inn', address: '1 High Street.' }], {
      ...quiet,
      disambiguation: 'interactive',
      disambiguator,
    });

    expect(disambiguator.presentCandidates).toHaveBeenCalledWith(
      expect.objectContaining({ name: 'The Crown Inn' }),
      [{ catalogId: '1', score: 85, name: 'The Crown', address: '1 High Street' }]
    );
    expect(report.counts.updated).toBe(1);
    expect(report.changes[0].fieldsChanged).toEqual(['name', 'address']);
  });

  it('creates a new entry when the operator says so', async () => {
    const store = new InMemoryCatalogStore([makeEntryInput({ name: 'The Crown', address: '1 High Street' })]);

    const report = await reconcileBatch(store, [{ name: 'The Crown Inn', address: '1 High Street.' }], {
      ...quiet,
      disambiguation: 'interactive',
      disambiguator: scriptedDisambiguator({ action: 'create' }),
    });

    expect(report.counts.created).toBe(1);
    expect((await store.loadAll()).map((e) => e.catalogId)).toEqual(['1', '2']);
  });

  it('requires a disambiguator for interactive runs', () => {
    expect(() => new ReconciliationSession(new InMemoryCatalogStore(), { disambiguation: 'interactive' })).toThrow(
      'Interactive disambiguation needs a disambiguator'
    );
  });

  it('keeps going after a record fails', async () => {
    const store = new FlakyStore([
      makeEntryInput({ externalId: '1', name: 'First', address: '1 A Road' }),
      makeEntryInput({ externalId: '2', name: 'Second', address: '2 B Road' }),
    ]);

    const report = await reconcileBatch(
      store,
      [
        { externalId: '1', name: 'Broken', address: '1 A Road' },
        { externalId: '2', name: 'Second renamed', address: '2 B Road' },
      ],
      quiet
    );

    expect(report.counts).toMatchObject({ received: 2, errored: 1, updated: 1 });
    expect(report.auditLines).toEqual([
      'Error: Failed to process "Broken": disk full',
      'Updated 2: Second renamed (name)',
    ]);
  });

  it('matches by address an entry that shared it with one moved earlier in the batch', async () => {
    const store = new InMemoryCatalogStore([
      makeEntryInput({ externalId: '5', address: '1 High St' }),
      makeEntryInput({ name: 'Old Bell', address: '1 High St' }),
    ]);

    const report = await reconcileBatch(
      store,
      [
        { externalId: '5', name: 'The Crown', address: '2 Low Rd' },
        { name: 'Zebra Lounge', address: '1 High St' },
      ],
      quiet
    );

    expect(report.counts.created).toBe(0);
    expect(report.counts.updated).toBe(2);
    expect(report.auditLines[1]).toBe('Updated 2: Zebra Lounge (name)');
    expect(await store.loadAll()).toHaveLength(2);
  });

  it('merges a record carrying a known externalId even when nothing else matches', async () => {
    const store = new InMemoryCatalogStore([makeEntryInput({ externalId: '7' })]);

    const report = await reconcileBatch(store, [{ externalId: '7', name: 'Red Lion', address: '9 Quay' }], quiet);

    expect(report.counts.created).toBe(0);
    expect(report.counts.updated).toBe(1);
    expect((await store.loadAll()).map((e) => [e.catalogId, e.name])).toEqual([['1', 'Red Lion']]);
  });

  it('logs parse warnings before the records', async () => {
    const report = await reconcileBatch(
      new InMemoryCatalogStore(),
      [{ name: 'X', address: '9 Quay', 'Inventory Stars': 'Gold' }],
      quiet
    );

    expect(report.warnings).toHaveLength(1);
    expect(report.auditLines[0]).toBe('Warning [X] classificationTier: unrecognised tier label, defaulting to 0');
  });
});

describe('reconcileBatch (fresh_import mode)', () => {
  it('replaces the whole catalog with the batch', async () => {
    const store = new InMemoryCatalogStore(
      Array.from({ length: 10 }, (_, i) => makeEntryInput({ name: `Pub ${i}`, address: `${i} Old Road` }))
    );
    const originalIds = (await store.loadAll()).map((e) => e.catalogId);

    const report = await reconcileBatch(
      store,
      [
        { name: 'Pub 0', address: '0 Old Road' },
        { name: 'Anchor', address: '2 Quay' },
        { name: 'Anchor', address: '2 Quay' },
      ],
      { ...quiet, mode: 'fresh_import' }
    );

    const after = await store.loadAll();
    expect(after).toHaveLength(3);
    expect(after.map((e) => e.catalogId)).toEqual(['11', '12', '13']);
    expect(after.some((e) => originalIds.includes(e.catalogId))).toBe(false);
    expect(report.counts).toMatchObject({ created: 3, updated: 0, unchanged: 0 });
    expect(report.statistics.delta[0]).toEqual({ total: -7, openCount: -7 });
  });
});

describe('ReconciliationSession lifecycle', () => {
  it('walks through the states of a run', async () => {
    const states: SessionState[] = [];
    const session = new ReconciliationSession(new InMemoryCatalogStore(), {
      ...quiet,
      onStateChange: (state) => states.push(state),
    });

    await session.run([crownRaw]);

    expect(states).toEqual(['loading', 'matching', 'creating', 'finalizing', 'done']);
    expect(session.state).toBe('done');
  });

  it('runs only once', async () => {
    const session = new ReconciliationSession(new InMemoryCatalogStore(), quiet);
    await session.run([]);
    await expect(session.run([])).rejects.toThrow('Session already ran (state: done)');
  });

  it('stops between records when aborted', async () => {
    const controller = new AbortController();
    const store = new InMemoryCatalogStore();
    const session = new ReconciliationSession(store, {
      ...quiet,
      signal: controller.signal,
      onStateChange: (state, recordIndex) => {
        if (state === 'creating' && recordIndex === 0) controller.abort();
      },
    });

    const report = await session.run([crownRaw, { name: 'Anchor', address: '2 Quay' }]);

    expect(report.aborted).toBe(true);
    expect(report.counts.created).toBe(1);
    expect(report.auditLines).toContain('Aborted before record 2 of 2');
    expect(session.state).toBe('aborted');
    expect(await store.loadAll()).toHaveLength(1);
  });

  it('fails before writing when the snapshot cannot be loaded', async () => {
    const store = new InMemoryCatalogStore();
    vi.spyOn(store, 'loadAll').mockRejectedValue(new Error('connection refused'));
    const create = vi.spyOn(store, 'create');
    const session = new ReconciliationSession(store, quiet);

    await expect(session.run([crownRaw])).rejects.toThrow(
      new LoadError('Failed to load catalog snapshot: connection refused')
    );
    expect(session.state).toBe('failed');
    expect(create).not.toHaveBeenCalled();
  });

  it('rejects a batch that is not an array', async () => {
    await expect(reconcileBatch(new InMemoryCatalogStore(), { name: 'X' }, quiet)).rejects.toBeInstanceOf(LoadError);
  });

  it('leaves the store untouched on a dry run', async () => {
    const store = new InMemoryCatalogStore([makeEntryInput({ externalId: '7' })]);

    const report = await reconcileBatch(
      store,
      [
        { ...crownRaw, externalId: '7', classificationTier: 3 },
        { name: 'Elm Tavern', address: '1 Elm St' },
      ],
      { ...quiet, dryRun: true }
    );

    expect(report.dryRun).toBe(true);
    expect(report.counts).toMatchObject({ updated: 1, created: 1 });
    expect(report.statistics.after).toEqual(report.statistics.before);
    expect(await store.loadAll()).toEqual([{ ...makeEntryInput({ externalId: '7' }), catalogId: '1' }]);
  });
});

describe('batch lock', () => {
  it('refuses to start while another batch holds the lock', async () => {
    const lock = new InProcessBatchLock();
    const handle = await lock.acquire();

    await expect(reconcileBatch(new InMemoryCatalogStore(), [], { ...quiet, lock })).rejects.toThrow(
      'Another batch is already reconciling the catalog'
    );

    await handle?.release();
    expect(lock.isHeld).toBe(false);
  });

  it('releases the lock after a failed run', async () => {
    const lock = new InProcessBatchLock();
    const store = new InMemoryCatalogStore();
    vi.spyOn(store, 'loadAll').mockRejectedValue(new Error('timeout'));

    await expect(reconcileBatch(store, [], { ...quiet, lock })).rejects.toBeInstanceOf(LoadError);
    expect(lock.isHeld).toBe(false);
  });

  it('releases the lock after a successful run', async () => {
    const lock = new InProcessBatchLock();
    await reconcileBatch(new InMemoryCatalogStore(), [crownRaw], { ...quiet, lock });
    expect(lock.isHeld).toBe(false);
  });
});
