import { describe, it, expect } from 'vitest';
import type { CatalogEntry, VenueRecord } from '@pub-catalog/shared';
import { InMemoryCatalogStore } from '../../src/lib/catalogStore.js';
import { ConflictError } from '../../src/lib/errors.js';
import { computeContentHash } from '../../src/lib/venues/fingerprint.js';
import { IdentityIndex } from '../../src/lib/venues/identityIndex.js';
import {
  applyMerge,
  computeMerge,
  detectOpenTransition,
  detectTierTransition,
} from '../../src/lib/venues/merge.js';
import { makeEntryInput, makeRecord } from '../helpers/venues.js';

function entry(catalogId: string, overrides: Partial<VenueRecord> = {}): CatalogEntry {
  return { ...makeEntryInput(overrides), catalogId };
}

function recordFrom(stored: CatalogEntry, overrides: Partial<VenueRecord> = {}): VenueRecord {
  const { catalogId: _id, contentHash: _hash, ...record } = stored;
  return { ...record, ...overrides };
}

const fixedNow = () => new Date('2026-03-01T12:00:00.000Z');

describe('computeMerge', () => {
  it('finds nothing to do for an identical record', () => {
    const stored = entry('1', { externalId: '7', latitude: 50, longitude: -1, classificationTier: 3 });
    const plan = computeMerge(stored, recordFrom(stored));

    expect(plan.fieldsChanged).toEqual([]);
    expect(plan.patch).toEqual({});
    expect(plan.tierTransition).toBeNull();
    expect(plan.openTransition).toBeNull();
  });

  it('stages a promotion to tier 3', () => {
    const stored = entry('1', { externalId: '7', classificationTier: 2, isOpen: true });
    const plan = computeMerge(stored, recordFrom(stored, { classificationTier: 3 }));

    expect(plan.fieldsChanged).toEqual(['classificationTier']);
    expect(plan.patch).toEqual({ classificationTier: 3 });
    expect(plan.tierTransition).toEqual({ from: 2, to: 3 });
    expect(plan.openTransition).toBeNull();
  });

  it('never overwrites recorded coordinates', () => {
    const stored = entry('1', { latitude: 50.0, longitude: null });
    const plan = computeMerge(stored, recordFrom(stored, { latitude: 51.0, longitude: -0.5 }));

    expect(plan.fieldsChanged).toEqual(['longitude']);
    expect(plan.patch).toEqual({ longitude: -0.5 });
  });

  it('never erases a known externalId', () => {
    const stored = entry('1', { externalId: '123' });
    const plan = computeMerge(stored, recordFrom(stored, { externalId: null }));

    expect(plan.fieldsChanged).toEqual([]);
  });

  it('replaces a changed externalId', () => {
    const stored = entry('1', { externalId: '123' });
    const plan = computeMerge(stored, recordFrom(stored, { externalId: '124' }));

    expect(plan.patch).toEqual({ externalId: '124' });
  });

  it('recomputes the content hash with the address', () => {
    const stored = entry('1', { address: '1 Elm St' });
    const plan = computeMerge(stored, recordFrom(stored, { address: '2 Low Road' }));

    expect(plan.fieldsChanged).toEqual(['address']);
    expect(plan.patch).toEqual({
      address: '2 Low Road',
      contentHash: '492ca9471f39c5d258b2a453e6610529',
    });
  });

  it('lists dirty fields in a stable order', () => {
    const stored = entry('1');
    const plan = computeMerge(
      stored,
      recordFrom(stored, { url: 'https://pubs.example.org/pubs/the-crown-3', name: 'Crown', isOpen: false })
    );

    expect(plan.fieldsChanged).toEqual(['name', 'isOpen', 'url']);
  });
});

describe('detectTierTransition', () => {
  it('fires only when tier 3 is entered or left', () => {
    expect(detectTierTransition(3, 2)).toEqual({ from: 3, to: 2 });
    expect(detectTierTransition(0, 3)).toEqual({ from: 0, to: 3 });
    expect(detectTierTransition(1, 2)).toBeNull();
    expect(detectTierTransition(3, 3)).toBeNull();
  });
});

describe('detectOpenTransition', () => {
  it('fires when either side is tier 3', () => {
    expect(
      detectOpenTransition({ isOpen: true, classificationTier: 3 }, { isOpen: false, classificationTier: 3 })
    ).toEqual({ from: true, to: false });
    expect(
      detectOpenTransition({ isOpen: false, classificationTier: 2 }, { isOpen: true, classificationTier: 3 })
    ).toEqual({ from: false, to: true });
    expect(
      detectOpenTransition({ isOpen: true, classificationTier: 3 }, { isOpen: false, classificationTier: 1 })
    ).toEqual({ from: true, to: false });
  });

  it('ignores lower tiers and unchanged status', () => {
    expect(
      detectOpenTransition({ isOpen: true, classificationTier: 1 }, { isOpen: false, classificationTier: 2 })
    ).toBeNull();
    expect(
      detectOpenTransition({ isOpen: true, classificationTier: 3 }, { isOpen: true, classificationTier: 3 })
    ).toBeNull();
  });
});

describe('applyMerge', () => {
  it('writes the patch, refreshes the index and returns a change record', async () => {
    const store = new InMemoryCatalogStore([makeEntryInput({ externalId: '7', classificationTier: 3 })]);
    const [stored] = await store.loadAll();
    const index = IdentityIndex.fromSnapshot([stored]);

    const result = await applyMerge(
      store,
      index,
      stored,
      recordFrom(stored, { isOpen: false, address: '2 Low Road' }),
      { now: fixedNow }
    );

    expect(result.outcome).toBe('updated');
    expect(result.change).toEqual({
      catalogId: '1',
      fieldsChanged: ['address', 'isOpen'],
      tierTransition: null,
      openTransition: { from: true, to: false },
      timestamp: '2026-03-01T12:00:00.000Z',
    });

    const [after] = await store.loadAll();
    expect(after.isOpen).toBe(false);
    expect(after.address).toBe('2 Low Road');
    expect(after.contentHash).toBe(computeContentHash('2 Low Road'));
    expect(index.findByAddress('2 Low Road')?.catalogId).toBe('1');
  });

  it('reports unchanged without writing', async () => {
    const store = new InMemoryCatalogStore([makeEntryInput()]);
    const [stored] = await store.loadAll();
    const index = IdentityIndex.fromSnapshot([stored]);

    const result = await applyMerge(store, index, stored, recordFrom(stored));

    expect(result.outcome).toBe('unchanged');
    expect(result.change).toBeNull();
  });

  it('refuses to take an externalId owned by another entry', async () => {
    const store = new InMemoryCatalogStore([
      makeEntryInput({ externalId: '7', name: 'Anchor', address: '2 Quay' }),
      makeEntryInput({ name: 'The Crown' }),
    ]);
    const snapshot = await store.loadAll();
    const index = IdentityIndex.fromSnapshot(snapshot);
    const crown = snapshot[1];

    await expect(
      applyMerge(store, index, crown, recordFrom(crown, { externalId: '7', name: 'Crown' }))
    ).rejects.toThrow(ConflictError);

    const [, after] = await store.loadAll();
    expect(after).toEqual(crown);
  });

  it('leaves the store alone on a dry run', async () => {
    const store = new InMemoryCatalogStore([makeEntryInput()]);
    const [stored] = await store.loadAll();
    const index = IdentityIndex.fromSnapshot([stored]);

    const result = await applyMerge(store, index, stored, recordFrom(stored, { name: 'Crown' }), {
      dryRun: true,
    });

    expect(result.outcome).toBe('updated');
    expect((await store.loadAll())[0].name).toBe('The Crown');
    expect(index.get('1')?.name).toBe('Crown');
  });
});
