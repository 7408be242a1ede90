/**
 * Diff & merge of an incoming record into the catalog entry it matched.
 *
 * computeMerge is pure: it decides which fields are dirty and which
 * transitions fire. applyMerge checks the externalId conflict guard, writes
 * the patch in a single store update and refreshes the session index.
 */

import type {
  CatalogEntry,
  CatalogPatch,
  ChangeRecord,
  ClassificationTier,
  MergeOutcome,
  Transition,
  VenueField,
  VenueRecord,
} from '@pub-catalog/shared';
import { ConflictError } from '../errors.js';
import type { CatalogStore } from '../catalogStore.js';
import { computeContentHash } from './fingerprint.js';
import type { IdentityIndex } from './identityIndex.js';

/** Overwritten whenever the incoming value differs */
const DIRECT_FIELDS = [
  'name',
  'address',
  'description',
  'classificationTier',
  'listedGrade',
  'isOpen',
  'url',
  'externalId',
] as const satisfies readonly VenueField[];

/** Only written while the stored value is still unset */
const FILL_ONCE_FIELDS = ['latitude', 'longitude'] as const satisfies readonly VenueField[];

const TOP_TIER: ClassificationTier = 3;

export interface MergePlan {
  fieldsChanged: VenueField[];
  patch: CatalogPatch;
  tierTransition: Transition<ClassificationTier> | null;
  openTransition: Transition<boolean> | null;
}

export interface MergeResult {
  outcome: MergeOutcome;
  plan: MergePlan;
  /** Present only for 'updated' */
  change: ChangeRecord | null;
  /** The entry as it stands after the merge */
  entry: CatalogEntry;
}

function stage<K extends VenueField>(patch: Partial<VenueRecord>, field: K, value: VenueRecord[K]): void {
  patch[field] = value;
}

/**
 * Tier transition only when tier 3 is entered or left
 */
export function detectTierTransition(
  stored: ClassificationTier,
  incoming: ClassificationTier
): Transition<ClassificationTier> | null {
  if ((stored === TOP_TIER) === (incoming === TOP_TIER)) return null;
  return { from: stored, to: incoming };
}

/**
 * Open/closed transition, only log-worthy when either side is tier 3
 */
export function detectOpenTransition(
  stored: Pick<VenueRecord, 'isOpen' | 'classificationTier'>,
  incoming: Pick<VenueRecord, 'isOpen' | 'classificationTier'>
): Transition<boolean> | null {
  if (stored.isOpen === incoming.isOpen) return null;
  if (stored.classificationTier !== TOP_TIER && incoming.classificationTier !== TOP_TIER) return null;
  return { from: stored.isOpen, to: incoming.isOpen };
}

export function computeMerge(entry: CatalogEntry, record: VenueRecord): MergePlan {
  const fields: Partial<VenueRecord> = {};
  const fieldsChanged: VenueField[] = [];

  for (const field of DIRECT_FIELDS) {
    const incoming = record[field];
    // A blank id never erases a known one
    if (field === 'externalId' && (incoming === null || incoming === '')) continue;
    if (incoming !== entry[field]) {
      stage(fields, field, incoming);
      fieldsChanged.push(field);
    }
  }

  for (const field of FILL_ONCE_FIELDS) {
    const incoming = record[field];
    if (entry[field] === null && incoming !== null) {
      stage(fields, field, incoming);
      fieldsChanged.push(field);
    }
  }

  const patch: CatalogPatch = { ...fields };
  if (fields.address !== undefined) {
    patch.contentHash = computeContentHash(fields.address);
  }

  return {
    fieldsChanged,
    patch,
    tierTransition: detectTierTransition(entry.classificationTier, record.classificationTier),
    openTransition: detectOpenTransition(entry, record),
  };
}

export interface ApplyMergeOptions {
  /** Plan and guard only; the store is not written */
  dryRun?: boolean;
  now?: () => Date;
}

export async function applyMerge(
  store: CatalogStore,
  index: IdentityIndex,
  entry: CatalogEntry,
  record: VenueRecord,
  options: ApplyMergeOptions = {}
): Promise<MergeResult> {
  const plan = computeMerge(entry, record);
  if (plan.fieldsChanged.length === 0) {
    return { outcome: 'unchanged', plan, change: null, entry };
  }

  const newExternalId = plan.patch.externalId;
  if (newExternalId !== undefined && newExternalId !== null) {
    const owner = index.ownerOfExternalId(newExternalId);
    if (owner !== undefined && owner !== entry.catalogId) {
      throw new ConflictError(newExternalId, entry.catalogId, owner);
    }
  }

  if (!options.dryRun) {
    await store.update(entry.catalogId, plan.patch);
  }

  const merged: CatalogEntry = { ...entry, ...plan.patch };
  index.replace(merged);

  const now = options.now ?? (() => new Date());
  const change: ChangeRecord = {
    catalogId: entry.catalogId,
    fieldsChanged: plan.fieldsChanged,
    tierTransition: plan.tierTransition,
    openTransition: plan.openTransition,
    timestamp: now().toISOString(),
  };

  return { outcome: 'updated', plan, change, entry: merged };
}
