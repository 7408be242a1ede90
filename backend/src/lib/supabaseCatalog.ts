/**
 * Catalog store on a Supabase (Postgres) table.
 *
 * Columns are snake_case; `id` is a bigint identity, so catalog ids are
 * assigned by the database and never reused.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { CatalogEntry, CatalogEntryInput, CatalogPatch } from '@pub-catalog/shared';
import type { CatalogStore } from './catalogStore.js';

const PAGE_SIZE = 1000;

const tierSchema = z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(3)]);

export const venueRowSchema = z.object({
  id: z.union([z.number().int(), z.string()]).transform(String),
  external_id: z.string().nullable(),
  name: z.string(),
  address: z.string(),
  description: z.string().nullable().transform((value) => value ?? ''),
  classification_tier: tierSchema,
  listed_grade: z.string().nullable().transform((value) => value ?? ''),
  is_open: z.boolean(),
  latitude: z.number().nullable(),
  longitude: z.number().nullable(),
  url: z.string().nullable().transform((value) => value ?? ''),
  content_hash: z.string(),
});

export type VenueRow = z.input<typeof venueRowSchema>;
type VenueColumns = Omit<VenueRow, 'id'>;

const COLUMN_BY_FIELD = {
  externalId: 'external_id',
  name: 'name',
  address: 'address',
  description: 'description',
  classificationTier: 'classification_tier',
  listedGrade: 'listed_grade',
  isOpen: 'is_open',
  latitude: 'latitude',
  longitude: 'longitude',
  url: 'url',
  contentHash: 'content_hash',
} as const satisfies Record<keyof CatalogEntryInput, keyof VenueColumns>;

export function rowToEntry(row: unknown): CatalogEntry {
  const parsed = venueRowSchema.parse(row);
  return {
    catalogId: parsed.id,
    externalId: parsed.external_id,
    name: parsed.name,
    address: parsed.address,
    description: parsed.description,
    classificationTier: parsed.classification_tier,
    listedGrade: parsed.listed_grade,
    isOpen: parsed.is_open,
    latitude: parsed.latitude,
    longitude: parsed.longitude,
    url: parsed.url,
    contentHash: parsed.content_hash,
  };
}

function setColumn<K extends keyof VenueColumns>(row: Partial<VenueColumns>, column: K, value: VenueColumns[K]): void {
  row[column] = value;
}

/**
 * Only the fields present in the patch become columns
 */
export function patchToRow(patch: CatalogPatch): Partial<VenueColumns> {
  const row: Partial<VenueColumns> = {};
  if (patch.externalId !== undefined) setColumn(row, COLUMN_BY_FIELD.externalId, patch.externalId);
  if (patch.name !== undefined) setColumn(row, COLUMN_BY_FIELD.name, patch.name);
  if (patch.address !== undefined) setColumn(row, COLUMN_BY_FIELD.address, patch.address);
  if (patch.description !== undefined) setColumn(row, COLUMN_BY_FIELD.description, patch.description);
  if (patch.classificationTier !== undefined) {
    setColumn(row, COLUMN_BY_FIELD.classificationTier, patch.classificationTier);
  }
  if (patch.listedGrade !== undefined) setColumn(row, COLUMN_BY_FIELD.listedGrade, patch.listedGrade);
  if (patch.isOpen !== undefined) setColumn(row, COLUMN_BY_FIELD.isOpen, patch.isOpen);
  if (patch.latitude !== undefined) setColumn(row, COLUMN_BY_FIELD.latitude, patch.latitude);
  if (patch.longitude !== undefined) setColumn(row, COLUMN_BY_FIELD.longitude, patch.longitude);
  if (patch.url !== undefined) setColumn(row, COLUMN_BY_FIELD.url, patch.url);
  if (patch.contentHash !== undefined) setColumn(row, COLUMN_BY_FIELD.contentHash, patch.contentHash);
  return row;
}

export class SupabaseCatalogStore implements CatalogStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly table = 'venues'
  ) {}

  async loadAll(): Promise<CatalogEntry[]> {
    const entries: CatalogEntry[] = [];
    for (let from = 0; ; from += PAGE_SIZE) {
      const { data, error } = await this.client
        .from(this.table)
        .select('*')
        .order('id', { ascending: true })
        .range(from, from + PAGE_SIZE - 1);
      if (error) {
        throw new Error(`Supabase select on ${this.table} failed: ${error.message}`);
      }
      const rows: unknown[] = data ?? [];
      entries.push(...rows.map(rowToEntry));
      if (rows.length < PAGE_SIZE) return entries;
    }
  }

  async create(fields: CatalogEntryInput): Promise<CatalogEntry> {
    const { data, error } = await this.client
      .from(this.table)
      .insert(patchToRow(fields))
      .select('*')
      .single();
    if (error) {
      throw new Error(`Supabase insert into ${this.table} failed: ${error.message}`);
    }
    return rowToEntry(data);
  }

  async update(catalogId: string, patch: CatalogPatch): Promise<void> {
    const { error } = await this.client
      .from(this.table)
      .update(patchToRow(patch))
      .eq('id', catalogId);
    if (error) {
      throw new Error(`Supabase update of ${this.table}/${catalogId} failed: ${error.message}`);
    }
  }

  async clear(): Promise<number> {
    const { count, error } = await this.client
      .from(this.table)
      .delete({ count: 'exact' })
      .not('id', 'is', null);
    if (error) {
      throw new Error(`Supabase delete on ${this.table} failed: ${error.message}`);
    }
    return count ?? 0;
  }
}
