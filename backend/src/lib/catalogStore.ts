/**
 * Catalog storage. Reconciliation only needs a key-addressable record store:
 * load a snapshot, create, patch by id, and wipe for fresh imports.
 */

import { randomUUID } from 'crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { CatalogEntry, CatalogEntryInput, CatalogPatch } from '@pub-catalog/shared';
import { compareCatalogIds } from './venues/identityIndex.js';

export interface CatalogStore {
  /** Every entry, ordered by catalogId */
  loadAll(): Promise<CatalogEntry[]>;
  /** Insert and return the entry with its freshly assigned catalogId */
  create(fields: CatalogEntryInput): Promise<CatalogEntry>;
  update(catalogId: string, patch: CatalogPatch): Promise<void>;
  /** Remove every entry; resolves to how many were removed */
  clear(): Promise<number>;
}

/**
 * Map-backed store. Ids are sequential integers rendered as strings and are
 * never handed out twice, not even after clear().
 */
export class InMemoryCatalogStore implements CatalogStore {
  private readonly entries = new Map<string, CatalogEntry>();
  private nextId = 1;

  constructor(initial: CatalogEntryInput[] = []) {
    for (const fields of initial) {
      this.insert(fields);
    }
  }

  async loadAll(): Promise<CatalogEntry[]> {
    return [...this.entries.values()]
      .map((entry) => ({ ...entry }))
      .sort((a, b) => compareCatalogIds(a.catalogId, b.catalogId));
  }

  async create(fields: CatalogEntryInput): Promise<CatalogEntry> {
    return { ...this.insert(fields) };
  }

  async update(catalogId: string, patch: CatalogPatch): Promise<void> {
    const existing = this.entries.get(catalogId);
    if (!existing) {
      throw new Error(`Catalog entry ${catalogId} not found`);
    }
    this.entries.set(catalogId, { ...existing, ...patch, catalogId });
  }

  async clear(): Promise<number> {
    const removed = this.entries.size;
    this.entries.clear();
    return removed;
  }

  private insert(fields: CatalogEntryInput): CatalogEntry {
    const entry: CatalogEntry = { ...fields, catalogId: String(this.nextId++) };
    this.entries.set(entry.catalogId, entry);
    return entry;
  }
}

const tierSchema = z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(3)]);

export const catalogEntrySchema = z.object({
  catalogId: z.string().min(1),
  contentHash: z.string(),
  externalId: z.string().nullable(),
  name: z.string(),
  address: z.string(),
  description: z.string(),
  classificationTier: tierSchema,
  listedGrade: z.string(),
  isOpen: z.boolean(),
  latitude: z.number().nullable(),
  longitude: z.number().nullable(),
  url: z.string(),
});

const catalogFileSchema = z.object({
  nextId: z.number().int().positive(),
  entries: z.array(catalogEntrySchema),
});

type CatalogFile = z.infer<typeof catalogFileSchema>;

function nextFreeId(file: CatalogFile): number {
  let next = file.nextId;
  for (const entry of file.entries) {
    if (/^\d+$/.test(entry.catalogId)) {
      next = Math.max(next, Number(entry.catalogId) + 1);
    }
  }
  return next;
}

/**
 * Catalog kept in one JSON file. Every call reads the file afresh and every
 * mutation replaces it atomically (temp file + rename), so several processes
 * can share it as long as batches are serialised by a BatchLock.
 * A missing file is an empty catalog.
 */
export class JsonFileCatalogStore implements CatalogStore {
  private constructor(private readonly filePath: string) {}

  /** Fails early when the file exists but is not a catalog */
  static async open(filePath: string): Promise<JsonFileCatalogStore> {
    const store = new JsonFileCatalogStore(filePath);
    await store.read();
    return store;
  }

  async loadAll(): Promise<CatalogEntry[]> {
    const file = await this.read();
    return file.entries.sort((a, b) => compareCatalogIds(a.catalogId, b.catalogId));
  }

  async create(fields: CatalogEntryInput): Promise<CatalogEntry> {
    const file = await this.read();
    const entry: CatalogEntry = { ...fields, catalogId: String(file.nextId) };
    await this.write({ nextId: file.nextId + 1, entries: [...file.entries, entry] });
    return { ...entry };
  }

  async update(catalogId: string, patch: CatalogPatch): Promise<void> {
    const file = await this.read();
    const position = file.entries.findIndex((entry) => entry.catalogId === catalogId);
    if (position === -1) {
      throw new Error(`Catalog entry ${catalogId} not found`);
    }
    const entries = [...file.entries];
    entries[position] = { ...entries[position], ...patch, catalogId };
    await this.write({ nextId: file.nextId, entries });
  }

  async clear(): Promise<number> {
    const file = await this.read();
    await this.write({ nextId: file.nextId, entries: [] });
    return file.entries.length;
  }

  private async read(): Promise<CatalogFile> {
    let contents: string;
    try {
      contents = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return { nextId: 1, entries: [] };
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(contents);
    } catch (error) {
      throw new Error(`${this.filePath} is not a catalog file: invalid JSON`, { cause: error });
    }
    const parsed = catalogFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`${this.filePath} is not a catalog file: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return { nextId: nextFreeId(parsed.data), entries: parsed.data.entries };
  }

  private async write(data: CatalogFile): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${randomUUID()}.tmp`;
    try {
      await writeFile(tempPath, JSON.stringify(data, null, 2) + '\n', 'utf8');
      await rename(tempPath, this.filePath);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }
}
