import type { CatalogEntry } from '@pub-catalog/shared';
import { tokenSortKey } from './similarity.js';

/**
 * Order catalog ids: numeric ids by value ("2" before "10"), everything
 * else by plain string order, numeric ids first.
 */
export function compareCatalogIds(a: string, b: string): number {
  const aNumeric = /^\d+$/.test(a);
  const bNumeric = /^\d+$/.test(b);
  if (aNumeric && bNumeric) {
    const aDigits = a.replace(/^0+(?=\d)/, '');
    const bDigits = b.replace(/^0+(?=\d)/, '');
    if (aDigits.length !== bDigits.length) return aDigits.length - bDigits.length;
    if (aDigits !== bDigits) return aDigits < bDigits ? -1 : 1;
  } else if (aNumeric !== bNumeric) {
    return aNumeric ? -1 : 1;
  }
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Text the fuzzy tier compares: "{name} {address}" */
export function matchText(venue: { name: string; address: string }): string {
  return `${venue.name} ${venue.address}`;
}

function addressKey(address: string): string {
  return address.trim();
}

function appendOwner(keys: Map<string, string[]>, key: string, catalogId: string): void {
  const owners = keys.get(key);
  if (!owners) {
    keys.set(key, [catalogId]);
  } else if (!owners.includes(catalogId)) {
    owners.push(catalogId);
  }
}

function dropOwner(keys: Map<string, string[]>, key: string, catalogId: string): void {
  const owners = keys.get(key);
  if (!owners) return;
  const remaining = owners.filter((id) => id !== catalogId);
  if (remaining.length > 0) {
    keys.set(key, remaining);
  } else {
    keys.delete(key);
  }
}

/**
 * Lookup structures over one catalog snapshot, owned by a reconciliation
 * session. Built once while loading, then kept current as entries are
 * created or updated so later records in the same batch see them.
 *
 * When several entries share an externalId or address, the earliest indexed
 * one owns the key; if it moves away the key passes to the next.
 */
export class IdentityIndex {
  private readonly entries = new Map<string, CatalogEntry>();
  private readonly byExternalId = new Map<string, string[]>();
  private readonly byAddress = new Map<string, string[]>();
  private readonly matchKeys = new Map<string, string>();

  static fromSnapshot(snapshot: Iterable<CatalogEntry>): IdentityIndex {
    const index = new IdentityIndex();
    for (const entry of snapshot) {
      index.add(entry);
    }
    return index;
  }

  get size(): number {
    return this.entries.size;
  }

  get(catalogId: string): CatalogEntry | undefined {
    return this.entries.get(catalogId);
  }

  findByExternalId(externalId: string): CatalogEntry | undefined {
    const catalogId = this.ownerOfExternalId(externalId);
    return catalogId === undefined ? undefined : this.entries.get(catalogId);
  }

  findByAddress(address: string): CatalogEntry | undefined {
    const key = addressKey(address);
    if (!key) return undefined;
    const catalogId = this.byAddress.get(key)?.[0];
    return catalogId === undefined ? undefined : this.entries.get(catalogId);
  }

  ownerOfExternalId(externalId: string): string | undefined {
    return this.byExternalId.get(externalId)?.[0];
  }

  /** tokenSortKey of the entry's match text, cached per entry */
  matchKey(catalogId: string): string {
    return this.matchKeys.get(catalogId) ?? '';
  }

  /** Entries in insertion order */
  all(): CatalogEntry[] {
    return [...this.entries.values()];
  }

  add(entry: CatalogEntry): void {
    if (this.entries.has(entry.catalogId)) {
      this.replace(entry);
      return;
    }
    this.entries.set(entry.catalogId, entry);
    if (entry.externalId !== null) {
      appendOwner(this.byExternalId, entry.externalId, entry.catalogId);
    }
    const address = addressKey(entry.address);
    if (address) {
      appendOwner(this.byAddress, address, entry.catalogId);
    }
    this.matchKeys.set(entry.catalogId, tokenSortKey(matchText(entry)));
  }

  /**
   * Swap in the post-merge version of an entry. Keys it keeps stay in place;
   * keys it leaves go to the next owner, new keys queue behind existing ones.
   */
  replace(entry: CatalogEntry): void {
    const previous = this.entries.get(entry.catalogId);
    if (!previous) {
      this.add(entry);
      return;
    }
    this.entries.set(entry.catalogId, entry);
    this.rekey(this.byExternalId, previous.externalId ?? '', entry.externalId ?? '', entry.catalogId);
    this.rekey(this.byAddress, addressKey(previous.address), addressKey(entry.address), entry.catalogId);
    this.matchKeys.set(entry.catalogId, tokenSortKey(matchText(entry)));
  }

  private rekey(keys: Map<string, string[]>, before: string, after: string, catalogId: string): void {
    if (before === after) return;
    if (before) dropOwner(keys, before, catalogId);
    if (after) appendOwner(keys, after, catalogId);
  }
}
