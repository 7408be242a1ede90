/**
 * Record normalizer: raw scraper output -> typed VenueRecord.
 *
 * Two scraper generations feed this. The legacy one emits title-cased keys
 * ("Pub Name", "Inventory Stars": "Three star - ...", "Status": "Closed"),
 * the newer one integers and booleans. Coercion failures never throw; the
 * field gets its default and a ParseWarning is returned alongside.
 */

import type { ClassificationTier, VenueRecord } from '@pub-catalog/shared';
import { LoadError, type ParseWarning } from '../errors.js';

export type RawVenueRecord = Record<string, unknown>;

export interface NormalizeResult {
  record: VenueRecord;
  warnings: ParseWarning[];
}

// First key present wins
const FIELD_ALIASES = {
  name: ['name', 'Pub Name'],
  address: ['address', 'Address'],
  description: ['description', 'Description'],
  classificationTier: ['classificationTier', 'Inventory Stars'],
  listedGrade: ['listedGrade', 'Listed'],
  isOpen: ['isOpen', 'Open', 'Status'],
  latitude: ['latitude', 'Latitude'],
  longitude: ['longitude', 'Longitude'],
  url: ['url', 'Url'],
  externalId: ['externalId', 'Camra ID'],
} as const satisfies Record<keyof VenueRecord, readonly string[]>;

// Order matters: prefixes are tested top to bottom
const TIER_PREFIXES: ReadonlyArray<readonly [string, ClassificationTier]> = [
  ['three star', 3],
  ['two star', 2],
  ['one star', 1],
  ['zero star', 0],
];

const UNNAMED = '(unnamed)';

function isRecord(value: unknown): value is RawVenueRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((part) => typeof part === 'string');
}

function isTier(value: number): value is ClassificationTier {
  return value === 0 || value === 1 || value === 2 || value === 3;
}

function pick(raw: RawVenueRecord, field: keyof VenueRecord): unknown {
  for (const key of FIELD_ALIASES[field]) {
    if (raw[key] !== undefined) return raw[key];
  }
  return undefined;
}

class WarningCollector {
  readonly warnings: ParseWarning[] = [];

  constructor(private readonly recordName: string) {}

  add(field: string, rawValue: unknown, message: string): void {
    this.warnings.push({ field, rawValue, recordName: this.recordName, message });
  }
}

function toText(value: unknown, field: string, warn: WarningCollector): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value.trim();
  if (isStringArray(value)) {
    return value
      .map((part) => part.trim())
      .filter(Boolean)
      .join(', ');
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    warn.add(field, value, `expected text, coerced ${typeof value} to string`);
    return String(value);
  }
  warn.add(field, value, 'expected text, using empty string');
  return '';
}

function parseClassificationTier(value: unknown, warn: WarningCollector): ClassificationTier {
  if (value === undefined || value === null) return 0;

  if (typeof value === 'number') {
    if (isTier(value)) return value;
    warn.add('classificationTier', value, 'tier out of range, defaulting to 0');
    return 0;
  }

  if (typeof value === 'string') {
    const text = value.trim();
    if (text === '') return 0;
    if (/^[0-3]$/.test(text)) {
      const numeric = Number(text);
      if (isTier(numeric)) return numeric;
    }
    const lower = text.toLowerCase();
    for (const [prefix, tier] of TIER_PREFIXES) {
      if (lower.startsWith(prefix)) return tier;
    }
  }

  warn.add('classificationTier', value, 'unrecognised tier label, defaulting to 0');
  return 0;
}

function parseIsOpen(value: unknown, warn: WarningCollector): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') return !value.toLowerCase().includes('closed');
  warn.add('isOpen', value, 'unrecognised open status, assuming open');
  return true;
}

function parseCoordinate(
  value: unknown,
  field: 'latitude' | 'longitude',
  warn: WarningCollector
): number | null {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string' && value.trim() === '') return null;

  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value.trim()) : NaN;
  if (Number.isFinite(parsed)) return parsed;

  warn.add(field, value, `unparsable ${field}, leaving unset`);
  return null;
}

/**
 * Pull the numeric id off the end of a listing URL.
 * "https://example.org/pubs/the-crown-123/" -> "123"; slugs without a
 * trailing positive integer yield null.
 */
export function extractExternalIdFromUrl(url: string): string | null {
  const path = url.trim().split(/[?#]/)[0].replace(/\/+$/, '');
  if (!path) return null;

  const lastSegment = path.slice(path.lastIndexOf('/') + 1);
  const token = lastSegment.slice(lastSegment.lastIndexOf('-') + 1);
  if (!/^\d+$/.test(token) || /^0+$/.test(token)) return null;
  return token;
}

function parseExternalId(value: unknown, url: string, warn: WarningCollector): string | null {
  if (typeof value === 'string' && value.trim() !== '') return value.trim();
  if (typeof value === 'number' && Number.isInteger(value) && value > 0) return String(value);

  const isBlank = value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
  if (!isBlank) {
    warn.add('externalId', value, 'unusable externalId, deriving from url');
  }
  return extractExternalIdFromUrl(url);
}

/**
 * Normalize one raw record. Never throws.
 */
export function normalizeVenueRecord(raw: unknown): NormalizeResult {
  const source: RawVenueRecord = isRecord(raw) ? raw : {};

  const rawName = pick(source, 'name');
  const recordName = typeof rawName === 'string' && rawName.trim() ? rawName.trim() : UNNAMED;
  const warn = new WarningCollector(recordName);

  if (!isRecord(raw)) {
    warn.add('*', raw, 'record is not an object, all fields defaulted');
  }

  const url = toText(pick(source, 'url'), 'url', warn);

  const record: VenueRecord = {
    externalId: parseExternalId(pick(source, 'externalId'), url, warn),
    name: toText(rawName, 'name', warn),
    address: toText(pick(source, 'address'), 'address', warn),
    description: toText(pick(source, 'description'), 'description', warn),
    classificationTier: parseClassificationTier(pick(source, 'classificationTier'), warn),
    listedGrade: toText(pick(source, 'listedGrade'), 'listedGrade', warn),
    isOpen: parseIsOpen(pick(source, 'isOpen'), warn),
    latitude: parseCoordinate(pick(source, 'latitude'), 'latitude', warn),
    longitude: parseCoordinate(pick(source, 'longitude'), 'longitude', warn),
    url,
  };

  return { record, warnings: warn.warnings };
}

/**
 * Normalize a whole scraped batch. The batch must be a JSON array; anything
 * else means the scraper output is unreadable and nothing should be touched.
 */
export function normalizeBatch(raw: unknown): NormalizeResult[] {
  if (!Array.isArray(raw)) {
    throw new LoadError('Venue batch must be an array of records');
  }
  return raw.map((item) => normalizeVenueRecord(item));
}
