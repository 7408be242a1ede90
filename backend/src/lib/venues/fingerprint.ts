import crypto from 'crypto';

/**
 * Content hash stored on every catalog entry: MD5 hex of the address.
 * Legacy rows without an externalId were deduplicated on it, so the value
 * has to stay byte-compatible with what older imports wrote.
 */
export function computeContentHash(address: string): string {
  return crypto.createHash('md5').update(address).digest('hex');
}
