import { z } from 'zod';
import { describeError } from './errors.js';
import { logger } from './logger.js';

export interface GeocodingResult {
  lat: number;
  lng: number;
  confidence: number;
  normalizedAddress: string;
  provider: string;
}

export interface Geocoder {
  /** Resolves to null when the query cannot be placed */
  geocode(query: string): Promise<GeocodingResult | null>;
}

/**
 * Nominatim search response (format=json), reduced to what we read
 */
const nominatimResponseSchema = z.array(
  z.object({
    lat: z.string(),
    lon: z.string(),
    display_name: z.string(),
    importance: z.number().optional(),
  })
);

export interface NominatimOptions {
  baseUrl: string;
  userAgent: string;
  /** Comma separated ISO 3166-1 codes, empty for no restriction */
  countryCodes?: string;
  /** Nominatim's usage policy allows one request per second */
  minIntervalMs?: number;
  fetch?: typeof fetch;
}

const MIN_QUERY_LENGTH = 5;

export class NominatimGeocoder implements Geocoder {
  private lastRequest = 0;
  private readonly fetchFn: typeof fetch;
  private readonly minIntervalMs: number;

  constructor(private readonly options: NominatimOptions) {
    this.fetchFn = options.fetch ?? fetch;
    this.minIntervalMs = options.minIntervalMs ?? 1100;
  }

  private async waitForRateLimit(): Promise<void> {
    const sinceLast = Date.now() - this.lastRequest;
    if (sinceLast < this.minIntervalMs) {
      await new Promise((resolve) => setTimeout(resolve, this.minIntervalMs - sinceLast));
    }
    this.lastRequest = Date.now();
  }

  async geocode(query: string): Promise<GeocodingResult | null> {
    if (query.trim().length < MIN_QUERY_LENGTH) {
      return null;
    }
    await this.waitForRateLimit();

    const params = new URLSearchParams({ q: query, format: 'json', limit: '1' });
    if (this.options.countryCodes) {
      params.set('countrycodes', this.options.countryCodes);
    }

    try {
      const response = await this.fetchFn(`${this.options.baseUrl}/search?${params}`, {
        headers: {
          'User-Agent': this.options.userAgent,
          Accept: 'application/json',
        },
      });

      if (!response.ok) {
        logger.warn('Nominatim request failed', { status: response.status, query });
        return null;
      }

      const parsed = nominatimResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        logger.warn('Unexpected Nominatim response', { query, error: parsed.error.issues[0]?.message });
        return null;
      }

      const [best] = parsed.data;
      if (!best) {
        logger.info('No geocoding results', { query });
        return null;
      }

      const lat = Number.parseFloat(best.lat);
      const lng = Number.parseFloat(best.lon);
      if (!Number.isFinite(lat) || !Number.isFinite(lng)) {
        return null;
      }

      return {
        lat,
        lng,
        confidence: Math.min(1, best.importance ?? 0.5),
        normalizedAddress: best.display_name,
        provider: 'nominatim',
      };
    } catch (error) {
      logger.error('Geocoding error', { error: describeError(error), query });
      return null;
    }
  }
}
