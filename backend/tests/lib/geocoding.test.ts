import { afterEach, describe, it, expect, vi } from 'vitest';
import { NominatimGeocoder } from '../../src/lib/geocoding.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

const crownHit = {
  lat: '51.5072',
  lon: '-0.1276',
  display_name: 'The Crown, High Street, Oldtown',
  importance: 0.42,
};

function geocoderWith(fetchStub: typeof fetch, minIntervalMs = 0): NominatimGeocoder {
  return new NominatimGeocoder({
    baseUrl: 'https://geo.test',
    userAgent: 'pub-catalog-test',
    countryCodes: 'gb',
    minIntervalMs,
    fetch: fetchStub,
  });
}

describe('NominatimGeocoder', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns the position of the best hit', async () => {
    const fetchStub = vi.fn<typeof fetch>().mockImplementation(async () => jsonResponse([crownHit]));

    const result = await geocoderWith(fetchStub).geocode('The Crown, 1 High Street');

    expect(result).toEqual({
      lat: 51.5072,
      lng: -0.1276,
      confidence: 0.42,
      normalizedAddress: 'The Crown, High Street, Oldtown',
      provider: 'nominatim',
    });
    expect(fetchStub).toHaveBeenCalledWith(
      'https://geo.test/search?q=The+Crown%2C+1+High+Street&format=json&limit=1&countrycodes=gb',
      { headers: { 'User-Agent': 'pub-catalog-test', Accept: 'application/json' } }
    );
  });

  it('returns null when nothing is found', async () => {
    const fetchStub = vi.fn<typeof fetch>().mockImplementation(async () => jsonResponse([]));
    expect(await geocoderWith(fetchStub).geocode('Nowhere Lane 12')).toBeNull();
  });

  it('returns null when the service answers with an error', async () => {
    const fetchStub = vi.fn<typeof fetch>().mockImplementation(async () => jsonResponse({}, 503));
    expect(await geocoderWith(fetchStub).geocode('The Crown, 1 High Street')).toBeNull();
  });

  it('returns null when the response is not a result list', async () => {
    const fetchStub = vi.fn<typeof fetch>().mockImplementation(async () => jsonResponse({ error: 'bad' }));
    expect(await geocoderWith(fetchStub).geocode('The Crown, 1 High Street')).toBeNull();
  });

  it('returns null when the request fails', async () => {
    const fetchStub = vi.fn<typeof fetch>().mockRejectedValue(new Error('offline'));
    expect(await geocoderWith(fetchStub).geocode('The Crown, 1 High Street')).toBeNull();
  });

  it('does not send queries too short to place', async () => {
    const fetchStub = vi.fn<typeof fetch>();
    expect(await geocoderWith(fetchStub).geocode(' ab ')).toBeNull();
    expect(fetchStub).not.toHaveBeenCalled();
  });

  it('spaces requests by the minimum interval', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'Date'] });
    const fetchStub = vi.fn<typeof fetch>().mockImplementation(async () => jsonResponse([crownHit]));
    const geocoder = geocoderWith(fetchStub, 1000);

    await geocoder.geocode('The Crown, 1 High Street');
    const second = geocoder.geocode('The Crown, 1 High Street');

    await vi.advanceTimersByTimeAsync(999);
    expect(fetchStub).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1);
    await second;
    expect(fetchStub).toHaveBeenCalledTimes(2);
  });
});
