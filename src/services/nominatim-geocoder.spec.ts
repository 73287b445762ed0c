import { afterEach, describe, expect, it, vi } from 'vitest';
import { NominatimReverseGeocoder, toPlacemark } from './nominatim-geocoder';

function stubFetch(body: unknown, status = 200) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response(JSON.stringify(body), { status }));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('NominatimReverseGeocoder', () => {
  const geocoder = new NominatimReverseGeocoder({
    baseUrl: 'https://nominatim.example/',
    userAgent: 'first-response-kit/test',
    timeoutMs: 5_000,
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('queries the reverse endpoint with the coordinates', async () => {
    const fetchMock = stubFetch({ address: { road: 'Quay Street' } });

    await geocoder.placemarkFromCoordinates(51.5, -0.12);

    expect(fetchMock).toHaveBeenCalledWith('https://nominatim.example/reverse?format=jsonv2&lat=51.5&lon=-0.12', {
      headers: { Accept: 'application/json', 'User-Agent': 'first-response-kit/test' },
      signal: expect.any(AbortSignal),
    });
  });

  it('aborts a request that outlives the configured time limit', async () => {
    const fetchMock = vi.fn(
      (_url: string, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;
          signal?.addEventListener('abort', () => reject(signal.reason));
        })
    );
    vi.stubGlobal('fetch', fetchMock);
    const slow = new NominatimReverseGeocoder({
      baseUrl: 'https://nominatim.example',
      userAgent: 'first-response-kit/test',
      timeoutMs: 20,
    });

    await expect(slow.placemarkFromCoordinates(0, 0)).rejects.toMatchObject({ name: 'TimeoutError' });
  });

  it('maps the address into a placemark', async () => {
    stubFetch({
      display_name: 'ignored',
      address: {
        house_number: '221B',
        road: 'Baker Street',
        city: 'London',
        state: 'England',
        country: 'United Kingdom',
        postcode: 'NW1 6XE',
      },
    });

    expect(await geocoder.placemarkFromCoordinates(51.5237, -0.1585)).toEqual([
      { street: '221B Baker Street', locality: 'London', administrativeArea: 'England', country: 'United Kingdom' },
    ]);
  });

  it('returns no placemarks for an error payload', async () => {
    stubFetch({ error: 'Unable to geocode' });

    expect(await geocoder.placemarkFromCoordinates(0, 0)).toEqual([]);
  });

  it('rejects on an HTTP error', async () => {
    stubFetch({}, 503);

    await expect(geocoder.placemarkFromCoordinates(0, 0)).rejects.toThrow('Reverse geocoding failed with HTTP 503');
  });

  it('rejects a response of the wrong shape', async () => {
    stubFetch({ address: { road: 12 } });

    await expect(geocoder.placemarkFromCoordinates(0, 0)).rejects.toThrow();
  });
});

describe('toPlacemark', () => {
  it('uses the smallest named settlement as the locality', () => {
    expect(toPlacemark({ town: 'Whitby' }).locality).toBe('Whitby');
    expect(toPlacemark({ village: 'Grasmere', hamlet: 'Town End' }).locality).toBe('Grasmere');
  });

  it('leaves the street empty without a road', () => {
    expect(toPlacemark({ house_number: '4' }).street).toBeUndefined();
    expect(toPlacemark({ road: 'High Street' }).street).toBe('High Street');
  });
});
