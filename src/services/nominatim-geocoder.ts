import { z } from 'zod';
import type { GeocoderSettings } from '../environments/environment.types';
import type { Placemark, ReverseGeocoder } from './location.platform';

/**
 * The subset of a Nominatim `/reverse?format=jsonv2` response we read.
 * Unknown keys are ignored; an error payload carries no `address`.
 */
export const nominatimReverseSchema = z.object({
  address: z
    .object({
      house_number: z.string().optional(),
      road: z.string().optional(),
      city: z.string().optional(),
      town: z.string().optional(),
      village: z.string().optional(),
      hamlet: z.string().optional(),
      state: z.string().optional(),
      country: z.string().optional(),
    })
    .optional(),
});

export type NominatimReverseResponse = z.infer<typeof nominatimReverseSchema>;

export function toPlacemark(address: NonNullable<NominatimReverseResponse['address']>): Placemark {
  return {
    street: address.road ? [address.house_number, address.road].filter(Boolean).join(' ') : undefined,
    locality: address.city ?? address.town ?? address.village ?? address.hamlet,
    administrativeArea: address.state,
    country: address.country,
  };
}

export class NominatimReverseGeocoder implements ReverseGeocoder {
  constructor(private readonly settings: GeocoderSettings) {}

  async placemarkFromCoordinates(latitude: number, longitude: number): Promise<Placemark[]> {
    const params = new URLSearchParams({
      format: 'jsonv2',
      lat: String(latitude),
      lon: String(longitude),
    });
    const response = await fetch(`${this.settings.baseUrl.replace(/\/+$/, '')}/reverse?${params}`, {
      headers: {
        Accept: 'application/json',
        'User-Agent': this.settings.userAgent,
      },
      signal: AbortSignal.timeout(this.settings.timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`Reverse geocoding failed with HTTP ${response.status}`);
    }

    const body = nominatimReverseSchema.parse(await response.json());
    return body.address ? [toPlacemark(body.address)] : [];
  }
}
