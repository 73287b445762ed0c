import { Injectable, inject, signal } from '@angular/core';
import { firstValueFrom, from, TimeoutError } from 'rxjs';
import { timeout } from 'rxjs/operators';
import { FIRST_RESPONSE_ENVIRONMENT } from '../environments/environment.token';
import { PositionTimeoutError } from './location.errors';
import {
  GEOLOCATION_PLATFORM,
  REVERSE_GEOCODER,
  RUNTIME_PLATFORM,
  URL_LAUNCHER,
  type DevicePosition,
  type PositionRequest,
} from './location.platform';
import { LoggerService } from './logger.service';

export type LocationOutcome =
  | { kind: 'ok'; address: string; cached: boolean }
  | { kind: 'denied' }
  | { kind: 'timeout'; staleAddress?: string }
  | { kind: 'unavailable' };

export const LOCATION_MESSAGES = {
  denied: 'Location access denied.',
  timeout: 'Unable to get location (timeout).',
  unavailable: 'Unable to determine location.',
  staleSuffix: ' (stale)',
} as const;

export interface MapUrls {
  apple: string;
  google: string;
  geo: string;
}

interface CachedLocation {
  position: DevicePosition;
  address: string;
  fetchedAt: number;
}

export function formatCoordinates(position: Pick<DevicePosition, 'latitude' | 'longitude'>): string {
  return `Lat: ${position.latitude.toFixed(5)}, Lon: ${position.longitude.toFixed(5)}`;
}

export function buildMapUrls(latitude: number, longitude: number): MapUrls {
  const coord = `${latitude},${longitude}`;
  return {
    apple: `https://maps.apple.com/?q=${coord}`,
    google: `https://www.google.com/maps/search/?api=1&query=${coord}`,
    geo: `geo:${coord}?q=${coord}`,
  };
}

export function describeLocationOutcome(outcome: LocationOutcome): string {
  switch (outcome.kind) {
    case 'ok':
      return outcome.address;
    case 'denied':
      return LOCATION_MESSAGES.denied;
    case 'timeout':
      return outcome.staleAddress !== undefined
        ? `${outcome.staleAddress}${LOCATION_MESSAGES.staleSuffix}`
        : LOCATION_MESSAGES.timeout;
    case 'unavailable':
      return LOCATION_MESSAGES.unavailable;
  }
}

/**
 * Device position, address lookup and map hand-off.
 *
 * The last resolved address is reused for `location.cacheTtlMs`. Every public
 * method resolves; failures surface as outcomes, sentinel strings or `false`.
 */
@Injectable({ providedIn: 'root' })
export class LocationService {
  private geolocation = inject(GEOLOCATION_PLATFORM);
  private geocoder = inject(REVERSE_GEOCODER);
  private launcher = inject(URL_LAUNCHER);
  private runtime = inject(RUNTIME_PLATFORM);
  private settings = inject(FIRST_RESPONSE_ENVIRONMENT).location;
  private logger = inject(LoggerService).createChild('LocationService');

  /** Most recent position from any source, fresh or not */
  lastPosition = signal<DevicePosition | null>(null);
  isLocating = signal(false);

  private cache: CachedLocation | null = null;
  private inFlight: Promise<LocationOutcome> | null = null;

  async resolvePermission(): Promise<boolean> {
    try {
      if (!(await this.geolocation.isLocationServiceEnabled())) {
        this.logger.warn('Location services disabled');
        return false;
      }

      let permission = await this.geolocation.checkPermission();
      if (permission === 'denied') {
        permission = await this.geolocation.requestPermission();
        if (permission === 'denied') {
          this.logger.warn('Location permission denied');
          return false;
        }
      }

      if (permission === 'deniedForever') {
        this.logger.warn('Location permission permanently denied');
        return false;
      }

      return true;
    } catch (err) {
      this.logger.error('Permission check failed', err);
      return false;
    }
  }

  /**
   * Typed form of getCurrentLocation(). Calls made while a lookup is running
   * share it.
   */
  resolveCurrentLocation(): Promise<LocationOutcome> {
    if (!this.inFlight) {
      this.isLocating.set(true);
      this.inFlight = this.locate().finally(() => {
        this.inFlight = null;
        this.isLocating.set(false);
      });
    }
    return this.inFlight;
  }

  async getCurrentLocation(): Promise<string> {
    return describeLocationOutcome(await this.resolveCurrentLocation());
  }

  async openLocationInMap(): Promise<boolean> {
    let target = this.lastPosition();
    if (!target) {
      if (!(await this.resolvePermission())) return false;
      try {
        target = await this.fetchPosition({ accuracy: 'medium', timeLimitMs: this.settings.mapLookupTimeoutMs });
        this.lastPosition.set(target);
      } catch (err) {
        this.logger.warn('Medium accuracy fix failed, trying last known position', { error: String(err) });
        target = await this.lastKnownPosition();
      }
    }

    if (!target) {
      this.logger.warn('No position available for map launch');
      return false;
    }

    const urls = buildMapUrls(target.latitude, target.longitude);
    try {
      if (!this.runtime.isWeb && this.runtime.os === 'ios' && (await this.launcher.canLaunch(urls.apple))) {
        return await this.launcher.launch(urls.apple);
      }
      if (await this.launcher.canLaunch(urls.google)) {
        return await this.launcher.launch(urls.google);
      }
      if (await this.launcher.canLaunch(urls.geo)) {
        return await this.launcher.launch(urls.geo);
      }
      this.logger.warn('No map app available');
    } catch (err) {
      this.logger.error('Error launching map', err);
    }
    return false;
  }

  /**
   * Address for a position. Never rejects: geocoder failures and empty
   * results fall back to the raw coordinates.
   */
  async resolveAddress(position: DevicePosition): Promise<string> {
    const coords = formatCoordinates(position);
    if (this.runtime.isWeb) return `${coords} (Web)`;

    try {
      const places = await this.geocoder.placemarkFromCoordinates(position.latitude, position.longitude);
      const first = places[0];
      if (first) {
        const parts = [first.street, first.locality, first.administrativeArea, first.country].filter(
          (part): part is string => !!part
        );
        if (parts.length > 0) return parts.join(', ');
      }
    } catch (err) {
      this.logger.error('Geocoding failed', err, { latitude: position.latitude, longitude: position.longitude });
    }
    return coords;
  }

  private async locate(): Promise<LocationOutcome> {
    if (!(await this.resolvePermission())) {
      return { kind: 'denied' };
    }

    const cached = this.cache;
    if (cached && Date.now() - cached.fetchedAt < this.settings.cacheTtlMs) {
      this.logger.debug('Using cached address');
      return { kind: 'ok', address: cached.address, cached: true };
    }

    try {
      this.logger.debug('Fetching new position');
      const position = await this.fetchPosition({
        accuracy: 'high',
        timeLimitMs: this.settings.highAccuracyTimeoutMs,
      });
      const fetchedAt = Date.now();
      this.lastPosition.set(position);

      const address = await this.resolveAddress(position);
      this.cache = { position, address, fetchedAt };
      return { kind: 'ok', address, cached: false };
    } catch (err) {
      if (err instanceof TimeoutError || err instanceof PositionTimeoutError) {
        this.logger.warn('Position fetch timed out');
        const last = await this.lastKnownPosition();
        if (last) {
          this.lastPosition.set(last);
          return { kind: 'timeout', staleAddress: await this.resolveAddress(last) };
        }
        return { kind: 'timeout' };
      }
      this.logger.error('Error obtaining location', err);
      return { kind: 'unavailable' };
    }
  }

  private fetchPosition(request: PositionRequest): Promise<DevicePosition> {
    // The platform gets the limit too, but not every platform honours it.
    return firstValueFrom(from(this.geolocation.getCurrentPosition(request)).pipe(timeout(request.timeLimitMs)));
  }

  private async lastKnownPosition(): Promise<DevicePosition | null> {
    try {
      return await this.geolocation.getLastKnownPosition();
    } catch (err) {
      this.logger.error('Last known position unavailable', err);
      return null;
    }
  }
}
