import { LocationUnavailableError, PositionTimeoutError } from './location.errors';
import type {
  DevicePosition,
  GeolocationPlatform,
  LocationPermission,
  OperatingSystem,
  PositionRequest,
  RuntimePlatform,
  UrlLauncher,
} from './location.platform';

function hasGeolocation(): boolean {
  return typeof navigator !== 'undefined' && 'geolocation' in navigator;
}

function toDevicePosition(pos: GeolocationPosition): DevicePosition {
  return {
    latitude: pos.coords.latitude,
    longitude: pos.coords.longitude,
    accuracy: pos.coords.accuracy,
    timestamp: pos.timestamp,
  };
}

/**
 * navigator.geolocation behind the GeolocationPlatform contract.
 * A permission that is still 'prompt' reports as 'denied' so callers ask for it.
 */
export class BrowserGeolocationPlatform implements GeolocationPlatform {
  private lastKnown: DevicePosition | null = null;

  async isLocationServiceEnabled(): Promise<boolean> {
    return hasGeolocation();
  }

  async checkPermission(): Promise<LocationPermission> {
    if (typeof navigator === 'undefined' || !navigator.permissions) {
      return 'unableToDetermine';
    }
    const status = await navigator.permissions.query({ name: 'geolocation' });
    switch (status.state) {
      case 'granted':
        return 'whileInUse';
      case 'prompt':
        return 'denied';
      default:
        return 'deniedForever';
    }
  }

  async requestPermission(): Promise<LocationPermission> {
    // Browsers only prompt as a side effect of asking for a fix.
    try {
      await this.getCurrentPosition({ accuracy: 'low', timeLimitMs: 30_000 });
      return 'whileInUse';
    } catch (err) {
      if (err instanceof LocationUnavailableError && err.message === 'Permission denied') {
        return 'denied';
      }
      return 'whileInUse';
    }
  }

  getCurrentPosition(request: PositionRequest): Promise<DevicePosition> {
    return this.query({
      enableHighAccuracy: request.accuracy === 'high',
      timeout: request.timeLimitMs,
      maximumAge: 0,
    }).then(pos => {
      this.lastKnown = pos;
      return pos;
    });
  }

  async getLastKnownPosition(): Promise<DevicePosition | null> {
    if (this.lastKnown) return this.lastKnown;
    try {
      // maximumAge Infinity with a zero timeout returns the browser's cached fix or fails fast.
      return await this.query({ enableHighAccuracy: false, timeout: 0, maximumAge: Infinity });
    } catch {
      return null;
    }
  }

  private query(options: PositionOptions): Promise<DevicePosition> {
    return new Promise((resolve, reject) => {
      if (!hasGeolocation()) {
        reject(new LocationUnavailableError('Geolocation not supported'));
        return;
      }
      navigator.geolocation.getCurrentPosition(
        pos => resolve(toDevicePosition(pos)),
        err => {
          if (err.code === err.TIMEOUT) {
            reject(new PositionTimeoutError(options.timeout ?? 0));
          } else if (err.code === err.PERMISSION_DENIED) {
            reject(new LocationUnavailableError('Permission denied'));
          } else {
            reject(new LocationUnavailableError(err.message || 'Position unavailable'));
          }
        },
        options
      );
    });
  }
}

/**
 * Opens map links in a new browsing context. Only http(s) links can be handled
 * by a page; geo: URIs need a native handler.
 */
export class BrowserUrlLauncher implements UrlLauncher {
  async canLaunch(url: string): Promise<boolean> {
    return typeof window !== 'undefined' && /^https?:\/\//i.test(url);
  }

  async launch(url: string): Promise<boolean> {
    if (typeof window === 'undefined') return false;
    return window.open(url, '_blank') !== null;
  }
}

export function detectRuntimePlatform(): RuntimePlatform {
  const isWeb = typeof window !== 'undefined' && typeof document !== 'undefined';
  let hint = '';
  if (isWeb && typeof navigator !== 'undefined') {
    hint = navigator.userAgent;
  } else if (typeof process !== 'undefined') {
    hint = process.platform;
  }
  return { isWeb, os: osFromHint(hint) };
}

export function osFromHint(hint: string): OperatingSystem {
  const h = hint.toLowerCase();
  // Android user agents also say "Linux"; "darwin" contains "win".
  if (/iphone|ipad|ipod/.test(h)) return 'ios';
  if (h.includes('android')) return 'android';
  if (h.includes('mac') || h.includes('darwin')) return 'macos';
  if (h.includes('win')) return 'windows';
  if (h.includes('linux')) return 'linux';
  return 'other';
}
