import { InjectionToken, inject } from '@angular/core';
import { FIRST_RESPONSE_ENVIRONMENT } from '../environments/environment.token';
import {
  BrowserGeolocationPlatform,
  BrowserUrlLauncher,
  detectRuntimePlatform,
} from './browser-location.platform';
import { NominatimReverseGeocoder } from './nominatim-geocoder';

// Device capabilities LocationService depends on. Each token has a default
// backed by the host; tests and native shells provide their own.

export interface DevicePosition {
  latitude: number;
  longitude: number;
  /** Metres, when the platform reports it */
  accuracy?: number;
  /** Epoch ms of the fix */
  timestamp: number;
}

export type LocationPermission = 'denied' | 'deniedForever' | 'whileInUse' | 'always' | 'unableToDetermine';

export type LocationAccuracy = 'low' | 'medium' | 'high';

export interface PositionRequest {
  accuracy: LocationAccuracy;
  timeLimitMs: number;
}

export interface GeolocationPlatform {
  isLocationServiceEnabled(): Promise<boolean>;
  checkPermission(): Promise<LocationPermission>;
  requestPermission(): Promise<LocationPermission>;
  /** Rejects with PositionTimeoutError when the platform gives up on its own time limit */
  getCurrentPosition(request: PositionRequest): Promise<DevicePosition>;
  /** Last fix the platform already holds; never triggers a new one */
  getLastKnownPosition(): Promise<DevicePosition | null>;
}

export interface Placemark {
  street?: string;
  locality?: string;
  administrativeArea?: string;
  country?: string;
}

export interface ReverseGeocoder {
  placemarkFromCoordinates(latitude: number, longitude: number): Promise<Placemark[]>;
}

export interface UrlLauncher {
  canLaunch(url: string): Promise<boolean>;
  launch(url: string): Promise<boolean>;
}

export type OperatingSystem = 'ios' | 'android' | 'macos' | 'windows' | 'linux' | 'other';

export interface RuntimePlatform {
  /** Running inside a browser page */
  isWeb: boolean;
  os: OperatingSystem;
}

export const GEOLOCATION_PLATFORM = new InjectionToken<GeolocationPlatform>('GEOLOCATION_PLATFORM', {
  providedIn: 'root',
  factory: () => new BrowserGeolocationPlatform(),
});

export const REVERSE_GEOCODER = new InjectionToken<ReverseGeocoder>('REVERSE_GEOCODER', {
  providedIn: 'root',
  factory: () => new NominatimReverseGeocoder(inject(FIRST_RESPONSE_ENVIRONMENT).geocoder),
});

export const URL_LAUNCHER = new InjectionToken<UrlLauncher>('URL_LAUNCHER', {
  providedIn: 'root',
  factory: () => new BrowserUrlLauncher(),
});

export const RUNTIME_PLATFORM = new InjectionToken<RuntimePlatform>('RUNTIME_PLATFORM', {
  providedIn: 'root',
  factory: detectRuntimePlatform,
});
