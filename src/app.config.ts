import type { Provider } from '@angular/core';
import { environment as defaultEnvironment } from './environments/environment';
import { FIRST_RESPONSE_ENVIRONMENT } from './environments/environment.token';
import type { Environment, GeocoderSettings, LocationSettings } from './environments/environment.types';
import { ASSET_SOURCE, FileAssetSource, type AssetSource } from './services/asset-source';
import {
  BrowserGeolocationPlatform,
  BrowserUrlLauncher,
  detectRuntimePlatform,
} from './services/browser-location.platform';
import {
  GEOLOCATION_PLATFORM,
  REVERSE_GEOCODER,
  RUNTIME_PLATFORM,
  URL_LAUNCHER,
  type GeolocationPlatform,
  type ReverseGeocoder,
  type RuntimePlatform,
  type UrlLauncher,
} from './services/location.platform';
import { LocationService } from './services/location.service';
import { LoggerService } from './services/logger.service';
import { MedicalKnowledgeService } from './services/medical-knowledge.service';
import { NominatimReverseGeocoder } from './services/nominatim-geocoder';

export type EnvironmentOverrides = Partial<Omit<Environment, 'location' | 'geocoder'>> & {
  location?: Partial<LocationSettings>;
  geocoder?: Partial<GeocoderSettings>;
};

export interface FirstResponseOptions {
  environment?: EnvironmentOverrides;
  geolocation?: GeolocationPlatform;
  geocoder?: ReverseGeocoder;
  launcher?: UrlLauncher;
  runtime?: RuntimePlatform;
  assets?: AssetSource;
}

export function resolveEnvironment(overrides: EnvironmentOverrides = {}): Environment {
  return {
    ...defaultEnvironment,
    ...overrides,
    location: { ...defaultEnvironment.location, ...overrides.location },
    geocoder: { ...defaultEnvironment.geocoder, ...overrides.geocoder },
  };
}

/**
 * Providers for both services and everything they consume. Host capabilities
 * not passed in fall back to the browser / filesystem defaults.
 */
export function provideFirstResponse(options: FirstResponseOptions = {}): Provider[] {
  const env = resolveEnvironment(options.environment);

  return [
    { provide: FIRST_RESPONSE_ENVIRONMENT, useValue: env },
    options.geolocation
      ? { provide: GEOLOCATION_PLATFORM, useValue: options.geolocation }
      : { provide: GEOLOCATION_PLATFORM, useFactory: () => new BrowserGeolocationPlatform() },
    options.geocoder
      ? { provide: REVERSE_GEOCODER, useValue: options.geocoder }
      : { provide: REVERSE_GEOCODER, useFactory: () => new NominatimReverseGeocoder(env.geocoder) },
    options.launcher
      ? { provide: URL_LAUNCHER, useValue: options.launcher }
      : { provide: URL_LAUNCHER, useFactory: () => new BrowserUrlLauncher() },
    { provide: RUNTIME_PLATFORM, useValue: options.runtime ?? detectRuntimePlatform() },
    options.assets
      ? { provide: ASSET_SOURCE, useValue: options.assets }
      : { provide: ASSET_SOURCE, useFactory: () => new FileAssetSource() },
    LoggerService,
    LocationService,
    MedicalKnowledgeService,
  ];
}
