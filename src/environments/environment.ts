import type { Environment } from './environment.types';

export const environment: Environment = {
  production: false,
  logLevel: 'debug',
  emergencyDataPath: 'data/emergencies.json',
  location: {
    cacheTtlMs: 60_000,
    highAccuracyTimeoutMs: 15_000,
    mapLookupTimeoutMs: 10_000,
  },
  geocoder: {
    baseUrl: 'https://nominatim.openstreetmap.org',
    userAgent: 'first-response-kit/0.1',
    timeoutMs: 10_000,
  },
};
