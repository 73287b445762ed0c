export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LocationSettings {
  /** How long a resolved address is reused before the device is asked again */
  cacheTtlMs: number;
  /** Time limit for the high-accuracy fix behind getCurrentLocation() */
  highAccuracyTimeoutMs: number;
  /** Time limit for the medium-accuracy fix used when opening a map */
  mapLookupTimeoutMs: number;
}

export interface GeocoderSettings {
  /** Nominatim-compatible reverse geocoding endpoint root */
  baseUrl: string;
  /** Sent with every request, as the Nominatim usage policy asks */
  userAgent: string;
  /** Requests still unanswered after this long are aborted */
  timeoutMs: number;
}

export interface Environment {
  production: boolean;
  logLevel: LogLevel;
  /** Path of the emergency dataset, relative to the bundled assets root */
  emergencyDataPath: string;
  location: LocationSettings;
  geocoder: GeocoderSettings;
}
