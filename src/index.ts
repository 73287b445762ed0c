export * from './app.config';
export { environment } from './environments/environment';
export { FIRST_RESPONSE_ENVIRONMENT } from './environments/environment.token';
export type * from './environments/environment.types';
export * from './services/asset-source';
export * from './services/browser-location.platform';
export * from './services/emergency-assessment';
export * from './services/emergency-condition.schema';
export { FALLBACK_EMERGENCIES } from './services/emergency-fallback.data';
export * from './services/location.errors';
export * from './services/location.platform';
export * from './services/location.service';
export * from './services/logger.service';
export * from './services/medical-knowledge.service';
export * from './services/nominatim-geocoder';
