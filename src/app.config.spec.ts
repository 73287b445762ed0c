import { describe, expect, it } from 'vitest';
import { resolveEnvironment } from './app.config';
import { environment } from './environments/environment';
import { FIRST_RESPONSE_ENVIRONMENT } from './environments/environment.token';
import { RUNTIME_PLATFORM } from './services/location.platform';
import { LocationService } from './services/location.service';
import { MedicalKnowledgeService } from './services/medical-knowledge.service';
import { createFirstResponseInjector } from './standalone';

describe('resolveEnvironment', () => {
  it('returns the defaults without overrides', () => {
    expect(resolveEnvironment()).toEqual(environment);
  });

  it('merges nested settings', () => {
    const env = resolveEnvironment({ logLevel: 'warn', location: { cacheTtlMs: 5_000 } });

    expect(env.logLevel).toBe('warn');
    expect(env.location).toEqual({ cacheTtlMs: 5_000, highAccuracyTimeoutMs: 15_000, mapLookupTimeoutMs: 10_000 });
    expect(env.geocoder).toEqual(environment.geocoder);
  });
});

describe('createFirstResponseInjector', () => {
  it('provides one instance of each service per injector', () => {
    const injector = createFirstResponseInjector();

    expect(injector.get(LocationService)).toBe(injector.get(LocationService));
    expect(injector.get(MedicalKnowledgeService)).toBe(injector.get(MedicalKnowledgeService));
  });

  it('keeps injectors independent', () => {
    expect(createFirstResponseInjector().get(MedicalKnowledgeService)).not.toBe(
      createFirstResponseInjector().get(MedicalKnowledgeService)
    );
  });

  it('applies overrides', () => {
    const injector = createFirstResponseInjector({
      runtime: { isWeb: true, os: 'android' },
      environment: { emergencyDataPath: 'data/other.json' },
    });

    expect(injector.get(RUNTIME_PLATFORM)).toEqual({ isWeb: true, os: 'android' });
    expect(injector.get(FIRST_RESPONSE_ENVIRONMENT).emergencyDataPath).toBe('data/other.json');
  });
});
