/**
 * In-process stand-ins for the device capabilities LocationService and
 * MedicalKnowledgeService consume.
 */

import { vi } from 'vitest';
import type { AssetSource } from '../services/asset-source';
import type {
  DevicePosition,
  GeolocationPlatform,
  LocationPermission,
  Placemark,
  PositionRequest,
  ReverseGeocoder,
  UrlLauncher,
} from '../services/location.platform';
import { createTestPosition } from './test-data-factories';

export function createMockGeolocation(position: DevicePosition = createTestPosition()) {
  return {
    isLocationServiceEnabled: vi.fn(async (): Promise<boolean> => true),
    checkPermission: vi.fn(async (): Promise<LocationPermission> => 'whileInUse'),
    requestPermission: vi.fn(async (): Promise<LocationPermission> => 'whileInUse'),
    getCurrentPosition: vi.fn(async (_request: PositionRequest): Promise<DevicePosition> => position),
    getLastKnownPosition: vi.fn(async (): Promise<DevicePosition | null> => null),
  } satisfies GeolocationPlatform;
}

export type MockGeolocation = ReturnType<typeof createMockGeolocation>;

export function createMockGeocoder(placemarks: Placemark[] = []) {
  return {
    placemarkFromCoordinates: vi.fn(
      async (_latitude: number, _longitude: number): Promise<Placemark[]> => placemarks
    ),
  } satisfies ReverseGeocoder;
}

export type MockGeocoder = ReturnType<typeof createMockGeocoder>;

export function createMockLauncher(launchable: (url: string) => boolean = () => true) {
  return {
    canLaunch: vi.fn(async (url: string): Promise<boolean> => launchable(url)),
    launch: vi.fn(async (_url: string): Promise<boolean> => true),
  } satisfies UrlLauncher;
}

export type MockLauncher = ReturnType<typeof createMockLauncher>;

/**
 * Serves files from a map of path to contents; unknown paths reject like a
 * missing file would.
 */
export class InMemoryAssetSource implements AssetSource {
  readonly reads: string[] = [];

  constructor(private readonly files: Record<string, string>) {}

  async loadString(path: string): Promise<string> {
    this.reads.push(path);
    const contents = this.files[path];
    if (contents === undefined) {
      throw new Error(`ENOENT: no such asset '${path}'`);
    }
    return contents;
  }
}
