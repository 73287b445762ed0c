import { InjectionToken } from '@angular/core';
import { readFile } from 'node:fs/promises';

/**
 * Read-only access to files bundled with the package.
 */
export interface AssetSource {
  loadString(path: string): Promise<string>;
}

/**
 * Reads bundled assets from disk, relative to `root`.
 */
export class FileAssetSource implements AssetSource {
  constructor(private readonly root: URL = new URL('../../assets/', import.meta.url)) {}

  loadString(path: string): Promise<string> {
    return readFile(new URL(path.replace(/^\/+/, ''), this.root), 'utf8');
  }
}

export const ASSET_SOURCE = new InjectionToken<AssetSource>('ASSET_SOURCE', {
  providedIn: 'root',
  factory: () => new FileAssetSource(),
});
