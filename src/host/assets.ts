/**
 * @fileoverview Locates the non-TypeScript files shipped in `assets/`:
 * host-side ExtendScript, the process drivers and the usage guide.
 */

import { readFileSync } from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

// src/host/ and dist/host/ both sit two levels below the package root.
const ASSETS_ROOT = fileURLToPath(new URL('../../assets/', import.meta.url));

const cache = new Map<string, string>();

export function resolveAssetPath(...segments: string[]): string {
  return path.join(ASSETS_ROOT, ...segments);
}

/** Read a text asset once and keep it for the life of the process. */
export function readAsset(...segments: string[]): string {
  const assetPath = resolveAssetPath(...segments);
  const cached = cache.get(assetPath);
  if (cached !== undefined) return cached;
  const text = readFileSync(assetPath, 'utf8');
  cache.set(assetPath, text);
  return text;
}
