// Installer version, read from the package manifest shipped beside src/ and dist/

import { readFileSync } from 'node:fs';

export function readManifestVersion(manifest: unknown): string {
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  throw new Error('package.json does not declare a version');
}

export const VERSION = readManifestVersion(
  JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'))
);
