// Shared fixtures: release payloads, zip archives and a fetch stub

import AdmZip from 'adm-zip';
import { createHash } from 'node:crypto';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi } from 'vitest';
import { DEFAULT_REPOSITORY } from '../../src/lib/config-constants.js';
import type { GitHubRelease, InstallerConfig } from '../../src/lib/install-types.js';

export function buildZip(files: Record<string, string>): Buffer {
  const zip = new AdmZip();
  for (const [name, content] of Object.entries(files)) {
    zip.addFile(name, Buffer.from(content));
  }
  return zip.toBuffer();
}

export function sha256(data: Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

export function buildRelease(tag: string, assets: Array<{ name: string; url: string }>): GitHubRelease {
  return {
    tag_name: tag,
    name: `Release ${tag}`,
    assets: assets.map((asset) => ({
      name: asset.name,
      browser_download_url: asset.url,
      size: 1024,
    })),
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function binaryResponse(data: Buffer): Response {
  return new Response(new Uint8Array(data), { status: 200 });
}

export function notFoundResponse(): Response {
  return new Response('Not Found', { status: 404, statusText: 'Not Found' });
}

function requestUrl(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

/**
 * Replace global fetch with a router keyed by URL. Unknown URLs get a 404.
 */
export function mockFetch(routes: Record<string, () => Response>) {
  return vi.spyOn(globalThis, 'fetch').mockImplementation(async (input) => {
    const route = routes[requestUrl(input)];
    return route ? route() : notFoundResponse();
  });
}

export function fetchedUrls(spy: ReturnType<typeof mockFetch>): string[] {
  return spy.mock.calls.map(([input]) => requestUrl(input));
}

export function testConfig(overrides: Partial<InstallerConfig> = {}): InstallerConfig {
  return {
    owner: DEFAULT_REPOSITORY.owner,
    repo: DEFAULT_REPOSITORY.name,
    installDir: join(tmpdir(), 'subtis-installer-test', 'Programs', 'subtis'),
    updatePath: true,
    tempRoot: tmpdir(),
    ...overrides,
  };
}
