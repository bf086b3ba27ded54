// GitHub releases API client for resolving and downloading the subtis archive

import { writeFile } from 'node:fs/promises';
import type { GitHubAsset, GitHubRelease, InstallerConfig, ResolvedAsset } from './install-types.js';
import { ASSET_NAME, DOWNLOAD_TIMEOUT_MS, GITHUB_API_BASE, REQUEST_TIMEOUT_MS } from './config-constants.js';
import { AssetNotFoundError, DownloadError, InstallIOError, describeError } from './install-errors.js';
import logger from './logger.js';
import { VERSION } from '../version.js';

export const USER_AGENT = `subtis-installer/${VERSION}`;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isGitHubAsset(value: unknown): value is GitHubAsset {
  return isRecord(value)
    && typeof value.name === 'string'
    && typeof value.browser_download_url === 'string';
}

export function isGitHubRelease(value: unknown): value is GitHubRelease {
  if (!isRecord(value)) return false;
  const { tag_name: tagName, assets } = value;
  return typeof tagName === 'string' && Array.isArray(assets) && assets.every(isGitHubAsset);
}

/**
 * API path for a release: by tag ("v" + version) when a version is pinned, latest otherwise
 */
export function buildReleaseUrl(owner: string, repo: string, version?: string): string {
  const base = `${GITHUB_API_BASE}/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/releases`;
  return version ? `${base}/tags/${encodeURIComponent(`v${version}`)}` : `${base}/latest`;
}

function apiHeaders(token?: string): Record<string, string> {
  const headers: Record<string, string> = {
    'Accept': 'application/vnd.github+json',
    'User-Agent': USER_AGENT,
  };
  if (token) {
    headers['Authorization'] = `Bearer ${token}`;
  }
  return headers;
}

/**
 * Fetch a release from GitHub: the one tagged v<version>, or the latest.
 * Fails with DownloadError on transport errors, non-2xx responses and malformed bodies.
 */
export async function fetchRelease(
  owner: string,
  repo: string,
  version?: string,
  token?: string
): Promise<GitHubRelease> {
  const url = buildReleaseUrl(owner, repo, version);
  logger.debug(`Fetching release: ${url}`);

  let response: Response;
  try {
    response = await fetch(url, {
      headers: apiHeaders(token),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
  } catch (err) {
    throw new DownloadError(`Could not reach GitHub API: ${describeError(err)}`, { cause: err });
  }

  if (!response.ok) {
    const target = version ? `release v${version}` : 'latest release';
    throw new DownloadError(
      `GitHub API error for ${owner}/${repo} ${target}: ${response.status} ${response.statusText}`,
      { status: response.status }
    );
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (err) {
    throw new DownloadError(`GitHub API returned invalid JSON: ${describeError(err)}`, { cause: err });
  }

  if (!isGitHubRelease(body)) {
    throw new DownloadError('GitHub API response is not a release');
  }
  return body;
}

/**
 * Find asset by exact name in release
 */
export function findAsset(release: GitHubRelease, assetName: string): GitHubAsset | null {
  return release.assets.find((asset) => asset.name === assetName) ?? null;
}

/**
 * Turn the configuration into a concrete archive URL.
 * An explicit URL short-circuits: the API is not queried.
 */
export async function resolveAsset(config: InstallerConfig): Promise<ResolvedAsset> {
  if (config.downloadUrl) {
    logger.info(`Using explicit download URL: ${config.downloadUrl}`);
    return { url: config.downloadUrl, version: config.version };
  }

  const release = await fetchRelease(config.owner, config.repo, config.version, config.githubToken);
  logger.info(`Resolved release ${release.tag_name}`);

  const asset = findAsset(release, ASSET_NAME);
  if (!asset) {
    throw new AssetNotFoundError(ASSET_NAME, release.tag_name);
  }

  const version = config.version ?? release.tag_name.replace(/^v/, '');
  return { url: asset.browser_download_url, version };
}

/**
 * Download archive from URL to destination path
 */
export async function downloadArchive(url: string, destinationPath: string): Promise<number> {
  logger.debug(`Downloading from: ${url}`);

  let buffer: ArrayBuffer;
  try {
    const response = await fetch(url, {
      headers: { 'User-Agent': USER_AGENT },
      signal: AbortSignal.timeout(DOWNLOAD_TIMEOUT_MS),
    });

    if (!response.ok) {
      throw new DownloadError(`Download failed: ${response.status} ${response.statusText}`, {
        status: response.status,
      });
    }

    buffer = await response.arrayBuffer();
  } catch (err) {
    if (err instanceof DownloadError) throw err;
    throw new DownloadError(`Download failed: ${describeError(err)}`, { cause: err });
  }

  try {
    await writeFile(destinationPath, Buffer.from(buffer));
  } catch (err) {
    throw new InstallIOError(`Could not write ${destinationPath}: ${describeError(err)}`, { cause: err });
  }

  logger.debug(`Downloaded ${buffer.byteLength} bytes`);
  return buffer.byteLength;
}
