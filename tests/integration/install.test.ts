/*
 * SonarQube CLI
 * Copyright (C) 2026 SonarSource Sàrl
 * mailto:info AT sonarsource DOT com
 *
 * This program is free software; you can redistribute it and/or
 * modify it under the terms of the GNU Lesser General Public
 * License as published by the Free Software Foundation; either
 * version 3 of the License, or (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the GNU
 * Lesser General Public License for more details.
 *
 * You should have received a copy of the GNU Lesser General Public License
 * along with this program; if not, write to the Free Software Foundation,
 * Inc., 51 Franklin Street, Fifth Floor, Boston, MA  02110-1301, USA.
 */

// End-to-end installer runs: real temp directories and zip archives,
// stubbed HTTP and an in-memory user PATH store

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { runInstaller } from '../../src/lib/install-pipeline.js';
import {
  AssetNotFoundError,
  ChecksumMismatchError,
  DownloadError,
  MissingExecutableError,
  UnsupportedPlatformError,
} from '../../src/lib/install-errors.js';
import type { InstallerConfig } from '../../src/lib/install-types.js';
import { setMockLogger } from '../../src/lib/logger.js';
import { clearMockUiCalls, setMockUi } from '../../src/ui/index.js';
import {
  binaryResponse,
  buildRelease,
  buildZip,
  fetchedUrls,
  jsonResponse,
  mockFetch,
  sha256,
  testConfig,
} from '../helpers/fixtures.js';
import { MemoryUserPathStore } from '../helpers/memory-path-store.js';

const TAGGED_URL = 'https://api.github.com/repos/subtis/subtis/releases/tags/v2.1.0';
const LATEST_URL = 'https://api.github.com/repos/subtis/subtis/releases/latest';
const ASSET_URL = 'https://github.com/subtis/subtis/releases/download/v2.1.0/subtis-windows-x64.zip';
const MIRROR_URL = 'https://mirror.example.test/subtis-windows-x64.zip';

const ARCHIVE = buildZip({ 'subtis.exe': 'MZ-subtis-2.1.0', 'README.md': 'subtis' });

function releaseRoutes(archive: Buffer = ARCHIVE) {
  const release = buildRelease('v2.1.0', [{ name: 'subtis-windows-x64.zip', url: ASSET_URL }]);
  return {
    [TAGGED_URL]: () => jsonResponse(release),
    [LATEST_URL]: () => jsonResponse(release),
    [ASSET_URL]: () => binaryResponse(archive),
  };
}

describe('runInstaller', () => {
  let root: string;
  let config: InstallerConfig;
  let store: MemoryUserPathStore;
  let createPathStore: Mock<() => MemoryUserPathStore>;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'subtis-install-it-'));
    const tempRoot = join(root, 'tmp');
    mkdirSync(tempRoot);
    config = testConfig({ tempRoot, installDir: join(root, 'Programs', 'subtis') });
    store = new MemoryUserPathStore(['C:\\Windows']);
    createPathStore = vi.fn(() => store);

    setMockUi(true);
    clearMockUiCalls();
    setMockLogger(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    setMockUi(false);
    setMockLogger(null);
    rmSync(root, { recursive: true, force: true });
  });

  function installedFile(): string {
    return join(config.installDir, 'subtis.exe');
  }

  function workspaceEntries(): string[] {
    return readdirSync(config.tempRoot);
  }

  it('installs a pinned version from its tagged release', async () => {
    const spy = mockFetch(releaseRoutes());

    const result = await runInstaller({ ...config, version: '2.1.0' }, { createPathStore });

    expect(fetchedUrls(spy)).toEqual([TAGGED_URL, ASSET_URL]);
    expect(result).toEqual({
      installedPath: installedFile(),
      installDir: config.installDir,
      version: '2.1.0',
      pathOutcome: 'updated',
    });
    expect(readFileSync(installedFile(), 'utf-8')).toBe('MZ-subtis-2.1.0');
    expect(store.list).toEqual(['C:\\Windows', config.installDir]);
    expect(workspaceEntries()).toEqual([]);
  });

  it('never queries the API when an explicit URL is given', async () => {
    const spy = mockFetch({ [MIRROR_URL]: () => binaryResponse(ARCHIVE) });

    const result = await runInstaller({ ...config, downloadUrl: MIRROR_URL }, { createPathStore });

    expect(fetchedUrls(spy)).toEqual([MIRROR_URL]);
    expect(result.version).toBeUndefined();
    expect(existsSync(installedFile())).toBe(true);
  });

  it('installs when the checksum matches, ignoring case', async () => {
    mockFetch(releaseRoutes());

    await runInstaller({ ...config, checksum: sha256(ARCHIVE).toUpperCase() }, { createPathStore });

    expect(readFileSync(installedFile(), 'utf-8')).toBe('MZ-subtis-2.1.0');
  });

  it('copies nothing when the checksum does not match', async () => {
    mockFetch(releaseRoutes());
    const expected = '0'.repeat(64);

    const failure = await runInstaller({ ...config, checksum: expected }, { createPathStore }).catch(
      (err: unknown) => err
    );

    expect(failure).toBeInstanceOf(ChecksumMismatchError);
    expect(failure).toMatchObject({ expected, actual: sha256(ARCHIVE) });
    expect(existsSync(config.installDir)).toBe(false);
    expect(store.writes).toBe(0);
    expect(workspaceEntries()).toEqual([]);
  });

  it('installs unverified content when no checksum is configured', async () => {
    const tampered = buildZip({ 'subtis.exe': 'tampered payload' });
    mockFetch(releaseRoutes(tampered));

    await runInstaller(config, { createPathStore });

    expect(readFileSync(installedFile(), 'utf-8')).toBe('tampered payload');
  });

  it('fails before copying when the archive lacks the executable', async () => {
    mockFetch(releaseRoutes(buildZip({ 'subtis/subtis.exe': 'nested' })));

    await expect(runInstaller(config, { createPathStore })).rejects.toBeInstanceOf(MissingExecutableError);

    expect(existsSync(config.installDir)).toBe(false);
    expect(workspaceEntries()).toEqual([]);
  });

  it('removes the workspace when the download fails', async () => {
    const routes = releaseRoutes();
    mockFetch({ [LATEST_URL]: routes[LATEST_URL] });

    await expect(runInstaller(config, { createPathStore })).rejects.toBeInstanceOf(DownloadError);

    expect(workspaceEntries()).toEqual([]);
  });

  it('creates no workspace when the release lacks the asset', async () => {
    mockFetch({ [LATEST_URL]: () => jsonResponse(buildRelease('v2.1.0', [])) });

    await expect(runInstaller(config, { createPathStore })).rejects.toBeInstanceOf(AssetNotFoundError);

    expect(workspaceEntries()).toEqual([]);
  });

  it('is idempotent across two identical runs', async () => {
    mockFetch(releaseRoutes());

    const first = await runInstaller(config, { createPathStore });
    const second = await runInstaller(config, { createPathStore });

    expect(first.pathOutcome).toBe('updated');
    expect(second.pathOutcome).toBe('already-present');
    expect(readFileSync(installedFile(), 'utf-8')).toBe('MZ-subtis-2.1.0');
    expect(store.list.filter((entry) => entry === config.installDir)).toHaveLength(1);
    expect(store.writes).toBe(1);
  });

  it('leaves PATH alone when the update is disabled', async () => {
    mockFetch(releaseRoutes());

    const result = await runInstaller({ ...config, updatePath: false }, { createPathStore });

    expect(result.pathOutcome).toBe('skipped');
    expect(result.version).toBe('2.1.0');
    expect(createPathStore).not.toHaveBeenCalled();
    expect(store.list).toEqual(['C:\\Windows']);
  });

  it('fails on an unusable PATH store before downloading anything', async () => {
    const spy = mockFetch(releaseRoutes());
    const unsupported = () => {
      throw new UnsupportedPlatformError('Updating the user PATH is only supported on Windows.');
    };

    await expect(runInstaller(config, { createPathStore: unsupported })).rejects.toBeInstanceOf(
      UnsupportedPlatformError
    );

    expect(spy).not.toHaveBeenCalled();
    expect(existsSync(config.installDir)).toBe(false);
  });

  it('overwrites a previous installation', async () => {
    mockFetch(releaseRoutes(buildZip({ 'subtis.exe': 'MZ-subtis-2.2.0' })));
    mkdirSync(config.installDir, { recursive: true });
    writeFileSync(installedFile(), 'MZ-subtis-2.1.0');

    await runInstaller({ ...config, updatePath: false }, { createPathStore });
    expect(readFileSync(installedFile(), 'utf-8')).toBe('MZ-subtis-2.2.0');
  });
});
