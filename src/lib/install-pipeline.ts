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

// Sequential install run: resolve, download, verify, extract, install, update PATH

import { join } from 'node:path';
import { extractArchive } from './archive.js';
import { verifyChecksum } from './checksum.js';
import { ASSET_NAME, EXTRACT_DIR_NAME } from './config-constants.js';
import { downloadArchive, resolveAsset } from './github-releases.js';
import { installExecutable } from './install-binary.js';
import type { InstallerConfig, InstallResult, PathOutcome } from './install-types.js';
import { createUserPathStore, ensureOnUserPath, type UserPathStore } from './user-path.js';
import { createWorkspace, removeWorkspace } from './workspace.js';
import logger from './logger.js';
import { info, withSpinner } from '../ui/index.js';

export interface InstallerDeps {
  /** Called once before any work, and only when the PATH update is enabled */
  createPathStore?: () => UserPathStore;
}

async function updateUserPath(store: UserPathStore, installDir: string): Promise<PathOutcome> {
  const updated = await withSpinner('Updating user PATH', () => ensureOnUserPath(store, installDir));
  return updated ? 'updated' : 'already-present';
}

/**
 * Run every step in order; the first failure aborts the rest.
 * The temporary workspace, once created, is removed on every exit path.
 */
export async function runInstaller(config: InstallerConfig, deps: InstallerDeps = {}): Promise<InstallResult> {
  const createPathStore = deps.createPathStore ?? (() => createUserPathStore());
  // Fail on an unsupported platform before anything is downloaded or copied
  const pathStore = config.updatePath ? createPathStore() : null;

  const resolved = await withSpinner('Resolving release asset', () => resolveAsset(config));
  logger.info(`Archive URL: ${resolved.url}`);

  let workspace: string | null = null;
  try {
    const dir = await createWorkspace(config.tempRoot);
    workspace = dir;

    const archivePath = join(dir, ASSET_NAME);
    await withSpinner(`Downloading ${ASSET_NAME}`, () => downloadArchive(resolved.url, archivePath));

    if (config.checksum) {
      await withSpinner('Verifying SHA-256 checksum', () => verifyChecksum(archivePath, config.checksum));
    } else {
      info('No checksum provided, archive not verified');
    }

    const executablePath = await withSpinner('Extracting archive', () =>
      extractArchive(archivePath, join(dir, EXTRACT_DIR_NAME))
    );

    const installedPath = await withSpinner(`Installing to ${config.installDir}`, () =>
      installExecutable(executablePath, config.installDir)
    );

    let pathOutcome: PathOutcome = 'skipped';
    if (pathStore) {
      pathOutcome = await updateUserPath(pathStore, config.installDir);
    } else {
      logger.info('User PATH update skipped (--no-path-update)');
    }

    return {
      installedPath,
      installDir: config.installDir,
      version: resolved.version,
      pathOutcome,
    };
  } finally {
    if (workspace) {
      await removeWorkspace(workspace);
    }
  }
}
