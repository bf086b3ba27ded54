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

// Run-scoped temporary workspace: created fresh per run, removed on every exit path

import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { WORKSPACE_PREFIX } from './config-constants.js';
import { InstallIOError, describeError } from './install-errors.js';
import logger from './logger.js';

/**
 * Create <tempRoot>/subtis-install-XXXXXX. mkdtemp picks the random suffix,
 * so concurrent installer runs never share a workspace.
 */
export async function createWorkspace(tempRoot: string): Promise<string> {
  try {
    const dir = await mkdtemp(join(tempRoot, WORKSPACE_PREFIX));
    logger.debug(`Created workspace ${dir}`);
    return dir;
  } catch (err) {
    throw new InstallIOError(`Could not create temporary directory in ${tempRoot}: ${describeError(err)}`, {
      cause: err,
    });
  }
}

/**
 * Remove the workspace. Failures are logged, never thrown, so they cannot replace the run's own outcome.
 */
export async function removeWorkspace(dir: string): Promise<void> {
  try {
    await rm(dir, { recursive: true, force: true });
    logger.debug(`Removed workspace ${dir}`);
  } catch (err) {
    logger.warn(`Could not remove temporary directory ${dir}: ${describeError(err)}`);
  }
}
