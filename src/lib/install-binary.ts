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

// Copies the extracted executable into the target directory

import { copyFile, mkdir } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { InstallIOError, describeError } from './install-errors.js';
import logger from './logger.js';

/**
 * Ensure installDir exists and copy the executable into it under its own name,
 * overwriting a previous installation.
 */
export async function installExecutable(executablePath: string, installDir: string): Promise<string> {
  try {
    await mkdir(installDir, { recursive: true });
  } catch (err) {
    throw new InstallIOError(`Could not create ${installDir}: ${describeError(err)}`, { cause: err });
  }

  const installedPath = join(installDir, basename(executablePath));
  try {
    await copyFile(executablePath, installedPath);
  } catch (err) {
    throw new InstallIOError(`Could not copy executable to ${installedPath}: ${describeError(err)}`, {
      cause: err,
    });
  }

  logger.info(`Installed ${installedPath}`);
  return installedPath;
}
