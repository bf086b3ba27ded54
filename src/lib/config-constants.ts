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

/**
 * Central configuration constants for the subtis installer.
 *
 * Paths are computed once at module load time.
 * All files that need these values should import from here.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

// ---------------------------------------------------------------------------
// App name
// ---------------------------------------------------------------------------

export const APP_NAME = 'subtis-installer';

// ---------------------------------------------------------------------------
// Installer data directory (override via SUBTIS_INSTALLER_DIR, used by tests)
// ---------------------------------------------------------------------------

export const CLI_DIR = process.env.SUBTIS_INSTALLER_DIR ?? join(homedir(), '.subtis', 'installer');

// ---------------------------------------------------------------------------
// Logs
// ---------------------------------------------------------------------------

export const LOG_DIR = join(CLI_DIR, 'logs');
export const LOG_FILE = join(LOG_DIR, `${APP_NAME}.log`);

// ---------------------------------------------------------------------------
// GitHub releases
// ---------------------------------------------------------------------------

export const GITHUB_API_BASE = 'https://api.github.com';

export const DEFAULT_REPOSITORY = {
  owner: 'subtis',
  name: 'subtis',
} as const;

export const REQUEST_TIMEOUT_MS = 30000;
export const DOWNLOAD_TIMEOUT_MS = 120000;

// ---------------------------------------------------------------------------
// Release artifact layout
// ---------------------------------------------------------------------------

/** Zip asset attached to every release */
export const ASSET_NAME = 'subtis-windows-x64.zip';

/** Executable at the root of the extracted archive, also its installed name */
export const EXECUTABLE_NAME = 'subtis.exe';

/** Directory name under %LOCALAPPDATA%\Programs */
export const INSTALL_DIR_NAME = 'subtis';

// ---------------------------------------------------------------------------
// Temporary workspace
// ---------------------------------------------------------------------------

export const WORKSPACE_PREFIX = 'subtis-install-';
export const EXTRACT_DIR_NAME = 'extracted';
