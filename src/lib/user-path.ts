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

// User-scope PATH: read, check membership, append once

import { InstallIOError, UnsupportedPlatformError, describeError } from './install-errors.js';
import { runPowerShell, type PowerShellResult, type PowerShellRunner } from './powershell.js';
import logger from './logger.js';

export const PATH_SEPARATOR = ';';

/**
 * The persistent per-user PATH as an ordered list of directories.
 */
export interface UserPathStore {
  getList(): Promise<string[]>;
  setList(entries: string[]): Promise<void>;
}

export function splitPathList(value: string | null | undefined): string[] {
  if (!value) return [];
  return value.split(PATH_SEPARATOR).filter((segment) => segment.length > 0);
}

export function joinPathList(entries: string[]): string {
  return entries.join(PATH_SEPARATOR);
}

/**
 * Append dir to the user PATH unless it is already present verbatim.
 * Returns true when the store was written.
 *
 * Read-modify-write with no lock: two concurrent installers can drop one append.
 */
export async function ensureOnUserPath(store: UserPathStore, dir: string): Promise<boolean> {
  const entries = await store.getList();
  if (entries.includes(dir)) {
    logger.info(`${dir} already on user PATH`);
    return false;
  }

  await store.setList([...entries, dir]);
  logger.info(`Appended ${dir} to user PATH`);
  return true;
}

const NEW_PATH_ENV = 'SUBTIS_INSTALLER_NEW_PATH';

// Raw registry value: %VAR% references stay unexpanded. Output is forced to UTF-8
// so non-ASCII directories survive the round trip through the console code page.
export const READ_SCRIPT = [
  '[Console]::OutputEncoding = New-Object System.Text.UTF8Encoding $false',
  "(Get-Item -LiteralPath 'HKCU:\\Environment').GetValue('Path', '', 'DoNotExpandEnvironmentNames')",
].join('; ');

// Written back as REG_EXPAND_SZ. Clearing an unused user variable through
// Environment broadcasts WM_SETTINGCHANGE so new terminals pick up the change.
export const WRITE_SCRIPT = [
  `[Microsoft.Win32.Registry]::SetValue('HKEY_CURRENT_USER\\Environment', 'Path', $env:${NEW_PATH_ENV}, 'ExpandString')`,
  `[Environment]::SetEnvironmentVariable('${NEW_PATH_ENV}', $null, 'User')`,
].join('; ');

/**
 * Windows per-user environment store: the Path value under HKCU\Environment.
 */
export class PowerShellUserPathStore implements UserPathStore {
  constructor(private readonly run: PowerShellRunner = runPowerShell) {}

  async getList(): Promise<string[]> {
    const result = await this.invoke(READ_SCRIPT, {}, 'read');
    return splitPathList(result);
  }

  async setList(entries: string[]): Promise<void> {
    await this.invoke(WRITE_SCRIPT, { [NEW_PATH_ENV]: joinPathList(entries) }, 'update');
  }

  private async invoke(script: string, env: Record<string, string>, action: string): Promise<string> {
    let result: PowerShellResult;
    try {
      result = await this.run(script, env);
    } catch (err) {
      throw new InstallIOError(`Could not ${action} user PATH: ${describeError(err)}`, { cause: err });
    }
    if (result.exitCode !== 0) {
      const detail = result.stderr || `exit code ${result.exitCode}`;
      throw new InstallIOError(`Could not ${action} user PATH: ${detail}`);
    }
    return result.stdout;
  }
}

export function createUserPathStore(platform: NodeJS.Platform = process.platform): UserPathStore {
  if (platform !== 'win32') {
    throw new UnsupportedPlatformError(
      'Updating the user PATH is only supported on Windows. Rerun with --no-path-update.'
    );
  }
  return new PowerShellUserPathStore();
}
