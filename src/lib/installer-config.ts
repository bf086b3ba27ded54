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

// Turns command-line options and the environment into an InstallerConfig

import { homedir, tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { InvalidOptionError } from '../commands/common/error.js';
import { DEFAULT_REPOSITORY, INSTALL_DIR_NAME } from './config-constants.js';
import type { InstallerConfig } from './install-types.js';

export interface InstallCommandOptions {
  version?: string;
  url?: string;
  owner?: string;
  repo?: string;
  installDir?: string;
  checksum?: string;
  /** commander sets this to false for --no-path-update */
  pathUpdate?: boolean;
}

type Env = Record<string, string | undefined>;

const SHA256_HEX = /^[0-9a-f]{64}$/i;

/**
 * Per-user program location: %LOCALAPPDATA%\Programs\subtis
 */
export function defaultInstallDir(env: Env = process.env): string {
  const localAppData = env.LOCALAPPDATA?.trim();
  const base = localAppData || join(homedir(), 'AppData', 'Local');
  return join(base, 'Programs', INSTALL_DIR_NAME);
}

/**
 * Strip surrounding whitespace and one leading "v" so "v2.1.0" and "2.1.0" address the same tag.
 */
export function normalizeVersion(version: string): string {
  const trimmed = version.trim();
  return trimmed.startsWith('v') ? trimmed.slice(1) : trimmed;
}

function validateVersion(version: string): string {
  const normalized = normalizeVersion(version);
  if (!normalized) {
    throw new InvalidOptionError('--version', 'must not be empty');
  }
  return normalized;
}

function optionalValue(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function validateDownloadUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new InvalidOptionError('--url', `"${url}" is not a valid URL`);
  }
  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
    throw new InvalidOptionError('--url', `unsupported protocol ${parsed.protocol}`);
  }
  return url;
}

function validateChecksum(checksum: string): string {
  if (!SHA256_HEX.test(checksum)) {
    throw new InvalidOptionError('--checksum', 'expected a SHA-256 digest of 64 hexadecimal characters');
  }
  return checksum;
}

function requiredName(option: string, value: string | undefined, fallback: string): string {
  if (value === undefined) return fallback;
  const trimmed = value.trim();
  if (!trimmed) {
    throw new InvalidOptionError(option, 'must not be empty');
  }
  return trimmed;
}

export function resolveInstallerConfig(
  options: InstallCommandOptions,
  env: Env = process.env
): InstallerConfig {
  const version = optionalValue(options.version);
  const url = optionalValue(options.url);
  const checksum = optionalValue(options.checksum);
  const installDir = optionalValue(options.installDir);

  return Object.freeze({
    version: version ? validateVersion(version) : undefined,
    downloadUrl: url ? validateDownloadUrl(url) : undefined,
    owner: requiredName('--owner', options.owner, DEFAULT_REPOSITORY.owner),
    repo: requiredName('--repo', options.repo, DEFAULT_REPOSITORY.name),
    // Absolute, since the directory is persisted on the user PATH
    installDir: resolve(installDir ?? defaultInstallDir(env)),
    checksum: checksum ? validateChecksum(checksum) : undefined,
    updatePath: options.pathUpdate !== false,
    tempRoot: tmpdir(),
    githubToken: optionalValue(env.GITHUB_TOKEN),
  });
}
