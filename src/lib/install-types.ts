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

// Types for subtis release resolution and installation

export interface GitHubRelease {
  tag_name: string;
  name?: string | null;
  assets: GitHubAsset[];
}

export interface GitHubAsset {
  name: string;
  browser_download_url: string;
  size?: number;
}

/**
 * Settings for one installer run. Supplied once at startup and never mutated.
 */
export interface InstallerConfig {
  readonly version?: string;
  readonly downloadUrl?: string;
  readonly owner: string;
  readonly repo: string;
  readonly installDir: string;
  readonly checksum?: string;
  readonly updatePath: boolean;
  readonly tempRoot: string;
  readonly githubToken?: string;
}

export interface ResolvedAsset {
  url: string;
  /** Effective version, when known (configured, or taken from the release tag) */
  version?: string;
}

export type PathOutcome = 'updated' | 'already-present' | 'skipped';

export interface InstallResult {
  installedPath: string;
  installDir: string;
  version?: string;
  pathOutcome: PathOutcome;
}
