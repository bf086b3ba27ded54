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

// Main command: subtis-install [options]

import { resolveInstallerConfig, type InstallCommandOptions } from '../lib/installer-config.js';
import { runInstaller, type InstallerDeps } from '../lib/install-pipeline.js';
import type { InstallerConfig, InstallResult } from '../lib/install-types.js';
import { blank, bold, intro, info, success, text, warn } from '../ui/index.js';

function describeSource(config: InstallerConfig): string {
  if (config.downloadUrl) return config.downloadUrl;
  const release = config.version ? `v${config.version}` : 'latest release';
  return `${config.owner}/${config.repo} ${release}`;
}

function reportResult(result: InstallResult): void {
  blank();
  success(`Installed to ${result.installedPath}`);

  switch (result.pathOutcome) {
    case 'updated':
      info(`Added ${result.installDir} to your user PATH. Open a new terminal to use subtis.`);
      break;
    case 'already-present':
      info(`${result.installDir} is already on your user PATH`);
      break;
    case 'skipped':
      warn(`User PATH update skipped. Add ${result.installDir} to PATH to run subtis from anywhere.`);
      break;
  }

  if (result.version) {
    text(`Installed version: ${result.version}`, bold);
  }
}

export async function installCommand(
  options: InstallCommandOptions,
  deps: InstallerDeps = {}
): Promise<InstallResult> {
  const config = resolveInstallerConfig(options);

  intro('Installing subtis', `Source: ${describeSource(config)}`, `Target: ${config.installDir}`);
  const result = await runInstaller(config, deps);
  reportResult(result);

  return result;
}
