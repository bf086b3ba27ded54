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

// Command-line definition: flags map onto InstallCommandOptions

import { Command } from 'commander';
import { installCommand } from './commands/install.js';
import { ASSET_NAME, DEFAULT_REPOSITORY } from './lib/config-constants.js';
import type { InstallCommandOptions } from './lib/installer-config.js';
import { runCommand } from './lib/run-command.js';
import logger, { setLogLevel } from './lib/logger.js';
import { VERSION } from './version.js';

export interface CliOptions extends InstallCommandOptions {
  verbose?: boolean;
}

export type InstallHandler = (options: CliOptions) => Promise<void>;

const runInstall: InstallHandler = (options) => runCommand(() => installCommand(options));

export function createProgram(handler: InstallHandler = runInstall): Command {
  const program = new Command();

  program
    .name('subtis-install')
    .description(`Download ${ASSET_NAME} from GitHub releases and install subtis.exe`)
    .version(VERSION, '-V, --installer-version', 'display installer version')
    .option('--version <version>', 'Release version to install (default: latest)')
    .option('--url <url>', 'Download the archive from this URL instead of querying GitHub')
    .option('--owner <owner>', 'GitHub repository owner', DEFAULT_REPOSITORY.owner)
    .option('--repo <repo>', 'GitHub repository name', DEFAULT_REPOSITORY.name)
    .option('--install-dir <dir>', 'Target directory (default: %LOCALAPPDATA%\\Programs\\subtis)')
    .option('--checksum <sha256>', 'Expected SHA-256 of the archive; the install fails on mismatch')
    .option('--no-path-update', 'Do not add the install directory to the user PATH')
    .option('--verbose', 'Write debug entries to the installer log')
    .action(async (options: CliOptions) => {
      if (options.verbose) {
        setLogLevel('DEBUG');
      }
      await handler(options);
    });

  program.exitOverride((err) => {
    if (err.exitCode === 0) {
      process.exit(0);
    }
    logger.error('Error: ' + err.message);
    process.exit(1);
  });

  return program;
}
