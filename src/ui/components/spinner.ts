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

// Animated status line for one installer step

import { cyan, green, red, isTTY, MESSAGE_ICONS } from '../colors.js';
import { isMockActive, recordCall } from '../mock.js';

const FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
const INTERVAL_MS = 80;

/**
 * Run task with animated spinner. Shows ✓ on success, ✗ on failure.
 * Falls back to one line per outcome when stdout is not a TTY, and to a recorded call in mock mode.
 */
export async function withSpinner<T>(message: string, task: () => Promise<T>): Promise<T> {
  if (isMockActive()) {
    recordCall('spinner', message);
    return await task();
  }

  if (!isTTY) {
    process.stdout.write(`  ${message}...\n`);
    try {
      return await task();
    } catch (err) {
      process.stdout.write(`  ${MESSAGE_ICONS.error}  ${message}\n`);
      throw err;
    }
  }

  let frame = 0;
  const interval = setInterval(() => {
    process.stdout.write(`\r  ${cyan(FRAMES[frame])}  ${message}`);
    frame = (frame + 1) % FRAMES.length;
  }, INTERVAL_MS);

  try {
    const result = await task();
    process.stdout.write(`\r  ${green(MESSAGE_ICONS.success)}  ${message}\n`);
    return result;
  } catch (err) {
    process.stdout.write(`\r  ${red(MESSAGE_ICONS.error)}  ${message}\n`);
    throw err;
  } finally {
    clearInterval(interval);
  }
}
