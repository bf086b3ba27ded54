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

// Banner printed once before the installer starts

import { isTTY, bold, dim } from '../colors.js';
import { isMockActive, recordCall } from '../mock.js';

const RULE_WIDTH = 42;

/**
 * Title line followed by one dimmed line per detail (source, target directory).
 */
export function intro(title: string, ...details: string[]): void {
  if (isMockActive()) {
    recordCall('intro', title, ...details);
    return;
  }

  const lines = isTTY
    ? [bold(title), ...details.map((detail) => dim(detail))]
    : [title, ...details];
  const rule = isTTY ? '━'.repeat(RULE_WIDTH) : '='.repeat(RULE_WIDTH);

  process.stdout.write(['', rule, ...lines, rule, '', ''].map((line) => (line ? `  ${line}` : line)).join('\n'));
}
