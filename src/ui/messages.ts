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

// One-line status messages printed between installer steps

import { cyan, green, red, yellow, MESSAGE_ICONS } from './colors.js';
import { isMockActive, recordCall } from './mock.js';
import type { ColorFn, MessageKind } from './types.js';

interface StatusStyle {
  icon: ColorFn;
  stream: 'stdout' | 'stderr';
  /** Colour the message as well as the icon */
  wholeLine?: boolean;
}

const STATUS_STYLES: Record<MessageKind, StatusStyle> = {
  info: { icon: cyan, stream: 'stdout' },
  success: { icon: green, stream: 'stdout' },
  warn: { icon: yellow, stream: 'stderr' },
  error: { icon: red, stream: 'stderr', wholeLine: true },
};

function status(kind: MessageKind, message: string): void {
  if (isMockActive()) {
    recordCall(kind, message);
    return;
  }
  const style = STATUS_STYLES[kind];
  const line = style.wholeLine
    ? style.icon(`${MESSAGE_ICONS[kind]}  ${message}`)
    : `${style.icon(MESSAGE_ICONS[kind])}  ${message}`;
  process[style.stream].write(`  ${line}\n`);
}

export function info(message: string): void {
  status('info', message);
}

export function success(message: string): void {
  status('success', message);
}

export function warn(message: string): void {
  status('warn', message);
}

export function error(message: string): void {
  status('error', message);
}

export function text(message: string, color?: ColorFn): void {
  if (isMockActive()) {
    recordCall('text', message);
    return;
  }
  process.stdout.write((color ? color(message) : message) + '\n');
}

export function blank(): void {
  if (isMockActive()) {
    recordCall('blank');
    return;
  }
  process.stdout.write('\n');
}
