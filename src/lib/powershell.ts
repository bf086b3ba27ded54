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

// Runs short PowerShell scripts; used to reach the per-user environment store

import { spawn } from 'node:child_process';
import type { Readable } from 'node:stream';

export interface PowerShellResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export type PowerShellRunner = (
  script: string,
  env?: Record<string, string>
) => Promise<PowerShellResult>;

/**
 * Run a script with powershell.exe. Values the script needs are passed through env,
 * never interpolated into the script text.
 */
/**
 * Accumulate a stream as UTF-8 text. The decoder keeps multi-byte characters
 * split across chunks intact.
 */
export function captureText(stream: Readable): () => string {
  let text = '';
  stream.setEncoding('utf8');
  stream.on('data', (chunk: string) => {
    text += chunk;
  });
  return () => text;
}

/**
 * Drop the line ending PowerShell appends to its last output line, keeping
 * any other whitespace in the value.
 */
export function stripTrailingNewline(output: string): string {
  return output.replace(/\r?\n$/, '');
}

export const runPowerShell: PowerShellRunner = (script, env = {}) => {
  return new Promise((resolve, reject) => {
    const proc = spawn(
      'powershell.exe',
      ['-NoProfile', '-NonInteractive', '-ExecutionPolicy', 'Bypass', '-Command', script],
      {
        env: { ...process.env, ...env },
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      }
    );

    const stdout = captureText(proc.stdout);
    const stderr = captureText(proc.stderr);

    proc.on('error', reject);

    proc.on('close', (code) => {
      resolve({
        exitCode: code,
        stdout: stripTrailingNewline(stdout()),
        stderr: stderr().trim(),
      });
    });
  });
};
