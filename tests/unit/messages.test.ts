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

// Tests for messages.ts: info, success, warn, error, text, blank
// Covers both mock mode (recordCall) and real output paths

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { info, success, warn, error, text, blank } from '../../src/ui/messages.js';
import { setMockUi, getMockUiCalls, getMockUiMessages, clearMockUiCalls } from '../../src/ui/mock.js';

// ─── Mock mode ────────────────────────────────────────────────────────────────

describe('messages: mock mode', () => {
  beforeEach(() => {
    setMockUi(true);
    clearMockUiCalls();
  });
  afterEach(() => {
    setMockUi(false);
  });

  it('records each call with its method and message in order', () => {
    info('resolving');
    success('done');
    warn('caution');
    error('oops');
    text('plain text');
    blank();

    expect(getMockUiCalls()).toEqual([
      { method: 'info', args: ['resolving'] },
      { method: 'success', args: ['done'] },
      { method: 'warn', args: ['caution'] },
      { method: 'error', args: ['oops'] },
      { method: 'text', args: ['plain text'] },
      { method: 'blank', args: [] },
    ]);
  });

  it('getMockUiMessages filters by method', () => {
    info('first');
    warn('skip me');
    info('second');

    expect(getMockUiMessages('info')).toEqual(['first', 'second']);
  });

  it('setMockUi(false) clears recorded calls', () => {
    info('hello');
    setMockUi(false);
    setMockUi(true);

    expect(getMockUiCalls()).toEqual([]);
  });
});

// ─── Real output paths ────────────────────────────────────────────────────────

function captureWrites(stream: NodeJS.WriteStream) {
  const output: string[] = [];
  const spy = vi.spyOn(stream, 'write').mockImplementation((chunk: string | Uint8Array) => {
    output.push(String(chunk));
    return true;
  });
  return { output, restore: () => spy.mockRestore() };
}

describe('messages: real output (non-mock)', () => {
  it('info writes to stdout with ℹ prefix', () => {
    const capture = captureWrites(process.stdout);
    try {
      info('test message');
      expect(capture.output.join('')).toContain('ℹ');
      expect(capture.output.join('')).toContain('test message');
    } finally {
      capture.restore();
    }
  });

  it('error writes the whole line to stderr', () => {
    const capture = captureWrites(process.stderr);
    try {
      error('Installation failed: boom');
      expect(capture.output.join('')).toContain('✗  Installation failed: boom');
    } finally {
      capture.restore();
    }
  });

  it('warn writes to stderr', () => {
    const capture = captureWrites(process.stderr);
    try {
      warn('be careful');
      expect(capture.output.join('')).toContain('be careful');
    } finally {
      capture.restore();
    }
  });

  it('text applies the color function', () => {
    const capture = captureWrites(process.stdout);
    try {
      text('Installed version: 2.1.0', (s) => `<${s}>`);
      expect(capture.output).toEqual(['<Installed version: 2.1.0>\n']);
    } finally {
      capture.restore();
    }
  });

  it('blank writes a newline', () => {
    const capture = captureWrites(process.stdout);
    try {
      blank();
      expect(capture.output).toEqual(['\n']);
    } finally {
      capture.restore();
    }
  });
});
