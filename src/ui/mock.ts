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

// Recording mode for tests: UI calls are captured instead of printed

export interface UiCall {
  method: string;
  args: unknown[];
}

class UiRecorder {
  active = false;
  readonly calls: UiCall[] = [];

  reset(): void {
    this.calls.length = 0;
  }
}

const recorder = new UiRecorder();

/** Turning recording off also discards what was recorded */
export function setMockUi(active: boolean): void {
  recorder.active = active;
  if (!active) recorder.reset();
}

export function isMockActive(): boolean {
  return recorder.active;
}

export function recordCall(method: string, ...args: unknown[]): void {
  recorder.calls.push({ method, args });
}

export function getMockUiCalls(): UiCall[] {
  return [...recorder.calls];
}

export function clearMockUiCalls(): void {
  recorder.reset();
}

export function getMockUiMessages(method: string): string[] {
  return recorder.calls.filter((call) => call.method === method).map((call) => String(call.args[0]));
}
